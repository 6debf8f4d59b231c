/**
 * Error handling module - Standardized error handling for retrykit packages
 *
 * Features:
 * - Base error class with code, category and severity
 * - Domain-specific error types
 * - Normalization of thrown values and cause-chain unwrapping
 */

export {
  ErrorSeverity,
  ErrorCategory,
  RetryKitError,
  ConfigurationError,
  ValidationError,
  ExecutionError,
  type RetryKitErrorOptions,
} from './types.js';

export { toError, rootCause, extractErrorInfo } from './utils.js';
