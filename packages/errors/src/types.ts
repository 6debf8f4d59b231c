/**
 * Error types and base classes for standardized error handling across retrykit packages
 */

/**
 * Error severity levels for classification and handling
 */
export enum ErrorSeverity {
  /** Low severity - informational errors that don't affect operation */
  LOW = 'low',
  /** Medium severity - errors that may affect some functionality */
  MEDIUM = 'medium',
  /** High severity - errors that significantly impact functionality */
  HIGH = 'high',
  /** Critical severity - errors that prevent core functionality */
  CRITICAL = 'critical',
}

/**
 * Error categories for domain-specific error handling
 */
export enum ErrorCategory {
  /** Terminal outcome of a retry loop */
  RETRY = 'retry',
  /** Invalid or unreadable configuration */
  CONFIGURATION = 'configuration',
  /** Invalid arguments passed to a constructor or factory */
  VALIDATION = 'validation',
  /** A cancellation signal or deadline fired */
  CANCELLATION = 'cancellation',
  /** Failure of an external command or unit of work */
  EXECUTION = 'execution',
  /** Unknown or uncategorized errors */
  UNKNOWN = 'unknown',
}

/**
 * Options accepted by every {@link RetryKitError}
 */
export interface RetryKitErrorOptions {
  severity?: ErrorSeverity;
  /** Original error that caused this error (error chaining) */
  cause?: Error;
  /** Additional error-specific data */
  data?: Record<string, unknown>;
}

/**
 * Base error class carrying a code, category and severity
 */
export abstract class RetryKitError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly cause: Error | undefined;
  public readonly data: Record<string, unknown> | undefined;

  constructor(message: string, code: string, category: ErrorCategory, options: RetryKitErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.category = category;
    this.severity = options.severity ?? ErrorSeverity.MEDIUM;
    this.cause = options.cause;
    this.data = options.data;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get formatted error information for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      category: this.category,
      ...(this.data && { data: this.data }),
      ...(this.cause && { cause: this.cause.message }),
    };
  }
}

/**
 * Configuration could not be read or failed validation
 */
export class ConfigurationError extends RetryKitError {
  constructor(message: string, options: RetryKitErrorOptions & { code?: string } = {}) {
    super(message, options.code ?? 'CONFIGURATION_ERROR', ErrorCategory.CONFIGURATION, {
      severity: ErrorSeverity.HIGH,
      ...options,
    });
  }
}

/**
 * An argument was out of range or otherwise unusable
 */
export class ValidationError extends RetryKitError {
  constructor(message: string, options: RetryKitErrorOptions & { code?: string } = {}) {
    super(message, options.code ?? 'VALIDATION_ERROR', ErrorCategory.VALIDATION, {
      severity: ErrorSeverity.MEDIUM,
      ...options,
    });
  }
}

/**
 * A unit of work (for example a spawned command) failed
 */
export class ExecutionError extends RetryKitError {
  constructor(message: string, options: RetryKitErrorOptions & { code?: string } = {}) {
    super(message, options.code ?? 'EXECUTION_ERROR', ErrorCategory.EXECUTION, {
      severity: ErrorSeverity.MEDIUM,
      ...options,
    });
  }
}
