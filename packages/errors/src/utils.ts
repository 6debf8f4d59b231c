/**
 * Error utilities and helper functions
 */

import { RetryKitError } from './types.js';

/**
 * Normalize any thrown value to an Error instance
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value));
}

/**
 * Follow the `cause` chain down to the innermost Error
 */
export function rootCause(error: Error): Error {
  let current = error;
  const seen = new Set<Error>([current]);

  while (current.cause instanceof Error && !seen.has(current.cause)) {
    current = current.cause;
    seen.add(current);
  }

  return current;
}

/**
 * Extract loggable information from any error
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (error instanceof RetryKitError) {
    return error.toLogFormat();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    error: String(error),
  };
}
