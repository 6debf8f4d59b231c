import { ErrorCategory, ErrorSeverity, RetryKitError } from '@retrykit/errors';

/**
 * Reported by a context that was cancelled explicitly or through its parent
 */
export class CancelledError extends RetryKitError {
  public readonly reason = 'cancelled' as const;

  constructor(message = 'context cancelled', cause?: Error) {
    super(message, 'CONTEXT_CANCELLED', ErrorCategory.CANCELLATION, {
      severity: ErrorSeverity.LOW,
      ...(cause && { cause }),
    });
  }
}

/**
 * Reported by a context whose deadline passed
 */
export class DeadlineExceededError extends RetryKitError {
  public readonly reason = 'deadline' as const;

  constructor(public readonly deadline: Date) {
    super(
      `context deadline exceeded at ${deadline.toISOString()}`,
      'DEADLINE_EXCEEDED',
      ErrorCategory.CANCELLATION,
      { severity: ErrorSeverity.LOW }
    );
  }
}

export type ContextError = CancelledError | DeadlineExceededError;

export function isContextError(value: unknown): value is ContextError {
  return value instanceof CancelledError || value instanceof DeadlineExceededError;
}
