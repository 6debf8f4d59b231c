import { ErrorCategory, ErrorSeverity, RetryKitError, toError } from '@retrykit/errors';

/**
 * Why a retry loop gave up
 */
export enum RetryReason {
  /** The cancellation signal fired while waiting between attempts */
  CANCELLED = 'cancelled',
  /** The backoff policy refused another attempt */
  ATTEMPTS_EXHAUSTED = 'attempts_exhausted',
  /** The work function threw a stop signal */
  STOPPED = 'stopped',
}

const REASON_TEXT: Record<RetryReason, string> = {
  [RetryReason.CANCELLED]: 'context cancelled',
  [RetryReason.ATTEMPTS_EXHAUSTED]: 'attempts exhausted',
  [RetryReason.STOPPED]: 'retry stopped',
};

/**
 * Terminal outcome of a retry loop. `cause` is the last error thrown by the
 * work function, or the error wrapped by `stop()`.
 */
export class RetryError extends RetryKitError {
  public readonly attempts: number;
  public readonly reason: RetryReason;
  public readonly cause: Error;

  constructor(attempts: number, reason: RetryReason, cause: Error) {
    super(
      `on attempt '${attempts}'; ${REASON_TEXT[reason]}: ${cause.message}`,
      `RETRY_${reason.toUpperCase()}`,
      ErrorCategory.RETRY,
      {
        severity: reason === RetryReason.CANCELLED ? ErrorSeverity.LOW : ErrorSeverity.MEDIUM,
        cause,
        data: { attempts, reason },
      }
    );
    this.attempts = attempts;
    this.reason = reason;
    this.cause = cause;
  }
}

/**
 * Marks an error as non-retryable. Throw `stop(error)` from a work function
 * to end the loop after the current attempt.
 */
export class StopSignal extends Error {
  public readonly error: Error;

  constructor(error: Error) {
    super(error.message, { cause: error });
    this.name = 'StopSignal';
    this.error = error;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function stop(error: unknown): StopSignal {
  return error instanceof StopSignal ? error : new StopSignal(toError(error));
}

export function isStopSignal(value: unknown): value is StopSignal {
  return value instanceof StopSignal;
}

export function isRetryError(value: unknown): value is RetryError {
  return value instanceof RetryError;
}
