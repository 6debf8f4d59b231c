/**
 * Retry loop: call a function until it succeeds, the backoff policy gives up,
 * the function asks to stop, or the caller cancels.
 */

import { toSignal, type ContextParent } from '@retrykit/cancel';
import { toError } from '@retrykit/errors';
import type { Logger } from '@retrykit/logging';

import type { BackOff } from './backoff.js';
import { isStopSignal, RetryError, RetryReason } from './errors.js';
import { sleep } from './sleep.js';

/**
 * Unit of work retried by `until`. `attempt` starts at 1. Throw (or reject)
 * to fail the attempt; throw `stop(error)` to fail without retrying.
 */
export type RetryFunc<T> = (signal: AbortSignal, attempt: number) => T | Promise<T>;

export interface UntilOptions {
  logger?: Logger;
  /** Called after each failed attempt that will be retried, before the wait */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

/**
 * Run `fn` until it succeeds.
 *
 * The loop works on a clone of `backOff`, so the caller's policy is never
 * advanced. An attempt that is already running is never interrupted; the
 * signal is only observed between attempts (and passed to `fn`).
 *
 * @returns the value of the first successful attempt
 * @throws RetryError when the loop gives up
 */
export async function until<T>(
  ctx: ContextParent,
  backOff: BackOff,
  fn: RetryFunc<T>,
  options: UntilOptions = {}
): Promise<T> {
  const { logger, onRetry } = options;
  const signal = toSignal(ctx);
  const policy = backOff.clone();

  for (let attempt = 1; ; attempt++) {
    let lastError: Error;
    try {
      return await fn(signal, attempt);
    } catch (error) {
      if (isStopSignal(error)) {
        logger?.debug(`Attempt ${attempt} stopped retrying`, { error: error.error.message });
        throw new RetryError(attempt, RetryReason.STOPPED, error.error);
      }
      lastError = toError(error);
    }

    const { delayMs, exhausted } = policy.next(attempt);
    if (exhausted) {
      logger?.debug(`Attempt ${attempt} failed, no attempts left`, { error: lastError.message });
      throw new RetryError(attempt, RetryReason.ATTEMPTS_EXHAUSTED, lastError);
    }

    logger?.debug(`Attempt ${attempt} failed, retrying in ${delayMs}ms`, {
      error: lastError.message,
    });
    onRetry?.(lastError, attempt, delayMs);

    if (!(await sleep(delayMs, signal))) {
      throw new RetryError(attempt, RetryReason.CANCELLED, lastError);
    }
  }
}
