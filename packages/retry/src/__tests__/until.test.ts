/**
 * Tests for the retry loop
 */

import { background, createCancelContext, withTimeout } from '@retrykit/cancel';
import { rootCause } from '@retrykit/errors';
import { LoggerFactory } from '@retrykit/logging';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import {
  RetryError,
  RetryReason,
  attempts,
  exponential,
  interval,
  isRetryError,
  sleep,
  stop,
  until,
} from '../index.js';

const errCause = new Error('cause of error');
const DAY = 24 * 60 * 60 * 1000;

function expectRetryError(value: unknown): RetryError {
  if (!isRetryError(value)) {
    throw new Error(`expected a RetryError, got ${String(value)}`);
  }
  return value;
}

describe('until', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should retry on an interval until cancelled', async () => {
    const ctx = withTimeout(195);
    const outcome = until(ctx, interval(10), () => {
      throw errCause;
    }).catch((error: unknown) => error);

    await vi.advanceTimersByTimeAsync(200);
    const err = expectRetryError(await outcome);

    expect(err.attempts).toBe(20);
    expect(err.reason).toBe(RetryReason.CANCELLED);
    expect(err.message).toBe("on attempt '20'; context cancelled: cause of error");
    expect(rootCause(err)).toBe(errCause);
  });

  it('should let the deadline win a tie with the retry delay', async () => {
    const ctx = withTimeout(200);
    const fn = vi.fn(() => {
      throw errCause;
    });
    const outcome = until(ctx, interval(10), fn).catch((error: unknown) => error);

    await vi.advanceTimersByTimeAsync(200);
    const err = expectRetryError(await outcome);

    // attempt 20 runs at 190ms; its delay and the deadline both end at 200ms
    expect(fn).toHaveBeenCalledTimes(20);
    expect(err.attempts).toBe(20);
    expect(err.reason).toBe(RetryReason.CANCELLED);
  });

  it('should wait out delays longer than a single timer allows', async () => {
    const fn = vi.fn(() => {
      throw errCause;
    });
    const outcome = until(background(), attempts(3, 30 * DAY), fn).catch(
      (error: unknown) => error
    );

    await vi.advanceTimersByTimeAsync(29 * DAY);
    expect(fn).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(31 * DAY);
    const err = expectRetryError(await outcome);

    expect(fn).toHaveBeenCalledTimes(3);
    expect(err.reason).toBe(RetryReason.ATTEMPTS_EXHAUSTED);
  });

  it('should not spin once exponential delays pass the timer limit', async () => {
    const backOff = exponential({ min: 1, max: 30 * DAY, factor: 1e10 });
    const fn = vi.fn(() => {
      throw errCause;
    });
    const outcome = until(withTimeout(300), backOff, fn).catch((error: unknown) => error);

    await vi.advanceTimersByTimeAsync(300);
    const err = expectRetryError(await outcome);

    expect(fn).toHaveBeenCalledTimes(1);
    expect(err.reason).toBe(RetryReason.CANCELLED);
  });

  it('should return the first successful value without waiting', async () => {
    const fn = vi.fn().mockResolvedValue('done');

    await expect(until(withTimeout(200), interval(10), fn)).resolves.toBe('done');

    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(expect.any(AbortSignal), 1);
  });

  it('should stop calling after a success', async () => {
    let calls = 0;
    const outcome = until(background(), interval(10), (_signal, attempt) => {
      calls++;
      if (attempt < 3) {
        throw new Error(`failed attempt '${attempt}'`);
      }
      return attempt * 10;
    });

    await vi.advanceTimersByTimeAsync(100);

    await expect(outcome).resolves.toBe(30);
    expect(calls).toBe(3);
  });

  it('should give up when attempts are exhausted', async () => {
    const outcome = until(background(), attempts(10, 10), (_signal, attempt) => {
      throw new Error(`failed attempt '${attempt}'`);
    }).catch((error: unknown) => error);

    await vi.runAllTimersAsync();
    const err = expectRetryError(await outcome);

    expect(err.reason).toBe(RetryReason.ATTEMPTS_EXHAUSTED);
    expect(err.message).toBe("on attempt '10'; attempts exhausted: failed attempt '10'");
  });

  it('should stop on a stop signal without retrying', async () => {
    const fn = vi.fn((_signal: AbortSignal, attempt: number) => {
      throw stop(new Error(`failed attempt '${attempt}'`));
    });

    const err = expectRetryError(
      await until(background(), attempts(10, 10), fn).catch((error: unknown) => error)
    );

    expect(fn).toHaveBeenCalledTimes(1);
    expect(err.attempts).toBe(1);
    expect(err.reason).toBe(RetryReason.STOPPED);
    expect(err.message).toBe("on attempt '1'; retry stopped: failed attempt '1'");
    expect(err.cause.message).toBe("failed attempt '1'");
  });

  it('should exhaust exponential backoff after attempts retries', async () => {
    const backOff = exponential({ min: 1, max: 100, factor: 2, attempts: 10 });
    const outcome = until(background(), backOff, (_signal, attempt) => {
      throw new Error(`failed attempt '${attempt}'`);
    }).catch((error: unknown) => error);

    await vi.runAllTimersAsync();
    const err = expectRetryError(await outcome);

    expect(err.message).toBe("on attempt '11'; attempts exhausted: failed attempt '11'");
  });

  it('should cancel exponential backoff at the deadline', async () => {
    const backOff = exponential({ min: 1, max: 100, factor: 2 });
    const outcome = until(withTimeout(100), backOff, (_signal, attempt) => {
      throw new Error(`failed attempt '${attempt}'`);
    }).catch((error: unknown) => error);

    await vi.advanceTimersByTimeAsync(150);
    const err = expectRetryError(await outcome);

    expect(err.message).toBe("on attempt '6'; context cancelled: failed attempt '6'");
  });

  it('should report cancellation after one attempt on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn().mockRejectedValue(errCause);

    const err = expectRetryError(
      await until(controller.signal, interval(10), fn).catch((error: unknown) => error)
    );

    expect(fn).toHaveBeenCalledTimes(1);
    expect(err.attempts).toBe(1);
    expect(err.reason).toBe(RetryReason.CANCELLED);
  });

  it('should not interrupt an attempt that is already running', async () => {
    const ctx = createCancelContext();
    const outcome = until(ctx, interval(10), async () => {
      await new Promise(resolve => setTimeout(resolve, 50));
      return 'finished';
    });

    ctx.cancel();
    await vi.advanceTimersByTimeAsync(50);

    await expect(outcome).resolves.toBe('finished');
  });

  it('should call onRetry before each wait', async () => {
    const onRetry = vi.fn();
    const outcome = until(
      background(),
      attempts(3, 10),
      () => {
        throw errCause;
      },
      { onRetry }
    ).catch((error: unknown) => error);

    await vi.runAllTimersAsync();
    expectRetryError(await outcome);

    expect(onRetry.mock.calls).toEqual([
      [errCause, 1, 10],
      [errCause, 2, 10],
    ]);
  });

  it('should log failed attempts at debug level', async () => {
    const { logger, transport } = LoggerFactory.createMemoryLogger('retry');
    const outcome = until(
      background(),
      attempts(2, 10),
      () => {
        throw errCause;
      },
      { logger }
    ).catch((error: unknown) => error);

    await vi.runAllTimersAsync();
    expectRetryError(await outcome);

    expect(transport.getMessages()).toEqual([
      'Attempt 1 failed, retrying in 10ms',
      'Attempt 2 failed, no attempts left',
    ]);
  });

  it('should wrap non-error rejections', async () => {
    const err = expectRetryError(
      await until(background(), attempts(1, 10), () => Promise.reject('plain string')).catch(
        (error: unknown) => error
      )
    );

    expect(err.cause).toBeInstanceOf(Error);
    expect(err.cause.message).toBe('plain string');
  });

  it('should not advance a policy shared by concurrent loops', async () => {
    const backOff = exponential({ min: 1, max: 100, factor: 2 });
    const ctx = withTimeout(100);

    const outcomes = Array.from({ length: 10 }, () =>
      until(ctx, backOff, (_signal, attempt) => {
        throw new Error(`failed attempt '${attempt}'`);
      }).catch((error: unknown) => error)
    );

    await vi.advanceTimersByTimeAsync(150);
    const errors = (await Promise.all(outcomes)).map(expectRetryError);

    expect(errors.map(err => err.attempts)).toEqual(Array.from({ length: 10 }, () => 6));
    expect(backOff.numRetries()).toBe(0);
  });
});

describe('sleep', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve true once a long delay has fully elapsed', async () => {
    let elapsed: boolean | undefined;
    void sleep(30 * DAY).then(value => {
      elapsed = value;
    });

    await vi.advanceTimersByTimeAsync(30 * DAY - 1);
    expect(elapsed).toBeUndefined();

    await vi.advanceTimersByTimeAsync(1);
    expect(elapsed).toBe(true);
  });

  it('should resolve false and release its timer when the signal fires', async () => {
    const controller = new AbortController();
    const pending = sleep(30 * DAY, controller.signal);

    await vi.advanceTimersByTimeAsync(26 * DAY);
    controller.abort();

    await expect(pending).resolves.toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });
});
