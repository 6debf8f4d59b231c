/**
 * Backoff policies for the retry loop
 *
 * A policy's configuration is immutable once constructed; only the retry
 * counter changes. `until` works on a `clone()` of the policy it is given, so
 * one policy value can be shared by any number of concurrent loops.
 */

import { ValidationError } from '@retrykit/errors';

/**
 * Decision returned for a failed attempt
 */
export interface BackOffStep {
  /** Milliseconds to wait before the next attempt */
  readonly delayMs: number;
  /** True when no further attempt may be made */
  readonly exhausted: boolean;
}

/**
 * Plain description of a policy, as accepted by `backOffFromConfig`
 */
export type BackOffConfig =
  | { type: 'interval'; interval: number }
  | { type: 'attempts'; attempts: number; interval: number }
  | { type: 'exponential'; min: number; max: number; factor: number; attempts: number };

export interface BackOff {
  /**
   * Decide the delay after failed attempt `attempt` (1-based) and whether the
   * budget is spent. Advances the policy's own retry counter.
   */
  next(attempt: number): BackOffStep;
  /** Retry counter, zero after construction, `clone()` or `reset()` */
  numRetries(): number;
  reset(): void;
  /** Same configuration, fresh counter */
  clone(): BackOff;
  toConfig(): BackOffConfig;
}

function assertDelay(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(
      `${name} must be a non-negative number of milliseconds, got ${value}`,
      { code: 'INVALID_BACKOFF' }
    );
  }
}

function assertCount(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError(`${name} must be an integer >= ${min}, got ${value}`, {
      code: 'INVALID_BACKOFF',
    });
  }
}

abstract class CountingBackOff implements BackOff {
  protected retries = 0;

  abstract next(attempt: number): BackOffStep;
  abstract clone(): BackOff;
  abstract toConfig(): BackOffConfig;

  numRetries(): number {
    return this.retries;
  }

  reset(): void {
    this.retries = 0;
  }
}

/**
 * Fixed delay, unbounded attempts. Only cancellation ends the loop.
 */
export class IntervalBackOff extends CountingBackOff {
  constructor(public readonly intervalMs: number) {
    super();
    assertDelay('interval', intervalMs);
  }

  next(_attempt: number): BackOffStep {
    this.retries++;
    return { delayMs: this.intervalMs, exhausted: false };
  }

  clone(): IntervalBackOff {
    return new IntervalBackOff(this.intervalMs);
  }

  toConfig(): BackOffConfig {
    return { type: 'interval', interval: this.intervalMs };
  }
}

/**
 * Fixed delay, at most `attempts` attempts in total
 */
export class AttemptsBackOff extends CountingBackOff {
  constructor(
    public readonly attempts: number,
    public readonly intervalMs: number
  ) {
    super();
    assertCount('attempts', attempts, 1);
    assertDelay('interval', intervalMs);
  }

  next(_attempt: number): BackOffStep {
    this.retries++;
    return { delayMs: this.intervalMs, exhausted: this.retries >= this.attempts };
  }

  clone(): AttemptsBackOff {
    return new AttemptsBackOff(this.attempts, this.intervalMs);
  }

  toConfig(): BackOffConfig {
    return { type: 'attempts', attempts: this.attempts, interval: this.intervalMs };
  }
}

export interface ExponentialBackOffOptions {
  /** Base delay in milliseconds */
  min: number;
  /** Maximum delay cap in milliseconds */
  max: number;
  /** Growth factor per attempt, defaults to 2 */
  factor?: number;
  /** Retries allowed after the first attempt; 0 means unbounded */
  attempts?: number;
}

/**
 * Delay after attempt k is `min(max, min * factor^k)`
 */
export class ExponentialBackOff extends CountingBackOff {
  public readonly min: number;
  public readonly max: number;
  public readonly factor: number;
  public readonly attempts: number;

  constructor(options: ExponentialBackOffOptions) {
    super();
    this.min = options.min;
    this.max = options.max;
    this.factor = options.factor ?? 2;
    this.attempts = options.attempts ?? 0;

    assertDelay('min', this.min);
    assertDelay('max', this.max);
    assertCount('attempts', this.attempts, 0);
    if (this.min > this.max) {
      throw new ValidationError(`min (${this.min}) must not exceed max (${this.max})`, {
        code: 'INVALID_BACKOFF',
      });
    }
    if (!Number.isFinite(this.factor) || this.factor < 1) {
      throw new ValidationError(`factor must be a number >= 1, got ${this.factor}`, {
        code: 'INVALID_BACKOFF',
      });
    }
  }

  next(attempt: number): BackOffStep {
    if (this.attempts !== 0 && this.retries >= this.attempts) {
      return { delayMs: 0, exhausted: true };
    }
    this.retries++;
    return { delayMs: this.delayFor(attempt), exhausted: false };
  }

  /**
   * Delay for a given attempt without touching the counter
   */
  delayFor(attempt: number): number {
    if (this.min === 0) {
      return 0;
    }
    const delay = this.min * this.factor ** attempt;
    // min * factor^attempt may overflow to Infinity
    return Number.isFinite(delay) ? Math.min(this.max, delay) : this.max;
  }

  clone(): ExponentialBackOff {
    return new ExponentialBackOff({
      min: this.min,
      max: this.max,
      factor: this.factor,
      attempts: this.attempts,
    });
  }

  toConfig(): BackOffConfig {
    return {
      type: 'exponential',
      min: this.min,
      max: this.max,
      factor: this.factor,
      attempts: this.attempts,
    };
  }
}

/**
 * Retry every `intervalMs` until cancelled
 */
export function interval(intervalMs: number): IntervalBackOff {
  return new IntervalBackOff(intervalMs);
}

/**
 * Retry every `intervalMs`, giving up after `count` attempts
 */
export function attempts(count: number, intervalMs: number): AttemptsBackOff {
  return new AttemptsBackOff(count, intervalMs);
}

export function exponential(options: ExponentialBackOffOptions): ExponentialBackOff {
  return new ExponentialBackOff(options);
}
