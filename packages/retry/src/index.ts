/**
 * Retry module - run work until it succeeds under a backoff policy
 *
 * Features:
 * - Interval, attempt-limited and exponential backoff policies
 * - Cancellation through AbortSignal or CancelContext
 * - Non-retryable failures via stop()
 * - Keyed registry of background retry loops
 * - Policies loaded from YAML configuration
 */

export {
  AttemptsBackOff,
  ExponentialBackOff,
  IntervalBackOff,
  attempts,
  exponential,
  interval,
  type BackOff,
  type BackOffConfig,
  type BackOffStep,
  type ExponentialBackOffOptions,
} from './backoff.js';

export { RetryError, RetryReason, StopSignal, isRetryError, isStopSignal, stop } from './errors.js';

export { sleep } from './sleep.js';

export { until, type RetryFunc, type UntilOptions } from './until.js';

export { Future, RetryAsync, createRetryAsync, type RetryAsyncOptions } from './async.js';

export {
  BackOffConfigSchema,
  RetryConfigSchema,
  backOffFromConfig,
  loadRetryConfig,
  type RetryConfig,
} from './config.js';
