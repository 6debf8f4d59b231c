/**
 * Keyed registry of background retry loops
 *
 * At most one loop runs per key: asking for a key that is already retrying
 * returns the running Future instead of starting another loop. A Future is
 * removed from the registry when its loop ends; callers holding it still see
 * the final state.
 */

import type { ContextParent } from '@retrykit/cancel';
import { toError } from '@retrykit/errors';
import type { Logger } from '@retrykit/logging';

import type { BackOff } from './backoff.js';
import { isStopSignal } from './errors.js';
import { until, type RetryFunc } from './until.js';

/**
 * Handle on one background retry loop. Never rejects.
 */
export class Future {
  private lastError: Error | undefined;
  private running = true;
  private readonly settle: () => void;

  /** Resolves once the loop has ended, whatever the outcome */
  public readonly done: Promise<void>;

  constructor(public readonly key: string) {
    let resolveDone: () => void = () => undefined;
    this.done = new Promise<void>(resolve => {
      resolveDone = resolve;
    });
    this.settle = resolveDone;
  }

  /**
   * Most recent failure while retrying, the terminal RetryError after a
   * failed loop, `undefined` after success
   */
  get err(): Error | undefined {
    return this.lastError;
  }

  get retrying(): boolean {
    return this.running;
  }

  wait(): Promise<void> {
    return this.done;
  }

  /** @internal */
  recordFailure(error: Error): void {
    if (this.running) {
      this.lastError = error;
    }
  }

  /** @internal */
  finish(error: Error | undefined): void {
    if (!this.running) {
      return;
    }
    this.lastError = error;
    this.running = false;
    this.settle();
  }
}

export interface RetryAsyncOptions {
  logger?: Logger;
}

export class RetryAsync {
  private readonly futures = new Map<string, Future>();
  private readonly logger: Logger | undefined;

  constructor(options: RetryAsyncOptions = {}) {
    this.logger = options.logger;
  }

  /**
   * Start retrying `fn` in the background under `key`, or return the Future
   * already retrying under that key
   */
  async(key: string, ctx: ContextParent, backOff: BackOff, fn: RetryFunc<unknown>): Future {
    const existing = this.futures.get(key);
    if (existing?.retrying) {
      this.logger?.debug(`Retry loop '${key}' already running`);
      return existing;
    }

    const future = new Future(key);
    this.futures.set(key, future);
    this.logger?.debug(`Starting retry loop '${key}'`);

    const tracked: RetryFunc<unknown> = async (signal, attempt) => {
      try {
        return await fn(signal, attempt);
      } catch (error) {
        future.recordFailure(isStopSignal(error) ? error.error : toError(error));
        throw error;
      }
    };

    void until(ctx, backOff, tracked, { logger: this.logger }).then(
      () => this.complete(future, undefined),
      (error: unknown) => this.complete(future, toError(error))
    );

    return future;
  }

  /**
   * Number of loops currently tracked
   */
  len(): number {
    return this.futures.size;
  }

  /**
   * Snapshot of the latest error of every tracked loop that has one
   */
  errs(): Error[] {
    const errors: Error[] = [];
    for (const future of this.futures.values()) {
      if (future.err) {
        errors.push(future.err);
      }
    }
    return errors;
  }

  /**
   * Resolves once every loop tracked at call time has ended
   */
  async wait(): Promise<void> {
    await Promise.all([...this.futures.values()].map(future => future.done));
  }

  get(key: string): Future | undefined {
    return this.futures.get(key);
  }

  keys(): string[] {
    return [...this.futures.keys()];
  }

  private complete(future: Future, error: Error | undefined): void {
    future.finish(error);
    if (this.futures.get(future.key) === future) {
      this.futures.delete(future.key);
    }

    if (error) {
      this.logger?.warn(`Retry loop '${future.key}' gave up`, { error: error.message });
    } else {
      this.logger?.debug(`Retry loop '${future.key}' succeeded`);
    }
  }
}

export function createRetryAsync(options?: RetryAsyncOptions): RetryAsync {
  return new RetryAsync(options);
}
