/**
 * Cancellable contexts
 *
 * A context bundles an AbortSignal with the function that fires it, so an
 * object that wants to cancel a long-running operation can keep a single
 * handle instead of an AbortController and a signal. Contexts form a tree:
 * cancelling a parent cancels every child, never the other way round.
 */

import { toError } from '@retrykit/errors';

import {
  CancelledError,
  DeadlineExceededError,
  isContextError,
  type ContextError,
} from './errors.js';
import { setLongTimeout } from './timer.js';

export interface CancelContext {
  /** Fires when the context is cancelled; `reason` is the context error */
  readonly signal: AbortSignal;
  /** Cancel the context and all of its children; later calls are ignored */
  cancel(reason?: unknown): void;
  /** Instant after which the context cancels itself, if any */
  deadline(): Date | undefined;
  /** `undefined` while active, the cancellation error afterwards */
  err(): ContextError | undefined;
  /** Resolves once the context is cancelled */
  done(): Promise<void>;
}

export type ContextParent = AbortSignal | CancelContext;

function isCancelContext(parent: ContextParent): parent is CancelContext {
  return !(parent instanceof AbortSignal);
}

class Context implements CancelContext {
  private readonly controller = new AbortController();
  private readonly deadlineAt: Date | undefined;
  private error: ContextError | undefined;
  private clearTimer: (() => void) | undefined;
  private detachParent: (() => void) | undefined;
  private donePromise: Promise<void> | undefined;

  constructor(parent: ContextParent | undefined, timeoutMs?: number) {
    const parentDeadline = parent && isCancelContext(parent) ? parent.deadline() : undefined;
    const ownDeadline = timeoutMs === undefined ? undefined : new Date(Date.now() + timeoutMs);

    this.deadlineAt =
      parentDeadline && (!ownDeadline || parentDeadline <= ownDeadline)
        ? parentDeadline
        : ownDeadline;

    if (parent) {
      const parentSignal = isCancelContext(parent) ? parent.signal : parent;
      if (parentSignal.aborted) {
        this.finish(Context.fromParent(parentSignal.reason));
        return;
      }
      const onAbort = () => this.finish(Context.fromParent(parentSignal.reason));
      parentSignal.addEventListener('abort', onAbort, { once: true });
      this.detachParent = () => parentSignal.removeEventListener('abort', onAbort);
    }

    if (timeoutMs !== undefined && ownDeadline && this.deadlineAt === ownDeadline) {
      if (timeoutMs <= 0) {
        this.finish(new DeadlineExceededError(ownDeadline));
        return;
      }
      this.clearTimer = setLongTimeout(
        () => this.finish(new DeadlineExceededError(ownDeadline)),
        timeoutMs
      );
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(reason?: unknown): void {
    const cause = reason === undefined ? undefined : toError(reason);
    this.finish(new CancelledError('context cancelled', cause));
  }

  deadline(): Date | undefined {
    return this.deadlineAt;
  }

  err(): ContextError | undefined {
    return this.error;
  }

  done(): Promise<void> {
    if (!this.donePromise) {
      this.donePromise = this.signal.aborted
        ? Promise.resolve()
        : new Promise<void>(resolve => {
            this.signal.addEventListener('abort', () => resolve(), { once: true });
          });
    }
    return this.donePromise;
  }

  private finish(error: ContextError): void {
    if (this.error) {
      return;
    }
    this.error = error;

    this.clearTimer?.();
    this.clearTimer = undefined;
    this.detachParent?.();
    this.detachParent = undefined;

    this.controller.abort(error);
  }

  /**
   * Children report the parent's own error; a bare AbortSignal's reason becomes the cause
   */
  private static fromParent(reason: unknown): ContextError {
    if (isContextError(reason)) {
      return reason;
    }
    const cause = reason === undefined ? undefined : toError(reason);
    return new CancelledError('parent signal aborted', cause);
  }
}

/**
 * Create a context that is cancelled by `cancel()` or when `parent` is
 */
export function createCancelContext(parent?: ContextParent): CancelContext {
  return new Context(parent);
}

/**
 * Create a context that also cancels itself `timeoutMs` after creation.
 * An earlier parent deadline takes precedence.
 */
export function withTimeout(timeoutMs: number, parent?: ContextParent): CancelContext {
  return new Context(parent, timeoutMs);
}

/**
 * Root context: only an explicit `cancel()` ends it
 */
export function background(): CancelContext {
  return new Context(undefined);
}

/**
 * Accept either form of cancellation source where a signal is needed
 */
export function toSignal(source: ContextParent): AbortSignal {
  return isCancelContext(source) ? source.signal : source;
}
