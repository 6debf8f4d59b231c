export {
  background,
  createCancelContext,
  toSignal,
  withTimeout,
  type CancelContext,
  type ContextParent,
} from './context.js';

export { CancelledError, DeadlineExceededError, isContextError, type ContextError } from './errors.js';

export { MAX_TIMEOUT_MS, setLongTimeout } from './timer.js';
