import { setLongTimeout } from '@retrykit/cancel';

/**
 * Wait `ms` milliseconds unless `signal` fires first.
 *
 * @returns true when the delay elapsed, false when the signal won
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise<boolean>(resolve => {
    const onAbort = () => {
      clearTimer();
      resolve(false);
    };

    const clearTimer = setLongTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
