/**
 * Largest delay a single Node.js timer accepts; longer delays fire after 1ms
 */
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

/**
 * `setTimeout` for delays of any length: waits longer than
 * `MAX_TIMEOUT_MS` are split into chunks and the timer is re-armed.
 *
 * @returns a function that clears whichever timer is pending
 */
export function setLongTimeout(callback: () => void, ms: number): () => void {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const arm = (remaining: number) => {
    timer =
      remaining > MAX_TIMEOUT_MS
        ? setTimeout(() => arm(remaining - MAX_TIMEOUT_MS), MAX_TIMEOUT_MS)
        : setTimeout(callback, remaining);
  };
  arm(ms);

  return () => clearTimeout(timer);
}
