/**
 * Timers
 */

import { RequestCancelledError } from '../errors.js';

/**
 * Sleep function signature, injectable where code waits.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Sleep for a specified duration without blocking other work.
 *
 * Rejects with RequestCancelledError as soon as `signal` aborts, clearing
 * the pending timer.
 *
 * @example
 * // Wait with exponential backoff
 * await sleep(baseDelay * Math.pow(2, attempt), controller.signal);
 */
export const sleep: SleepFn = (ms, signal) => {
  if (signal?.aborted) {
    return Promise.reject(new RequestCancelledError());
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RequestCancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
