/**
 * Common utility functions used throughout the library
 */

import Debug from 'debug';
import { CancelledError, TimeoutError, errorMessage } from '../errors';

const debug = Debug('mediapeer:utils:common');

/**
 * Sleep for a specified number of milliseconds
 * @param ms - The number of milliseconds to sleep
 * @returns A promise that resolves after the specified time
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Attempt to parse JSON with fallback to null
 * @param str - The string to parse
 * @returns The parsed value or null if parsing failed
 */
export function safeJSONParse(str: string): unknown {
  try {
    return JSON.parse(str);
  } catch (err) {
    debug(`JSON parse error: ${errorMessage(err)}`);
    return null;
  }
}

/**
 * Race a promise against a timeout. The timer is cleared once the promise
 * settles, so nothing is left pending on the event loop.
 * @param promise - The promise to race
 * @param timeoutMs - The timeout in milliseconds
 * @param timeoutMessage - The error message for timeout
 * @returns The result of the original promise, or a TimeoutError rejection
 */
export function promiseWithTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  timeoutMessage = 'Operation timed out'
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMessage)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

/**
 * ISO-8601 string for an epoch-millisecond value, null when absent
 */
export function toIsoTime(epochMs: number | undefined): string | null {
  return epochMs === undefined ? null : new Date(epochMs).toISOString();
}

/**
 * Settle with `promise`, or reject with CancelledError as soon as `signal`
 * aborts. The underlying work is not stopped, only no longer awaited.
 */
export function abortable<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  cancelMessage = 'Operation cancelled'
): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new CancelledError(cancelMessage));
    void promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}
