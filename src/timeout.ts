import { TimeoutError } from './error.js';

/** Longer delays overflow and fire at once */
const MAX_TIMER_DELAY = 0x7fffffff;

/**
 * Race a promise against a deadline. The underlying operation is not
 * cancelled; callers decide what a late result means.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  description: string,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(`${description} timed out after ${timeoutMs}ms`, { timeoutMs }));
    }, Math.min(timeoutMs, MAX_TIMER_DELAY));

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
