/**
 * Timeout protection for async work.
 *
 * The callee receives an AbortSignal that fires when the deadline passes, so
 * an HTTP request underneath is cancelled rather than left running.
 */

import { TimeoutError } from './errors.js';

export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);

    fn(controller.signal)
      .then(result => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch(err => {
        clearTimeout(timer);
        reject(err);
      });
  });
}
