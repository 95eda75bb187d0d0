/**
 * Timeout and cancellation helpers for the suspension points of a request
 * (cache lookup, retrieval, LLM call).
 */

import { CancelledError, TimeoutError } from '../error/tutor-error.js';

export interface TimeoutOptions {
  /** Step name used in the TimeoutError */
  step: string;
  timeoutMs: number;
  /** Parent signal; aborting it cancels the step */
  signal?: AbortSignal;
}

/**
 * Execute with timeout.
 *
 * `execute` receives a signal that aborts when the timeout fires or the
 * parent signal aborts, so downstream I/O can stop cooperatively.
 */
export async function withTimeout<T>(
  execute: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions,
): Promise<T> {
  const { step, timeoutMs, signal: parent } = options;

  if (parent?.aborted) {
    throw new CancelledError(step);
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const onParentAbort = () => {
      cleanup();
      controller.abort();
      reject(new CancelledError(step));
    };

    const timer = setTimeout(() => {
      cleanup();
      controller.abort();
      reject(new TimeoutError(step, timeoutMs));
    }, timeoutMs);

    const cleanup = () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    };

    parent?.addEventListener('abort', onParentAbort, { once: true });

    execute(controller.signal)
      .then(result => {
        cleanup();
        resolve(result);
      })
      .catch((error: unknown) => {
        cleanup();
        reject(error);
      });
  });
}

/**
 * Sleep that can be interrupted by a signal
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('sleep'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError('sleep'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
