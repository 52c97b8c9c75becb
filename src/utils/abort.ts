// src/utils/abort.ts

import { RequestCancelledError } from './errors';

/**
 * Wait for `promise` unless `signal` aborts first. Aborting only ends this
 * wait; the underlying promise keeps running for its other consumers.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new RequestCancelledError());
    };

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    // Handlers are always attached, so a late rejection is never unhandled
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RequestCancelledError();
  }
}
