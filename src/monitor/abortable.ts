import { setTimeout as delay } from 'node:timers/promises';
import { CancelledError } from './errors.js';

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError(undefined, { cause: signal.reason });
  }
}

/**
 * Settle with `work` or reject with CancelledError as soon as `signal`
 * aborts, whichever comes first. The underlying work is not stopped; its
 * late result is dropped.
 */
export function abortable<T>(work: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return work;
  if (signal.aborted) {
    work.catch(() => undefined);
    return Promise.reject(new CancelledError(undefined, { cause: signal.reason }));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new CancelledError(undefined, { cause: signal.reason }));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/** Sleep that ends early with CancelledError when `signal` aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new CancelledError(undefined, { cause: signal.reason });
    }
    throw error;
  }
}
