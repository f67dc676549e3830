import { CancelledError, TimeoutError } from './errors';

export interface WaitOptions {
  /** No timeout when omitted */
  timeoutMs?: number;
  signal?: AbortSignal;
  /** What the timeout is waiting for, used in the TimeoutError message */
  label?: string;
}

/**
 * The one suspension primitive of the streaming client.
 *
 * With a promise: settles with it, or rejects with TimeoutError once
 * `timeoutMs` passes, or with CancelledError when `signal` aborts.
 * With `null`: a cancellable sleep that resolves after `timeoutMs`.
 *
 * Timers and abort listeners are always removed before settling.
 */
export function waitWithTimeout<T>(promise: Promise<T>, options: WaitOptions): Promise<T>;
export function waitWithTimeout(promise: null, options: WaitOptions & { timeoutMs: number }): Promise<void>;
export function waitWithTimeout<T>(promise: Promise<T> | null, options: WaitOptions): Promise<T | void> {
  const { timeoutMs, signal, label = 'operation' } = options;

  return new Promise<T | void>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const cleanup = () => {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      signal?.removeEventListener('abort', onAbort);
    };

    function onAbort() {
      cleanup();
      reject(new CancelledError());
    }

    // Attached first so a late rejection of `promise` is always observed
    promise?.then(
      value => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      },
    );

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        cleanup();
        if (promise === null) {
          resolve();
        } else {
          reject(new TimeoutError(`Timed out after ${timeoutMs} ms waiting for ${label}`, timeoutMs));
        }
      }, timeoutMs);
    }
  });
}

/** Cancellable delay */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return waitWithTimeout(null, { timeoutMs: ms, signal });
}
