import { CancelledError } from './errors';

/**
 * Time source injected into the coordinator, transfer client and database
 */
export interface Clock {
  now(): number;
  /** Resolves after `ms`, rejects with CancelledError if `signal` aborts first. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

function abortedError(signal: AbortSignal): CancelledError {
  return new CancelledError({
    message: 'Sleep aborted',
    cause: signal.reason,
  });
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortedError(signal));
        return;
      }

      const onAbort = () => {
        clearTimeout(timer);
        if (signal) reject(abortedError(signal));
      };

      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  },
};
