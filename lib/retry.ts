import { systemClock, type Clock } from './clock';
import { classifyError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('retry');

export interface BackoffOptions {
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  /** Source of jitter in [0, 1). Injected for deterministic tests. */
  random?: () => number;
}

/**
 * Delay policy between attempts. `attempt` is zero-based: the delay before
 * the first retry is `delayFor(0)`.
 */
export interface BackoffPolicy {
  delayFor(attempt: number): number;
}

/**
 * Calculates delay with exponential backoff and jitter
 */
export function calculateDelay(
  attempt: number,
  initialDelay: number,
  maxDelay: number,
  backoffMultiplier: number,
  random: () => number = Math.random
): number {
  // initialDelay * (backoffMultiplier ^ attempt)
  const exponentialDelay = initialDelay * Math.pow(backoffMultiplier, attempt);

  const cappedDelay = Math.min(exponentialDelay, maxDelay);

  // Jitter between 0% and 100% of the capped delay
  const jitter = cappedDelay * random();

  return Math.floor(cappedDelay + jitter);
}

export function createBackoffPolicy(options: BackoffOptions): BackoffPolicy {
  const random = options.random ?? Math.random;
  return {
    delayFor: attempt =>
      calculateDelay(
        attempt,
        options.initialDelay,
        options.maxDelay,
        options.backoffMultiplier,
        random
      ),
  };
}

export interface RetryOptions {
  maxRetries: number;
  backoff: BackoffPolicy;
  clock?: Clock;
  signal?: AbortSignal;
  onRetry?: (error: Error, attempt: number, delay: number) => void;
  shouldRetry?: (error: Error) => boolean;
}

function isRetryableError(error: Error): boolean {
  return classifyError(error).retryable;
}

/**
 * Retries an async operation with exponential backoff
 *
 * @param fn - receives the zero-based attempt number
 * @returns The result of the successful operation
 * @throws The last error if all retries are exhausted, or at once when the
 *   error is not retryable or the signal aborts
 *
 * @example
 * ```ts
 * const view = await retryWithBackoff(() => api.getSubmission(id), {
 *   maxRetries: 3,
 *   backoff: createBackoffPolicy(config.retry),
 * });
 * ```
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const clock = options.clock ?? systemClock;
  const shouldRetry = options.shouldRetry ?? isRetryableError;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      // If the operation was explicitly aborted, don't retry
      if (lastError.name === 'AbortError' || options.signal?.aborted) {
        logger.debug('Operation aborted, not retrying', {
          error: lastError.message,
        });
        throw lastError;
      }

      if (!shouldRetry(lastError)) {
        logger.debug('Error is not retryable, throwing immediately', {
          error: lastError.message,
          attempt,
        });
        throw lastError;
      }

      if (attempt >= options.maxRetries) {
        logger.warn('Max retries exhausted', {
          error: lastError.message,
          attempts: attempt + 1,
        });
        throw lastError;
      }

      const delay = options.backoff.delayFor(attempt);

      logger.info('Retrying operation after error', {
        error: lastError.message,
        attempt: attempt + 1,
        maxRetries: options.maxRetries,
        delayMs: delay,
      });

      options.onRetry?.(lastError, attempt + 1, delay);

      await clock.sleep(delay, options.signal);
    }
  }
}
