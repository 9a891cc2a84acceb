import { describe, it, expect, vi } from 'vitest';
import { ManualClock } from '@/test/helpers/manual-clock';
import {
  AuthorizationError,
  FinalizeError,
  TransientNetworkError,
} from './errors';
import { calculateDelay, createBackoffPolicy, retryWithBackoff } from './retry';

const backoff = createBackoffPolicy({
  initialDelay: 1000,
  maxDelay: 8000,
  backoffMultiplier: 2,
  random: () => 0,
});

describe('calculateDelay', () => {
  it('grows exponentially and caps at the max delay', () => {
    expect(calculateDelay(0, 1000, 8000, 2, () => 0)).toBe(1000);
    expect(calculateDelay(1, 1000, 8000, 2, () => 0)).toBe(2000);
    expect(calculateDelay(3, 1000, 8000, 2, () => 0)).toBe(8000);
    expect(calculateDelay(10, 1000, 8000, 2, () => 0)).toBe(8000);
  });

  it('adds up to 100% jitter of the capped delay', () => {
    expect(calculateDelay(1, 1000, 8000, 2, () => 0.5)).toBe(3000);
    expect(calculateDelay(5, 1000, 8000, 2, () => 0.25)).toBe(10000);
  });
});

describe('retryWithBackoff', () => {
  it('retries retryable errors with increasing delays', async () => {
    const clock = new ManualClock();
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TransientNetworkError({ message: 'reset' }))
      .mockRejectedValueOnce(new TransientNetworkError({ message: 'reset' }))
      .mockResolvedValue('ok');
    const onRetry = vi.fn();

    await expect(
      retryWithBackoff(fn, { maxRetries: 3, backoff, clock, onRetry })
    ).resolves.toBe('ok');

    expect(fn).toHaveBeenCalledTimes(3);
    expect(fn.mock.calls.map(call => call[0])).toEqual([0, 1, 2]);
    expect(clock.sleeps).toEqual([1000, 2000]);
    expect(onRetry).toHaveBeenNthCalledWith(2, expect.any(TransientNetworkError), 2, 2000);
  });

  it('throws non-retryable errors at once', async () => {
    const clock = new ManualClock();
    const error = new AuthorizationError({ message: 'token revoked' });
    const fn = vi.fn<() => Promise<void>>().mockRejectedValue(error);

    await expect(retryWithBackoff(fn, { maxRetries: 3, backoff, clock })).rejects.toBe(
      error
    );
    expect(fn).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('gives up after maxRetries and rethrows the last error', async () => {
    const clock = new ManualClock();
    const fn = vi
      .fn<() => Promise<void>>()
      .mockRejectedValue(new TransientNetworkError({ message: 'still down' }));

    await expect(
      retryWithBackoff(fn, { maxRetries: 2, backoff, clock })
    ).rejects.toThrow('still down');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
  });

  it('honours a custom shouldRetry', async () => {
    const clock = new ManualClock();
    const fn = vi
      .fn<() => Promise<void>>()
      .mockRejectedValue(new TransientNetworkError({ message: 'reset' }));

    await expect(
      retryWithBackoff(fn, {
        maxRetries: 3,
        backoff,
        clock,
        shouldRetry: error => error instanceof FinalizeError,
      })
    ).rejects.toThrow('reset');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('stops when the signal is aborted', async () => {
    const clock = new ManualClock();
    const controller = new AbortController();
    const fn = vi.fn(async () => {
      controller.abort();
      throw new TransientNetworkError({ message: 'reset' });
    });

    await expect(
      retryWithBackoff(fn, { maxRetries: 3, backoff, clock, signal: controller.signal })
    ).rejects.toThrow('reset');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
