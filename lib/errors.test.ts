import { describe, it, expect } from 'vitest';
import {
  AuthorizationError,
  CancelledError,
  ExtendedError,
  FinalizeError,
  LocalStorageError,
  NotFoundError,
  QuotaOrValidationError,
  TransientNetworkError,
  classifyError,
  errorForStatus,
  isRetryableKind,
} from './errors';

describe('ExtendedError', () => {
  it('keeps cause and details', () => {
    const cause = new Error('socket hang up');
    const error = new ExtendedError({
      message: 'Upload failed',
      cause,
      details: { submissionId: 'sub-1' },
    });

    expect(error.message).toBe('Upload failed');
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual({ submissionId: 'sub-1' });
    expect(ExtendedError.isExtendedError(error)).toBe(true);
    expect(ExtendedError.isExtendedError(cause)).toBe(false);
  });
});

describe('errorForStatus', () => {
  it.each([
    [401, AuthorizationError],
    [403, AuthorizationError],
    [404, NotFoundError],
    [408, TransientNetworkError],
    [429, TransientNetworkError],
    [500, TransientNetworkError],
    [503, TransientNetworkError],
    [400, QuotaOrValidationError],
    [413, QuotaOrValidationError],
    [422, QuotaOrValidationError],
  ])('maps %i', (status, ErrorClass) => {
    const error = errorForStatus(status, 'failed', { url: 'https://api.test/x' });
    expect(error).toBeInstanceOf(ErrorClass);
    expect(error.details).toEqual({ url: 'https://api.test/x', statusCode: status });
  });
});

describe('retryable kinds', () => {
  it('retries transient, expired credential and finalize failures only', () => {
    expect(new TransientNetworkError({ message: 'x' }).retryable).toBe(true);
    expect(new FinalizeError({ message: 'x' }).retryable).toBe(true);
    expect(isRetryableKind('expired_credential')).toBe(true);

    expect(new AuthorizationError({ message: 'x' }).retryable).toBe(false);
    expect(new QuotaOrValidationError({ message: 'x' }).retryable).toBe(false);
    expect(new LocalStorageError({ message: 'x' }).retryable).toBe(false);
    expect(new CancelledError({ message: 'x' }).retryable).toBe(false);
    expect(isRetryableKind(null)).toBe(false);
  });
});

describe('classifyError', () => {
  it('returns taxonomy errors unchanged', () => {
    const error = new FinalizeError({ message: 'not acknowledged' });
    expect(classifyError(error)).toBe(error);
  });

  it('treats a bare fetch TypeError as transient', () => {
    const classified = classifyError(new TypeError('fetch failed'));
    expect(classified).toBeInstanceOf(TransientNetworkError);
    expect(classified.message).toBe('fetch failed');
  });

  it('reads network codes from the error or its cause', () => {
    const reset = Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' });
    expect(classifyError(reset)).toBeInstanceOf(TransientNetworkError);

    const wrapped = new Error('request failed', {
      cause: Object.assign(new Error('refused'), { code: 'ECONNREFUSED' }),
    });
    expect(classifyError(wrapped).details).toEqual({ code: 'ECONNREFUSED' });
  });

  it('maps disk errors to local storage', () => {
    const full = Object.assign(new Error('no space left on device'), { code: 'ENOSPC' });
    expect(classifyError(full)).toBeInstanceOf(LocalStorageError);
  });

  it('maps aborts to cancellation', () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    const classified = classifyError(abort);
    expect(classified).toBeInstanceOf(CancelledError);
    expect(classified.name).toBe('AbortError');
  });

  it('marks unknown failures as unclassified transient errors', () => {
    const classified = classifyError('boom');
    expect(classified).toBeInstanceOf(TransientNetworkError);
    expect(classified.message).toBe('boom');
    expect(classified.details).toEqual({ unclassified: true });
  });
});
