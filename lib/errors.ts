/**
 * Extended Error class that preserves error context and details
 *
 * Usage:
 * ```ts
 * throw new ExtendedError({
 *   message: 'Failed to finalize submission',
 *   cause: originalError,
 *   details: {
 *     submissionId: '6b1c…',
 *     statusCode: 502,
 *   }
 * });
 * ```
 */

export interface ExtendedErrorOptions {
  message: string;
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class ExtendedError extends Error {
  public readonly details?: Record<string, unknown>;

  constructor(options: ExtendedErrorOptions) {
    super(options.message, { cause: options.cause });
    this.name = 'ExtendedError';
    this.details = options.details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Type guard to check if an error is an ExtendedError
   */
  static isExtendedError(error: unknown): error is ExtendedError {
    return error instanceof ExtendedError;
  }
}

/**
 * Kinds of failure a submission can record in `lastErrorKind`.
 */
export type SubmissionErrorKind =
  | 'transient_network'
  | 'expired_credential'
  | 'finalize'
  | 'authorization'
  | 'quota_or_validation'
  | 'local_storage'
  | 'not_found'
  | 'invalid_transition'
  | 'cancelled';

const RETRYABLE_KINDS: ReadonlySet<SubmissionErrorKind> = new Set([
  'transient_network',
  'expired_credential',
  'finalize',
]);

export function isRetryableKind(kind: SubmissionErrorKind | null): boolean {
  return kind !== null && RETRYABLE_KINDS.has(kind);
}

/**
 * Base of the submission error taxonomy. `kind` is persisted with the
 * record, `retryable` drives the coordinator's retry policy.
 */
export abstract class SubmissionError extends ExtendedError {
  abstract readonly kind: SubmissionErrorKind;

  get retryable(): boolean {
    return isRetryableKind(this.kind);
  }

  static isSubmissionError(error: unknown): error is SubmissionError {
    return error instanceof SubmissionError;
  }
}

/** Timeout, 5xx, 429, connection reset. */
export class TransientNetworkError extends SubmissionError {
  readonly kind = 'transient_network';

  constructor(options: ExtendedErrorOptions) {
    super(options);
    this.name = 'TransientNetworkError';
  }
}

export class ExpiredUploadCredentialError extends SubmissionError {
  readonly kind = 'expired_credential';

  constructor(options: ExtendedErrorOptions) {
    super(options);
    this.name = 'ExpiredUploadCredentialError';
  }
}

/** Bytes landed in storage but the server did not acknowledge them. */
export class FinalizeError extends SubmissionError {
  readonly kind = 'finalize';

  constructor(options: ExtendedErrorOptions) {
    super(options);
    this.name = 'FinalizeError';
  }
}

export class AuthorizationError extends SubmissionError {
  readonly kind = 'authorization';

  constructor(options: ExtendedErrorOptions) {
    super(options);
    this.name = 'AuthorizationError';
  }
}

/** Payload too large or rejected by server-side validation. */
export class QuotaOrValidationError extends SubmissionError {
  readonly kind = 'quota_or_validation';

  constructor(options: ExtendedErrorOptions) {
    super(options);
    this.name = 'QuotaOrValidationError';
  }
}

/** Disk full, or a backing file missing where the record requires one. */
export class LocalStorageError extends SubmissionError {
  readonly kind = 'local_storage';

  constructor(options: ExtendedErrorOptions) {
    super(options);
    this.name = 'LocalStorageError';
  }
}

export class NotFoundError extends SubmissionError {
  readonly kind = 'not_found';

  constructor(options: ExtendedErrorOptions) {
    super(options);
    this.name = 'NotFoundError';
  }
}

export class InvalidTransitionError extends SubmissionError {
  readonly kind = 'invalid_transition';

  constructor(options: ExtendedErrorOptions) {
    super(options);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Cooperative abort. Named `AbortError` like the DOM exception fetch throws,
 * so callers can check `error.name` uniformly.
 */
export class CancelledError extends SubmissionError {
  readonly kind = 'cancelled';

  constructor(options: ExtendedErrorOptions) {
    super(options);
    this.name = 'AbortError';
  }
}

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Map an HTTP status from the application server onto the taxonomy.
 */
export function errorForStatus(
  statusCode: number,
  message: string,
  details: Record<string, unknown> = {}
): SubmissionError {
  const options = { message, details: { ...details, statusCode } };

  if (statusCode === 401 || statusCode === 403) {
    return new AuthorizationError(options);
  }
  if (statusCode === 404) {
    return new NotFoundError(options);
  }
  if (statusCode === 429 || statusCode === 408 || statusCode >= 500) {
    return new TransientNetworkError(options);
  }
  return new QuotaOrValidationError(options);
}

/**
 * Normalizes anything thrown during a transfer into the taxonomy.
 * Unknown errors are treated as transient: the attempt ceiling still bounds them.
 */
export function classifyError(error: unknown): SubmissionError {
  if (SubmissionError.isSubmissionError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : '';

  if (name === 'AbortError') {
    return new CancelledError({ message: 'Operation cancelled', cause: error });
  }

  if (name === 'TimeoutError') {
    return new TransientNetworkError({
      message: 'Request timed out',
      cause: error,
    });
  }

  const code =
    errorCode(error) ??
    (error instanceof Error ? errorCode(error.cause) : undefined);
  if (code && TRANSIENT_CODES.has(code)) {
    return new TransientNetworkError({ message, cause: error, details: { code } });
  }

  if (code === 'ENOSPC' || code === 'ENOENT' || code === 'EACCES') {
    return new LocalStorageError({ message, cause: error, details: { code } });
  }

  // fetch() reports network failures as a bare TypeError
  const lower = message.toLowerCase();
  if (
    lower.includes('fetch failed') ||
    lower.includes('network') ||
    lower.includes('timeout') ||
    lower.includes('socket')
  ) {
    return new TransientNetworkError({ message, cause: error });
  }

  return new TransientNetworkError({
    message,
    cause: error,
    details: { unclassified: true },
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
