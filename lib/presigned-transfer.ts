import type { MediaKind, RemoteKeys, SubmissionRecord } from '@/types/submission';
import type {
  NegotiateRequest,
  TransferReceipt,
  UploadCredential,
} from '@/types/transfer';
import { systemClock, type Clock } from './clock';
import {
  CancelledError,
  ExpiredUploadCredentialError,
  FinalizeError,
  QuotaOrValidationError,
  SubmissionError,
  TransientNetworkError,
  classifyError,
  errorForStatus,
} from './errors';
import { fetchWithTimeout, type FetchLike } from './http';
import { createLogger } from './logger';
import type { LocalMediaStore } from './media-store';
import type { FinalizeResponse, SubmissionsApi } from './submissions-api';

const logger = createLogger('presigned-transfer');

export const VIDEO_CONTENT_TYPE = 'video/mp4';
export const THUMBNAIL_CONTENT_TYPE = 'image/jpeg';

// Fresh negotiations per upload() before giving up on stale URLs
export const MAX_CREDENTIAL_REFRESHES = 3;

// A URL this close to expiry is not worth starting a transfer on. Capped at
// half the credential's lifetime so short-lived URLs are usable when issued.
const DEFAULT_EXPIRY_MARGIN_MS = 5_000;

/**
 * Object naming used by the server:
 * `{namespace}/{ownerId}/{submissionId}.mp4` and `..._thumb.jpg`
 */
export function buildRemoteKeys(
  namespace: string,
  ownerId: number,
  submissionId: string
): { videoKey: string; thumbnailKey: string } {
  const base = `${namespace}/${ownerId}/${submissionId}`;
  return { videoKey: `${base}.mp4`, thumbnailKey: `${base}_thumb.jpg` };
}

export interface PresignedTransferOptions {
  api: SubmissionsApi;
  store: LocalMediaStore;
  transferTimeoutMs: number;
  remoteNamespace: string;
  clock?: Clock;
  /** Used for the direct object-storage PUTs */
  fetchImpl?: FetchLike;
  expiryMarginMs?: number;
  maxCredentialRefreshes?: number;
}

function throwIfAborted(signal: AbortSignal | undefined, id: string): void {
  if (signal?.aborted) {
    throw new CancelledError({
      message: 'Transfer cancelled',
      details: { submissionId: id },
    });
  }
}

/**
 * Negotiate -> transfer -> finalize against the application server and
 * object storage. Credentials are cached per submission until they expire.
 */
export class PresignedTransferClient {
  private readonly credentials = new Map<string, UploadCredential>();
  private readonly clock: Clock;
  private readonly fetchImpl: FetchLike;
  private readonly expiryMarginMs: number;
  private readonly maxRefreshes: number;

  constructor(private readonly options: PresignedTransferOptions) {
    this.clock = options.clock ?? systemClock;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.expiryMarginMs = options.expiryMarginMs ?? DEFAULT_EXPIRY_MARGIN_MS;
    this.maxRefreshes = options.maxCredentialRefreshes ?? MAX_CREDENTIAL_REFRESHES;
  }

  isFresh(credential: UploadCredential): boolean {
    const lifetime = credential.expiresAt - credential.issuedAt;
    const margin = Math.min(this.expiryMarginMs, lifetime / 2);
    return credential.expiresAt - margin > this.clock.now();
  }

  /**
   * Request upload URLs. The record id is the idempotency key, so repeating
   * this never creates a second server record.
   */
  async negotiate(
    record: SubmissionRecord,
    signal?: AbortSignal
  ): Promise<UploadCredential> {
    throwIfAborted(signal, record.id);

    const request: NegotiateRequest = {
      id: record.id,
      ownerId: record.ownerId,
      context: record.context,
      durationSeconds: record.durationSeconds,
      notes: record.notes,
      video: {
        contentType: VIDEO_CONTENT_TYPE,
        contentLength: record.videoByteLength,
      },
      thumbnail:
        record.localThumbnailPath !== null && record.thumbnailByteLength !== null
          ? {
              contentType: THUMBNAIL_CONTENT_TYPE,
              contentLength: record.thumbnailByteLength,
            }
          : null,
    };

    const response = await this.options.api.createSubmission(request, signal);

    if (response.id !== record.id) {
      throw new QuotaOrValidationError({
        message: 'Server answered negotiation for a different submission',
        details: { submissionId: record.id, returnedId: response.id },
      });
    }

    const issuedAt = this.clock.now();
    const credential: UploadCredential = {
      submissionId: record.id,
      uploadUrl: response.uploadUrl,
      thumbnailUploadUrl: response.thumbnailUploadUrl ?? null,
      issuedAt,
      expiresAt: issuedAt + response.expiresIn * 1000,
    };
    this.credentials.set(record.id, credential);

    logger.debug('Upload credential negotiated', {
      submissionId: record.id,
      expiresIn: response.expiresIn,
      hasThumbnailUrl: credential.thumbnailUploadUrl !== null,
    });

    return credential;
  }

  /**
   * Cached credential if still usable
   */
  cachedCredential(id: string): UploadCredential | null {
    const credential = this.credentials.get(id);
    if (!credential) return null;
    if (!this.isFresh(credential)) {
      this.discardCredential(id);
      return null;
    }
    return credential;
  }

  discardCredential(id: string): void {
    if (this.credentials.delete(id)) {
      logger.debug('Upload credential discarded', { submissionId: id });
    }
  }

  /**
   * Move the record's bytes into object storage. Stale credentials are
   * replaced by re-negotiating, up to the refresh bound.
   */
  async upload(
    record: SubmissionRecord,
    signal?: AbortSignal
  ): Promise<TransferReceipt> {
    const wantsThumbnail = record.localThumbnailPath !== null;
    let videoBytes: number | null = null;
    let thumbnailBytes = 0;
    let negotiations = 0;

    for (let refresh = 0; ; refresh++) {
      throwIfAborted(signal, record.id);

      let credential = this.cachedCredential(record.id);
      if (!credential) {
        credential = await this.negotiate(record, signal);
        negotiations++;
      }

      try {
        if (!this.isFresh(credential)) {
          throw new ExpiredUploadCredentialError({
            message: 'Upload URL expired before the transfer started',
            details: { submissionId: record.id, expiresAt: credential.expiresAt },
          });
        }

        if (videoBytes === null) {
          videoBytes = await this.putObject(
            credential.uploadUrl,
            record.id,
            'video',
            VIDEO_CONTENT_TYPE,
            signal
          );
        }

        if (wantsThumbnail) {
          if (credential.thumbnailUploadUrl === null) {
            logger.warn('Server returned no thumbnail URL, skipping thumbnail', {
              submissionId: record.id,
            });
          } else {
            thumbnailBytes = await this.putObject(
              credential.thumbnailUploadUrl,
              record.id,
              'thumbnail',
              THUMBNAIL_CONTENT_TYPE,
              signal
            );
          }
        }

        logger.info('Transfer complete', {
          submissionId: record.id,
          videoBytes,
          thumbnailBytes,
          negotiations,
        });

        return {
          submissionId: record.id,
          videoBytes,
          thumbnailBytes,
          negotiations,
        };
      } catch (error) {
        if (!(error instanceof ExpiredUploadCredentialError)) throw error;

        this.discardCredential(record.id);
        if (refresh >= this.maxRefreshes) {
          logger.warn('Credential refreshes exhausted', {
            submissionId: record.id,
            refreshes: refresh,
          });
          throw error;
        }
        logger.info('Upload URL stale, re-negotiating', {
          submissionId: record.id,
          refresh: refresh + 1,
        });
      }
    }
  }

  /**
   * Tell the server the bytes landed. Network-level failures become
   * FinalizeError so the caller retries only this step.
   */
  async finalize(
    record: SubmissionRecord,
    receipt: TransferReceipt,
    signal?: AbortSignal
  ): Promise<RemoteKeys> {
    throwIfAborted(signal, record.id);

    let response: FinalizeResponse;
    try {
      response = await this.options.api.finalize(record.id, signal);
    } catch (error) {
      const classified = classifyError(error);
      if (classified instanceof TransientNetworkError) {
        throw new FinalizeError({
          message: `Finalize not acknowledged: ${classified.message}`,
          cause: classified,
          details: { submissionId: record.id },
        });
      }
      throw classified;
    }

    this.discardCredential(record.id);

    const conventional = buildRemoteKeys(
      this.options.remoteNamespace,
      record.ownerId,
      record.id
    );

    const keys: RemoteKeys = {
      videoKey: response.videoKey ?? conventional.videoKey,
      thumbnailKey:
        response.thumbnailKey ??
        (receipt.thumbnailBytes > 0 ? conventional.thumbnailKey : null),
    };

    logger.info('Submission finalized', {
      submissionId: record.id,
      videoKey: keys.videoKey,
    });

    return keys;
  }

  private async putObject(
    url: string,
    id: string,
    kind: MediaKind,
    contentType: string,
    signal?: AbortSignal
  ): Promise<number> {
    return this.options.store.withFile(id, kind, async (handle, size) => {
      throwIfAborted(signal, id);
      const body = await handle.readFile();

      const response = await fetchWithTimeout(
        this.fetchImpl,
        url,
        {
          method: 'PUT',
          headers: { 'Content-Type': contentType },
          body,
        },
        { timeoutMs: this.options.transferTimeoutMs, signal }
      );

      if (response.ok) {
        // Drain so the connection can be reused
        await response.arrayBuffer();
        return size;
      }

      throw await this.storageError(response, id, kind);
    });
  }

  private async storageError(
    response: Response,
    id: string,
    kind: MediaKind
  ): Promise<SubmissionError> {
    const text = await response.text().catch(() => '');
    const details = { submissionId: id, kind, statusCode: response.status };

    // Object storage has no user auth: a 403 means the presigned URL is stale
    if (response.status === 403 || (response.status === 400 && /expired/i.test(text))) {
      return new ExpiredUploadCredentialError({
        message: `Object storage rejected the ${kind} upload URL`,
        details: { ...details, responseBody: text.slice(0, 500) },
      });
    }

    return errorForStatus(
      response.status,
      `Object storage ${kind} transfer failed: HTTP ${response.status}`,
      { ...details, responseBody: text.slice(0, 500) }
    );
  }
}
