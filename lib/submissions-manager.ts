import { randomUUID } from 'crypto';
import { EventEmitter } from 'events';
import { z } from 'zod';
import type {
  ServerOwnedFields,
  SubmissionContext,
  SubmissionRecord,
  SubmissionSnapshot,
} from '@/types/submission';
import { systemClock, type Clock } from './clock';
import { requireApiBaseUrl, type SyncConfig } from './config';
import {
  NotFoundError,
  QuotaOrValidationError,
  errorMessage,
} from './errors';
import type { FetchLike } from './http';
import { createLogger } from './logger';
import { LocalMediaStore } from './media-store';
import { PresignedTransferClient } from './presigned-transfer';
import { createBackoffPolicy } from './retry';
import { closeDatabase, openDatabase, type SqliteDatabase } from './sqlite-db';
import {
  SubmissionsApi,
  type PlaybackUrlResponse,
  type ServerSubmissionSummary,
  type SubmissionListQuery,
  type TokenProvider,
} from './submissions-api';
import { SubmissionsDb, type SubmissionFilter } from './submissions-db';
import {
  SyncReconciler,
  isPushEligible,
  serverOwnedFields,
  type SyncReport,
} from './sync-reconciler';
import { UploadCoordinator } from './upload-coordinator';

const logger = createLogger('submissions-manager');

const ContextSchema: z.ZodType<SubmissionContext> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('exercise'), exerciseId: z.string().min(1) }),
  z.object({ kind: z.literal('piece'), pieceId: z.string().min(1) }),
  z.object({ kind: z.literal('session'), sessionId: z.string().min(1) }),
  z.object({ kind: z.literal('none') }),
]);

const BytesSchema = z
  .instanceof(Uint8Array)
  .refine(bytes => bytes.byteLength > 0, { message: 'Media must not be empty' });

export const CreateSubmissionSchema = z.object({
  ownerId: z.number().int().positive(),
  context: ContextSchema.default({ kind: 'none' }),
  durationSeconds: z.number().finite().nonnegative(),
  notes: z
    .string()
    .trim()
    .max(2000)
    .nullish()
    .transform(value => (value ? value : null)),
  video: BytesSchema,
  thumbnail: BytesSchema.nullish().transform(value => value ?? null),
});

export type CreateSubmissionInput = z.input<typeof CreateSubmissionSchema>;

export interface PlaybackUrl {
  videoUrl: string;
  thumbnailUrl: string | null;
  expiresIn: number;
}

export interface RecoveryReport {
  tempFilesRemoved: number;
  /** UPLOADING records from an interrupted run put back to PENDING */
  interrupted: number;
  enqueued: number;
}

export interface SubmissionsManagerOptions {
  db: SubmissionsDb;
  store: LocalMediaStore;
  api: SubmissionsApi;
  coordinator: UploadCoordinator;
  reconciler: SyncReconciler;
  maxAttempts: number;
  syncIntervalMs: number;
  /** Closed on shutdown when the manager owns the connection */
  database?: SqliteDatabase;
}

export function toSnapshot(record: SubmissionRecord): SubmissionSnapshot {
  return Object.freeze({
    ...record,
    context: Object.freeze({ ...record.context }),
    annotations: record.annotations ? Object.freeze({ ...record.annotations }) : null,
  });
}

/**
 * Entry point for the host application: capture, delete, retry, read,
 * playback and lifecycle of the sync machinery.
 *
 * Emits `submission:updated` with a snapshot on every change and
 * `submission:deleted` with the id after a deletion.
 */
export class SubmissionsManager extends EventEmitter {
  private shutDown = false;

  constructor(private readonly options: SubmissionsManagerOptions) {
    super();

    const forward = (record: SubmissionRecord) => {
      this.emit('submission:updated', toSnapshot(record));
    };
    options.coordinator.on('submission:updated', forward);
    options.reconciler.on('submission:updated', forward);
  }

  /**
   * Persist a capture and queue it for upload. Media is on disk before the
   * record exists, so a PENDING record always has its file.
   */
  async createSubmission(input: CreateSubmissionInput): Promise<SubmissionSnapshot> {
    const parsed = CreateSubmissionSchema.safeParse(input);
    if (!parsed.success) {
      throw new QuotaOrValidationError({
        message: 'Invalid submission',
        cause: parsed.error,
        details: { issues: parsed.error.issues },
      });
    }

    const { db, store, coordinator } = this.options;
    const submission = parsed.data;
    const id = randomUUID();

    let record: SubmissionRecord;
    try {
      const localVideoPath = await store.save(submission.video, id, 'video');
      const localThumbnailPath = submission.thumbnail
        ? await store.save(submission.thumbnail, id, 'thumbnail')
        : null;

      record = db.insert({
        id,
        ownerId: submission.ownerId,
        context: submission.context,
        localVideoPath,
        localThumbnailPath,
        videoByteLength: submission.video.byteLength,
        thumbnailByteLength: submission.thumbnail?.byteLength ?? null,
        durationSeconds: submission.durationSeconds,
        notes: submission.notes,
      });
    } catch (error) {
      logger.error('Failed to persist capture', error, { submissionId: id });
      await store.remove(id);
      throw error;
    }

    const snapshot = toSnapshot(record);
    this.emit('submission:updated', snapshot);
    coordinator.enqueue(id);

    return snapshot;
  }

  /**
   * Cancel any work, remove local media and the record, and delete the
   * server copy. A server copy that cannot be deleted now is left to the
   * next sync.
   */
  async deleteSubmission(id: string): Promise<void> {
    const { db, store, api, coordinator } = this.options;
    const record = db.require(id);

    await coordinator.cancel(id, { intent: 'delete' });
    try {
      await store.remove(id);
    } catch (error) {
      this.releaseAbandonedDelete(id);
      throw error;
    }
    db.deleteWithTombstone(id, record.ownerId);

    try {
      await api.deleteSubmission(id);
      db.removeTombstone(id);
    } catch (error) {
      if (error instanceof NotFoundError) {
        db.removeTombstone(id);
      } else {
        const message = errorMessage(error);
        db.addTombstone(id, record.ownerId, message);
        logger.warn('Server deletion deferred to next sync', {
          submissionId: id,
          error: message,
        });
      }
    }

    logger.info('Submission deleted', { submissionId: id, status: record.status });
    this.emit('submission:deleted', id);
  }

  /** A transfer cancelled for a delete that then failed is uploadable again */
  private releaseAbandonedDelete(id: string): void {
    const current = this.options.db.get(id);
    if (current?.status !== 'UPLOADING') return;

    const updated = this.options.db.updateStatus(id, { status: 'PENDING' });
    logger.warn('Deletion failed, submission returned to PENDING', { submissionId: id });
    this.emit('submission:updated', toSnapshot(updated));
  }

  async retrySubmission(id: string): Promise<SubmissionSnapshot> {
    return toSnapshot(await this.options.coordinator.retryNow(id));
  }

  getSubmission(id: string): SubmissionSnapshot | null {
    const record = this.options.db.get(id);
    return record ? toSnapshot(record) : null;
  }

  listSubmissions(filter: SubmissionFilter = {}): SubmissionSnapshot[] {
    return this.options.db.list(filter).map(toSnapshot);
  }

  async getPlaybackUrl(id: string): Promise<PlaybackUrl> {
    const record = this.options.db.require(id);
    if (record.status !== 'UPLOADED') {
      throw new NotFoundError({
        message: 'Submission has no uploaded video yet',
        details: { submissionId: id, status: record.status },
      });
    }

    const response: PlaybackUrlResponse = await this.options.api.getPlaybackUrl(id);
    return {
      videoUrl: response.url,
      thumbnailUrl: response.thumbnailUrl ?? null,
      expiresIn: response.expiresIn,
    };
  }

  /** The signed-in user's submissions as the server lists them */
  fetchMySubmissions(query: SubmissionListQuery = {}): Promise<ServerSubmissionSummary[]> {
    return this.options.api.listSubmissions(query);
  }

  /** A student's submissions, for their instructor */
  fetchStudentSubmissions(
    studentId: number,
    query: SubmissionListQuery = {}
  ): Promise<ServerSubmissionSummary[]> {
    return this.options.api.listStudentSubmissions(studentId, query);
  }

  /**
   * Mark a submission reviewed on the server. A local copy picks up the
   * review fields straight away instead of on the next pull.
   */
  async markReviewed(id: string): Promise<ServerOwnedFields> {
    const { db, api } = this.options;
    const fields = serverOwnedFields(await api.markReviewed(id));

    if (db.get(id) && db.applyServerFields(id, fields)) {
      this.emit('submission:updated', toSnapshot(db.require(id)));
    }

    logger.info('Submission marked reviewed', { submissionId: id });
    return fields;
  }

  /**
   * Startup: clear interrupted writes, return interrupted transfers to
   * PENDING and queue everything that still needs uploading, oldest first.
   * Records whose media vanished fail on their first attempt.
   */
  async recover(): Promise<RecoveryReport> {
    const { db, store, coordinator, maxAttempts } = this.options;

    const tempFilesRemoved = await store.sweepTempFiles();

    let interrupted = 0;
    for (const record of db.list({ status: ['UPLOADING'] })) {
      if (coordinator.isActive(record.id)) continue;
      const pending = db.updateStatus(record.id, { status: 'PENDING' });
      this.emit('submission:updated', toSnapshot(pending));
      interrupted++;
    }

    let enqueued = 0;
    for (const record of db.list({ status: ['PENDING', 'FAILED'] })) {
      if (!isPushEligible(record, maxAttempts)) continue;
      if (coordinator.enqueue(record.id)) enqueued++;
    }

    logger.info('Recovery complete', { tempFilesRemoved, interrupted, enqueued });
    return { tempFilesRemoved, interrupted, enqueued };
  }

  onConnectivityRegained(): Promise<SyncReport> {
    return this.options.reconciler.onConnectivityRegained();
  }

  onForegrounded(): Promise<SyncReport> {
    return this.options.reconciler.onForegrounded();
  }

  sync(): Promise<SyncReport> {
    return this.options.reconciler.run('manual');
  }

  startPeriodicSync(intervalMs: number = this.options.syncIntervalMs): void {
    this.options.reconciler.start(intervalMs);
  }

  /**
   * Resolves once the coordinator has no queued, running or scheduled work
   */
  onIdle(): Promise<void> {
    return this.options.coordinator.onIdle();
  }

  countByStatus() {
    return this.options.db.countByStatus();
  }

  getUploadStats() {
    return this.options.coordinator.getUploadStats();
  }

  async shutdown(): Promise<void> {
    if (this.shutDown) return;
    this.shutDown = true;

    this.options.reconciler.stop();
    await this.options.coordinator.stop();
    if (this.options.database) closeDatabase(this.options.database);

    logger.info('Submissions manager shut down');
  }
}

export interface CreateSubmissionsManagerOptions {
  getToken: TokenProvider;
  fetchImpl?: FetchLike;
  clock?: Clock;
  /** Jitter source for retry backoff */
  random?: () => number;
}

/**
 * Wire the whole subsystem from configuration
 */
export function createSubmissionsManager(
  config: SyncConfig,
  options: CreateSubmissionsManagerOptions
): SubmissionsManager {
  const baseUrl = requireApiBaseUrl(config);
  const clock = options.clock ?? systemClock;
  const database = openDatabase(config.dbPath);
  const db = new SubmissionsDb(database, clock);
  const store = new LocalMediaStore(config.mediaDir);

  const api = new SubmissionsApi({
    baseUrl,
    getToken: options.getToken,
    timeoutMs: config.requestTimeoutMs,
    fetchImpl: options.fetchImpl,
  });

  const transfer = new PresignedTransferClient({
    api,
    store,
    transferTimeoutMs: config.transferTimeoutMs,
    remoteNamespace: config.remoteNamespace,
    clock,
    fetchImpl: options.fetchImpl,
  });

  const coordinator = new UploadCoordinator({
    db,
    store,
    transfer,
    backoff: createBackoffPolicy({ ...config.retry, random: options.random }),
    concurrency: config.concurrency,
    maxAttempts: config.retry.maxAttempts,
    clock,
  });

  const reconciler = new SyncReconciler({
    db,
    api,
    transfer,
    coordinator,
    maxAttempts: config.retry.maxAttempts,
  });

  logger.info('Submissions manager created', {
    dbPath: config.dbPath,
    mediaDir: config.mediaDir,
    concurrency: config.concurrency,
  });

  return new SubmissionsManager({
    db,
    store,
    api,
    coordinator,
    reconciler,
    maxAttempts: config.retry.maxAttempts,
    syncIntervalMs: config.syncIntervalMs,
    database,
  });
}
