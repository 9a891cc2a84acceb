import { z } from 'zod';
import type {
  ServerAnnotations,
  ServerOwnedFields,
  StatusUpdate,
  SubmissionContext,
  SubmissionRecord,
  SubmissionStatus,
} from '@/types/submission';
import { SUBMISSION_STATUSES } from '@/types/submission';
import { systemClock, type Clock } from './clock';
import {
  InvalidTransitionError,
  NotFoundError,
  type SubmissionErrorKind,
} from './errors';
import { createLogger } from './logger';
import type { SqliteDatabase } from './sqlite-db';
import { assertRecordInvariants, assertTransition } from './status-machine';

const logger = createLogger('submissions-db');

interface SubmissionRow {
  id: string;
  owner_id: number;
  context_kind: string;
  context_ref: string | null;
  local_video_path: string;
  local_thumbnail_path: string | null;
  video_byte_length: number;
  thumbnail_byte_length: number | null;
  remote_video_key: string | null;
  remote_thumbnail_key: string | null;
  duration_seconds: number;
  notes: string | null;
  status: string;
  retry_count: number;
  last_error: string | null;
  last_error_kind: string | null;
  reviewed_at: string | null;
  reviewed_by: number | null;
  annotations: string | null;
  server_updated_at: string | null;
  created_at: string;
  updated_at: string;
}

interface TombstoneRow {
  submission_id: string;
  owner_id: number;
  requested_at: string;
  attempts: number;
  last_error: string | null;
}

export interface DeletionTombstone {
  submissionId: string;
  ownerId: number;
  requestedAt: string;
  attempts: number;
  lastError: string | null;
}

/**
 * Fields supplied when a capture is first persisted
 */
export type NewSubmission = Pick<
  SubmissionRecord,
  | 'id'
  | 'ownerId'
  | 'context'
  | 'localVideoPath'
  | 'localThumbnailPath'
  | 'videoByteLength'
  | 'thumbnailByteLength'
  | 'durationSeconds'
  | 'notes'
>;

export interface SubmissionFilter {
  status?: SubmissionStatus[];
  ownerId?: number;
  /** The exercise, piece or session the capture was recorded for */
  context?: SubmissionContext;
  /** true: uploaded and not reviewed yet; false: reviewed */
  awaitingReview?: boolean;
}

const AnnotationsSchema = z.record(z.unknown());

const ERROR_KINDS: ReadonlySet<string> = new Set<SubmissionErrorKind>([
  'transient_network',
  'expired_credential',
  'finalize',
  'authorization',
  'quota_or_validation',
  'local_storage',
  'not_found',
  'invalid_transition',
  'cancelled',
]);

function isErrorKind(value: string): value is SubmissionErrorKind {
  return ERROR_KINDS.has(value);
}

function isStatus(value: string): value is SubmissionStatus {
  return SUBMISSION_STATUSES.some(status => status === value);
}

function contextToColumns(context: SubmissionContext): {
  kind: SubmissionContext['kind'];
  ref: string | null;
} {
  switch (context.kind) {
    case 'exercise':
      return { kind: 'exercise', ref: context.exerciseId };
    case 'piece':
      return { kind: 'piece', ref: context.pieceId };
    case 'session':
      return { kind: 'session', ref: context.sessionId };
    case 'none':
      return { kind: 'none', ref: null };
  }
}

function contextFromColumns(
  id: string,
  kind: string,
  ref: string | null
): SubmissionContext {
  if (kind === 'none') return { kind: 'none' };
  if (ref === null) {
    throw new InvalidTransitionError({
      message: 'Submission context reference missing',
      details: { submissionId: id, contextKind: kind },
    });
  }
  switch (kind) {
    case 'exercise':
      return { kind: 'exercise', exerciseId: ref };
    case 'piece':
      return { kind: 'piece', pieceId: ref };
    case 'session':
      return { kind: 'session', sessionId: ref };
    default:
      throw new InvalidTransitionError({
        message: `Unknown submission context kind: ${kind}`,
        details: { submissionId: id },
      });
  }
}

function parseAnnotations(id: string, raw: string | null): ServerAnnotations | null {
  if (raw === null) return null;
  const parsed = AnnotationsSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    logger.warn('Discarding malformed annotations', { submissionId: id });
    return null;
  }
  return parsed.data;
}

function rowToRecord(row: SubmissionRow): SubmissionRecord {
  if (!isStatus(row.status)) {
    throw new InvalidTransitionError({
      message: `Unknown submission status: ${row.status}`,
      details: { submissionId: row.id },
    });
  }

  return {
    id: row.id,
    ownerId: row.owner_id,
    context: contextFromColumns(row.id, row.context_kind, row.context_ref),
    localVideoPath: row.local_video_path,
    localThumbnailPath: row.local_thumbnail_path,
    videoByteLength: row.video_byte_length,
    thumbnailByteLength: row.thumbnail_byte_length,
    remoteVideoKey: row.remote_video_key,
    remoteThumbnailKey: row.remote_thumbnail_key,
    durationSeconds: row.duration_seconds,
    notes: row.notes,
    status: row.status,
    retryCount: row.retry_count,
    lastError: row.last_error,
    lastErrorKind:
      row.last_error_kind !== null && isErrorKind(row.last_error_kind)
        ? row.last_error_kind
        : null,
    reviewedAt: row.reviewed_at,
    reviewedBy: row.reviewed_by,
    annotations: parseAnnotations(row.id, row.annotations),
    serverUpdatedAt: row.server_updated_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Durable store of submission records. Every status write is checked
 * against the status machine inside a transaction.
 */
export class SubmissionsDb {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly clock: Clock = systemClock
  ) {}

  private timestamp(): string {
    return new Date(this.clock.now()).toISOString();
  }

  insert(submission: NewSubmission): SubmissionRecord {
    const now = this.timestamp();
    const context = contextToColumns(submission.context);

    this.db
      .prepare(
        `INSERT INTO submissions (
          id, owner_id, context_kind, context_ref,
          local_video_path, local_thumbnail_path, video_byte_length, thumbnail_byte_length,
          duration_seconds, notes, status, retry_count, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'PENDING', 0, ?, ?)`
      )
      .run(
        submission.id,
        submission.ownerId,
        context.kind,
        context.ref,
        submission.localVideoPath,
        submission.localThumbnailPath,
        submission.videoByteLength,
        submission.thumbnailByteLength,
        submission.durationSeconds,
        submission.notes,
        now,
        now
      );

    logger.info('Submission recorded', {
      submissionId: submission.id,
      ownerId: submission.ownerId,
      context: context.kind,
    });

    return this.require(submission.id);
  }

  get(id: string): SubmissionRecord | null {
    const row = this.db
      .prepare<[string], SubmissionRow>('SELECT * FROM submissions WHERE id = ?')
      .get(id);
    return row ? rowToRecord(row) : null;
  }

  require(id: string): SubmissionRecord {
    const record = this.get(id);
    if (!record) {
      throw new NotFoundError({
        message: 'Submission not found',
        details: { submissionId: id },
      });
    }
    return record;
  }

  /**
   * Records in creation order
   */
  list(filter: SubmissionFilter = {}): SubmissionRecord[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (filter.status && filter.status.length > 0) {
      clauses.push(`status IN (${filter.status.map(() => '?').join(', ')})`);
      params.push(...filter.status);
    }
    if (filter.ownerId !== undefined) {
      clauses.push('owner_id = ?');
      params.push(filter.ownerId);
    }
    if (filter.context) {
      const context = contextToColumns(filter.context);
      if (context.ref === null) {
        clauses.push('context_kind = ? AND context_ref IS NULL');
        params.push(context.kind);
      } else {
        clauses.push('context_kind = ? AND context_ref = ?');
        params.push(context.kind, context.ref);
      }
    }
    if (filter.awaitingReview === true) {
      clauses.push("status = 'UPLOADED' AND reviewed_at IS NULL");
    } else if (filter.awaitingReview === false) {
      clauses.push('reviewed_at IS NOT NULL');
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    return this.db
      .prepare<Array<string | number>, SubmissionRow>(
        `SELECT * FROM submissions ${where} ORDER BY created_at ASC, rowid ASC`
      )
      .all(...params)
      .map(rowToRecord);
  }

  countByStatus(): Record<SubmissionStatus, number> {
    const counts: Record<SubmissionStatus, number> = {
      PENDING: 0,
      UPLOADING: 0,
      UPLOADED: 0,
      FAILED: 0,
    };
    const rows = this.db
      .prepare<[], { status: string; total: number }>(
        'SELECT status, COUNT(*) AS total FROM submissions GROUP BY status'
      )
      .all();
    for (const row of rows) {
      if (isStatus(row.status)) counts[row.status] = row.total;
    }
    return counts;
  }

  /**
   * Apply a status transition with its bookkeeping. Throws
   * InvalidTransitionError for transitions the status machine forbids and
   * for any attempt to replace confirmed remote keys.
   */
  updateStatus(id: string, update: StatusUpdate): SubmissionRecord {
    const apply = this.db.transaction((): SubmissionRecord => {
      const current = this.require(id);
      assertTransition(current.status, update.status, id);

      const next: SubmissionRecord = {
        ...current,
        status: update.status,
        retryCount: update.retryCount ?? current.retryCount,
        lastError:
          update.lastError !== undefined ? update.lastError : current.lastError,
        lastErrorKind:
          update.lastErrorKind !== undefined
            ? update.lastErrorKind
            : current.lastErrorKind,
        remoteVideoKey: update.remoteVideoKey ?? current.remoteVideoKey,
        remoteThumbnailKey:
          update.remoteThumbnailKey !== undefined
            ? update.remoteThumbnailKey
            : current.remoteThumbnailKey,
        updatedAt: this.timestamp(),
      };

      if (
        current.remoteVideoKey !== null &&
        next.remoteVideoKey !== current.remoteVideoKey
      ) {
        throw new InvalidTransitionError({
          message: 'Remote keys are immutable once confirmed',
          details: { submissionId: id },
        });
      }

      assertRecordInvariants(next);

      this.db
        .prepare(
          `UPDATE submissions SET
            status = ?, retry_count = ?, last_error = ?, last_error_kind = ?,
            remote_video_key = ?, remote_thumbnail_key = ?, updated_at = ?
          WHERE id = ?`
        )
        .run(
          next.status,
          next.retryCount,
          next.lastError,
          next.lastErrorKind,
          next.remoteVideoKey,
          next.remoteThumbnailKey,
          next.updatedAt,
          id
        );

      return next;
    });

    const record = apply();

    logger.debug('Submission status updated', {
      submissionId: id,
      status: record.status,
      retryCount: record.retryCount,
    });

    return record;
  }

  /**
   * Note an error without leaving the current status, e.g. a finalize
   * failure while the record stays UPLOADING.
   */
  recordError(
    id: string,
    lastError: string,
    lastErrorKind: SubmissionErrorKind
  ): SubmissionRecord {
    this.db
      .prepare(
        'UPDATE submissions SET last_error = ?, last_error_kind = ?, updated_at = ? WHERE id = ?'
      )
      .run(lastError, lastErrorKind, this.timestamp(), id);
    return this.require(id);
  }

  /**
   * Manual retry resets the bookkeeping of a FAILED record
   */
  resetRetries(id: string): SubmissionRecord {
    const result = this.db
      .prepare(
        `UPDATE submissions SET retry_count = 0, last_error = NULL, last_error_kind = NULL, updated_at = ?
         WHERE id = ? AND status = 'FAILED'`
      )
      .run(this.timestamp(), id);

    if (result.changes === 0) {
      const current = this.require(id);
      throw new InvalidTransitionError({
        message: `Only failed submissions can be retried (status ${current.status})`,
        details: { submissionId: id, status: current.status },
      });
    }
    return this.require(id);
  }

  /**
   * Merge server-owned fields. Last writer wins by server `updatedAt`:
   * a view older than the stored one is ignored. Returns whether it merged.
   */
  applyServerFields(id: string, fields: ServerOwnedFields): boolean {
    const annotations =
      fields.annotations === null ? null : JSON.stringify(fields.annotations);

    const result = this.db
      .prepare(
        `UPDATE submissions SET
          reviewed_at = ?, reviewed_by = ?, annotations = ?, server_updated_at = ?, updated_at = ?
        WHERE id = ?
          AND (server_updated_at IS NULL OR ? IS NULL OR server_updated_at <= ?)`
      )
      .run(
        fields.reviewedAt,
        fields.reviewedBy,
        annotations,
        fields.serverUpdatedAt,
        this.timestamp(),
        id,
        fields.serverUpdatedAt,
        fields.serverUpdatedAt
      );

    return result.changes > 0;
  }

  /**
   * Remove the local record and remember that the server copy still has to
   * go, in one transaction.
   */
  deleteWithTombstone(id: string, ownerId: number): boolean {
    const apply = this.db.transaction((): boolean => {
      const result = this.db.prepare('DELETE FROM submissions WHERE id = ?').run(id);
      this.db
        .prepare(
          `INSERT INTO deletion_tombstones (submission_id, owner_id, requested_at, attempts, last_error)
           VALUES (?, ?, ?, 0, NULL)
           ON CONFLICT(submission_id) DO NOTHING`
        )
        .run(id, ownerId, this.timestamp());
      return result.changes > 0;
    });

    const deleted = apply();
    logger.info('Submission record deleted', { submissionId: id, deleted });
    return deleted;
  }

  addTombstone(submissionId: string, ownerId: number, error: string): void {
    this.db
      .prepare(
        `INSERT INTO deletion_tombstones (submission_id, owner_id, requested_at, attempts, last_error)
         VALUES (?, ?, ?, 1, ?)
         ON CONFLICT(submission_id) DO UPDATE SET attempts = attempts + 1, last_error = excluded.last_error`
      )
      .run(submissionId, ownerId, this.timestamp(), error);
  }

  listTombstones(): DeletionTombstone[] {
    return this.db
      .prepare<[], TombstoneRow>(
        'SELECT * FROM deletion_tombstones ORDER BY requested_at ASC'
      )
      .all()
      .map(row => ({
        submissionId: row.submission_id,
        ownerId: row.owner_id,
        requestedAt: row.requested_at,
        attempts: row.attempts,
        lastError: row.last_error,
      }));
  }

  removeTombstone(submissionId: string): void {
    this.db
      .prepare('DELETE FROM deletion_tombstones WHERE submission_id = ?')
      .run(submissionId);
  }
}
