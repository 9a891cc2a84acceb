import { EventEmitter } from 'events';
import type { ServerOwnedFields, SubmissionRecord } from '@/types/submission';
import {
  NotFoundError,
  classifyError,
  errorMessage,
  isRetryableKind,
} from './errors';
import { createLogger } from './logger';
import type { PresignedTransferClient } from './presigned-transfer';
import type { ServerSubmission, SubmissionsApi } from './submissions-api';
import type { SubmissionsDb } from './submissions-db';
import type { UploadCoordinator } from './upload-coordinator';

const logger = createLogger('sync-reconciler');

export type SyncTrigger = 'connectivity' | 'foreground' | 'interval' | 'manual';

export interface SyncError {
  submissionId: string;
  phase: 'delete' | 'push' | 'pull';
  message: string;
}

export interface SyncReport {
  trigger: SyncTrigger;
  /** Records handed to the coordinator */
  pushed: number;
  deletionsFlushed: number;
  /** Server views fetched */
  pulled: number;
  /** Server views that changed local server-owned fields */
  merged: number;
  errors: SyncError[];
}

export interface SyncReconcilerOptions {
  db: SubmissionsDb;
  api: SubmissionsApi;
  transfer: PresignedTransferClient;
  coordinator: UploadCoordinator;
  maxAttempts: number;
}

/**
 * Normalize a server timestamp so stored stamps compare as strings
 */
function normalizeTimestamp(value: string | null | undefined): string | null {
  if (!value) return null;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : new Date(parsed).toISOString();
}

export function serverOwnedFields(view: ServerSubmission): ServerOwnedFields {
  return {
    reviewedAt: normalizeTimestamp(view.reviewedAt),
    reviewedBy: view.reviewedBy ?? null,
    annotations: view.annotations ?? null,
    serverUpdatedAt: normalizeTimestamp(view.updatedAt),
  };
}

/**
 * Records the push hands to the coordinator: everything PENDING, plus FAILED
 * records whose last error is retryable and which have attempts left.
 */
export function isPushEligible(record: SubmissionRecord, maxAttempts: number): boolean {
  if (record.status === 'PENDING') return true;
  return (
    record.status === 'FAILED' &&
    isRetryableKind(record.lastErrorKind) &&
    record.retryCount < maxAttempts
  );
}

/**
 * Brings local state and the server into agreement. Push sends what the
 * server has not seen; pull merges server-owned fields of uploaded records.
 *
 * Emits `submission:updated` for every record a pull changed.
 */
export class SyncReconciler extends EventEmitter {
  private running: Promise<SyncReport> | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly options: SyncReconcilerOptions) {
    super();
  }

  onConnectivityRegained(): Promise<SyncReport> {
    return this.run('connectivity');
  }

  onForegrounded(): Promise<SyncReport> {
    return this.run('foreground');
  }

  isRunning(): boolean {
    return this.running !== null;
  }

  /**
   * Overlapping triggers share the run already in progress
   */
  run(trigger: SyncTrigger = 'manual'): Promise<SyncReport> {
    if (this.running) {
      logger.debug('Sync already running, joining', { trigger });
      return this.running;
    }

    this.running = this.reconcile(trigger).finally(() => {
      this.running = null;
    });
    return this.running;
  }

  start(intervalMs: number): void {
    if (this.timer) {
      logger.debug('Periodic sync already started');
      return;
    }

    logger.info('Starting periodic sync', { intervalMs });
    this.timer = setInterval(() => {
      this.run('interval').catch(error => {
        logger.error('Periodic sync failed', error);
      });
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    logger.info('Periodic sync stopped');
  }

  private async reconcile(trigger: SyncTrigger): Promise<SyncReport> {
    const report: SyncReport = {
      trigger,
      pushed: 0,
      deletionsFlushed: 0,
      pulled: 0,
      merged: 0,
      errors: [],
    };

    logger.info('Sync started', { trigger });

    await this.flushDeletions(report);
    await this.push(report);
    await this.pull(report);

    logger.info('Sync finished', {
      trigger,
      pushed: report.pushed,
      deletionsFlushed: report.deletionsFlushed,
      pulled: report.pulled,
      merged: report.merged,
      errorCount: report.errors.length,
    });

    return report;
  }

  private async flushDeletions(report: SyncReport): Promise<void> {
    const { db, api } = this.options;

    for (const tombstone of db.listTombstones()) {
      try {
        await api.deleteSubmission(tombstone.submissionId);
        db.removeTombstone(tombstone.submissionId);
        report.deletionsFlushed++;
      } catch (error) {
        if (error instanceof NotFoundError) {
          db.removeTombstone(tombstone.submissionId);
          report.deletionsFlushed++;
          continue;
        }

        const message = errorMessage(error);
        db.addTombstone(tombstone.submissionId, tombstone.ownerId, message);
        report.errors.push({
          submissionId: tombstone.submissionId,
          phase: 'delete',
          message,
        });
        logger.warn('Server deletion still pending', {
          submissionId: tombstone.submissionId,
          attempts: tombstone.attempts + 1,
          error: message,
        });
      }
    }
  }

  private async push(report: SyncReport): Promise<void> {
    const { db, transfer, coordinator, maxAttempts } = this.options;

    const candidates = db
      .list({ status: ['PENDING', 'FAILED'] })
      .filter(record => isPushEligible(record, maxAttempts))
      .filter(record => !coordinator.isActive(record.id));

    for (const candidate of candidates) {
      // Deleted or claimed while an earlier record was negotiating
      const record = db.get(candidate.id);
      if (
        !record ||
        !isPushEligible(record, maxAttempts) ||
        coordinator.isActive(record.id)
      ) {
        logger.debug('Push candidate changed, skipping', { submissionId: candidate.id });
        continue;
      }

      try {
        // Idempotent on the record id; the credential is cached for the upload
        await transfer.negotiate(record);
      } catch (error) {
        const classified = classifyError(error);
        report.errors.push({
          submissionId: record.id,
          phase: 'push',
          message: classified.message,
        });
        logger.warn('Negotiation during sync failed', {
          submissionId: record.id,
          kind: classified.kind,
          error: classified.message,
        });
        // The coordinator attempt records the failure against the submission
      }

      if (!db.get(record.id)) {
        await this.undoNegotiation(record, report);
        continue;
      }

      if (coordinator.enqueue(record.id)) report.pushed++;
    }
  }

  /**
   * The record was deleted while its negotiation was in flight, so the server
   * copy that negotiation created outlived the delete.
   */
  private async undoNegotiation(
    record: SubmissionRecord,
    report: SyncReport
  ): Promise<void> {
    const { db, api, transfer } = this.options;
    transfer.discardCredential(record.id);

    try {
      await api.deleteSubmission(record.id);
      db.removeTombstone(record.id);
      logger.info('Removed server copy of a submission deleted during sync', {
        submissionId: record.id,
      });
    } catch (error) {
      if (error instanceof NotFoundError) {
        db.removeTombstone(record.id);
        return;
      }

      const message = errorMessage(error);
      db.addTombstone(record.id, record.ownerId, message);
      report.errors.push({ submissionId: record.id, phase: 'delete', message });
      logger.warn('Server deletion still pending', {
        submissionId: record.id,
        error: message,
      });
    }
  }

  private async pull(report: SyncReport): Promise<void> {
    const { db, api } = this.options;

    for (const record of db.list({ status: ['UPLOADED'] })) {
      let view: ServerSubmission;
      try {
        view = await api.getSubmission(record.id);
      } catch (error) {
        if (error instanceof NotFoundError) {
          logger.warn('Uploaded submission missing on server', {
            submissionId: record.id,
          });
          continue;
        }
        const message = errorMessage(error);
        report.errors.push({ submissionId: record.id, phase: 'pull', message });
        logger.warn('Pull failed', { submissionId: record.id, error: message });
        continue;
      }

      report.pulled++;

      if (view.id !== record.id) {
        report.errors.push({
          submissionId: record.id,
          phase: 'pull',
          message: `Server returned submission ${view.id}`,
        });
        continue;
      }

      const fields = serverOwnedFields(view);
      if (!this.changes(record, fields)) continue;

      if (db.applyServerFields(record.id, fields)) {
        report.merged++;
        this.emit('submission:updated', db.require(record.id));
        logger.debug('Merged server fields', {
          submissionId: record.id,
          serverUpdatedAt: fields.serverUpdatedAt,
        });
      } else {
        logger.debug('Dropped stale server view', {
          submissionId: record.id,
          storedUpdatedAt: record.serverUpdatedAt,
          receivedUpdatedAt: fields.serverUpdatedAt,
        });
      }
    }
  }

  private changes(record: SubmissionRecord, fields: ServerOwnedFields): boolean {
    return (
      record.reviewedAt !== fields.reviewedAt ||
      record.reviewedBy !== fields.reviewedBy ||
      record.serverUpdatedAt !== fields.serverUpdatedAt ||
      JSON.stringify(record.annotations) !== JSON.stringify(fields.annotations)
    );
  }
}
