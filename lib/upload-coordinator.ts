import { EventEmitter } from 'events';
import type { StatusUpdate, SubmissionRecord } from '@/types/submission';
import { systemClock, type Clock } from './clock';
import {
  CancelledError,
  FinalizeError,
  InvalidTransitionError,
  LocalStorageError,
  classifyError,
  type SubmissionError,
} from './errors';
import { createLogger } from './logger';
import type { LocalMediaStore } from './media-store';
import type { PresignedTransferClient } from './presigned-transfer';
import { retryWithBackoff, type BackoffPolicy } from './retry';
import type { SubmissionsDb } from './submissions-db';
import { UploadRateTracker, type UploadStats } from './upload-rate-tracker';

const logger = createLogger('upload-coordinator');

export type CancelIntent = 'requeue' | 'delete';

export interface UploadCoordinatorOptions {
  db: SubmissionsDb;
  store: LocalMediaStore;
  transfer: PresignedTransferClient;
  backoff: BackoffPolicy;
  concurrency: number;
  /** Attempts per record before it stays FAILED until a manual retry */
  maxAttempts: number;
  clock?: Clock;
}

interface InFlightTransfer {
  controller: AbortController;
  intent: CancelIntent;
  task: Promise<void>;
  /** Retry count to back off from once the worker has released the id */
  retryAfter: number | null;
}

/**
 * Drives queued submissions through negotiate, transfer and finalize with a
 * bounded number of concurrent transfers.
 *
 * An id is in at most one of: the FIFO queue, the in-flight map, the retry
 * timers. That is the only place a transfer for it can start.
 *
 * Emits `submission:updated` with the persisted record after every status
 * change and `idle` when no work is left.
 */
export class UploadCoordinator extends EventEmitter {
  private readonly queue: string[] = [];
  private readonly inFlight = new Map<string, InFlightTransfer>();
  private readonly retryTimers = new Map<string, AbortController>();
  private readonly rateTracker: UploadRateTracker;
  private readonly clock: Clock;
  private idleWaiters: Array<() => void> = [];
  private stopped = false;

  constructor(private readonly options: UploadCoordinatorOptions) {
    super();
    this.clock = options.clock ?? systemClock;
    this.rateTracker = new UploadRateTracker(this.clock);
  }

  get concurrency(): number {
    return this.options.concurrency;
  }

  /**
   * Offer a record for upload. Returns false when the id already has work
   * queued, running or scheduled.
   */
  enqueue(id: string): boolean {
    if (this.stopped) {
      logger.warn('Coordinator stopped, ignoring enqueue', { submissionId: id });
      return false;
    }
    if (this.isActive(id)) {
      logger.debug('Submission already has upload work, skipping', {
        submissionId: id,
      });
      return false;
    }

    this.queue.push(id);
    logger.debug('Submission enqueued', {
      submissionId: id,
      queueLength: this.queue.length,
    });
    this.pump();
    return true;
  }

  isActive(id: string): boolean {
    return (
      this.queue.includes(id) || this.inFlight.has(id) || this.retryTimers.has(id)
    );
  }

  activeCount(): number {
    return this.inFlight.size;
  }

  queuedCount(): number {
    return this.queue.length;
  }

  /**
   * Cancel all work for an id and wait until any in-flight attempt has
   * settled. `requeue` puts an interrupted record back to PENDING; `delete`
   * leaves it to the deletion path. A record whose finalize was already
   * acknowledged stays UPLOADED.
   */
  async cancel(id: string, { intent }: { intent: CancelIntent }): Promise<void> {
    const index = this.queue.indexOf(id);
    if (index !== -1) {
      this.queue.splice(index, 1);
      logger.debug('Removed queued submission', { submissionId: id, intent });
    }

    const timer = this.retryTimers.get(id);
    if (timer) {
      this.retryTimers.delete(id);
      timer.abort();
      logger.debug('Cancelled scheduled retry', { submissionId: id, intent });
    }

    const running = this.inFlight.get(id);
    if (running) {
      running.intent = intent;
      running.controller.abort();
      logger.info('Cancelling in-flight upload', { submissionId: id, intent });
      await running.task;
    }

    this.checkIdle();
  }

  /**
   * Manual retry of a FAILED record: resets the retry bookkeeping, then
   * starts a fresh attempt ahead of any scheduled backoff.
   */
  async retryNow(id: string): Promise<SubmissionRecord> {
    const current = this.options.db.require(id);
    if (current.status !== 'FAILED') {
      throw new InvalidTransitionError({
        message: `Only failed submissions can be retried (status ${current.status})`,
        details: { submissionId: id, status: current.status },
      });
    }

    await this.cancel(id, { intent: 'requeue' });
    const record = this.options.db.resetRetries(id);
    this.emit('submission:updated', record);
    logger.info('Manual retry requested', { submissionId: id });
    this.enqueue(id);
    return record;
  }

  /**
   * Resolves once nothing is queued, running or waiting on a backoff timer
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  getUploadStats(): UploadStats {
    return this.rateTracker.getStats();
  }

  /**
   * Stop accepting work, drop scheduled retries and put in-flight records
   * back to PENDING.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    logger.info('Stopping upload coordinator', {
      queued: this.queue.length,
      inFlight: this.inFlight.size,
      scheduledRetries: this.retryTimers.size,
    });

    this.queue.length = 0;
    for (const timer of this.retryTimers.values()) timer.abort();
    this.retryTimers.clear();

    const tasks: Promise<void>[] = [];
    for (const running of this.inFlight.values()) {
      running.intent = 'requeue';
      running.controller.abort();
      tasks.push(running.task);
    }
    await Promise.all(tasks);

    this.checkIdle();
  }

  private isIdle(): boolean {
    return (
      this.queue.length === 0 &&
      this.inFlight.size === 0 &&
      this.retryTimers.size === 0
    );
  }

  private checkIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
    this.emit('idle');
  }

  private pump(): void {
    while (!this.stopped && this.inFlight.size < this.options.concurrency) {
      const id = this.queue.shift();
      if (id === undefined) break;
      this.start(id);
    }
  }

  private start(id: string): void {
    const controller = new AbortController();
    const entry: InFlightTransfer = {
      controller,
      intent: 'requeue',
      task: Promise.resolve(),
      retryAfter: null,
    };
    this.inFlight.set(id, entry);

    logger.debug('Worker picked submission', {
      submissionId: id,
      inFlight: this.inFlight.size,
      concurrency: this.options.concurrency,
    });

    entry.task = this.process(id, entry)
      .catch(error => {
        logger.error('Upload task failed unexpectedly', error, {
          submissionId: id,
        });
      })
      .finally(() => {
        this.inFlight.delete(id);
        if (
          entry.retryAfter !== null &&
          !entry.controller.signal.aborted &&
          !this.stopped
        ) {
          this.scheduleRetry(id, entry.retryAfter);
        }
        this.pump();
        this.checkIdle();
      });
  }

  private updateStatus(id: string, update: StatusUpdate): SubmissionRecord {
    const record = this.options.db.updateStatus(id, update);
    this.emit('submission:updated', record);
    return record;
  }

  private async process(id: string, entry: InFlightTransfer): Promise<void> {
    const { db, transfer } = this.options;
    const { signal } = entry.controller;

    const current = db.get(id);
    if (!current) {
      logger.warn('Submission no longer exists, skipping upload', {
        submissionId: id,
      });
      return;
    }
    if (current.status !== 'PENDING' && current.status !== 'FAILED') {
      logger.debug('Submission not uploadable in its current status', {
        submissionId: id,
        status: current.status,
      });
      return;
    }

    const record = this.updateStatus(id, { status: 'UPLOADING' });

    try {
      await this.assertMediaPresent(record);

      const receipt = await transfer.upload(record, signal);

      // Bytes landed: only the finalize call is retried from here
      const keys = await retryWithBackoff(
        () => transfer.finalize(record, receipt, signal),
        {
          maxRetries: this.options.maxAttempts - 1,
          backoff: this.options.backoff,
          clock: this.clock,
          signal,
          shouldRetry: error => error instanceof FinalizeError,
          onRetry: (error, attempt) => {
            logger.warn('Finalize not acknowledged, retrying', {
              submissionId: id,
              attempt,
            });
            this.emit(
              'submission:updated',
              db.recordError(id, error.message, 'finalize')
            );
          },
        }
      );

      const uploaded = this.updateStatus(id, {
        status: 'UPLOADED',
        remoteVideoKey: keys.videoKey,
        remoteThumbnailKey: keys.thumbnailKey,
        lastError: null,
        lastErrorKind: null,
      });
      this.rateTracker.addUpload(receipt.videoBytes + receipt.thumbnailBytes);

      logger.info('Submission uploaded', {
        submissionId: id,
        videoKey: uploaded.remoteVideoKey,
        retryCount: uploaded.retryCount,
      });
    } catch (error) {
      this.handleFailure(id, entry, classifyError(error));
    }
  }

  private async assertMediaPresent(record: SubmissionRecord): Promise<void> {
    const { store } = this.options;
    const missing: string[] = [];
    if (!(await store.exists(record.id, 'video'))) missing.push('video');
    if (
      record.localThumbnailPath !== null &&
      !(await store.exists(record.id, 'thumbnail'))
    ) {
      missing.push('thumbnail');
    }
    if (missing.length > 0) {
      throw new LocalStorageError({
        message: `Backing media missing: ${missing.join(', ')}`,
        details: { submissionId: record.id, missing },
      });
    }
  }

  private handleFailure(
    id: string,
    entry: InFlightTransfer,
    error: SubmissionError
  ): void {
    if (error instanceof CancelledError || entry.controller.signal.aborted) {
      if (entry.intent === 'delete') {
        logger.info('Upload cancelled for deletion', { submissionId: id });
        return;
      }
      this.updateStatus(id, { status: 'PENDING' });
      logger.info('Upload cancelled, submission back to pending', {
        submissionId: id,
      });
      return;
    }

    const current = this.options.db.require(id);
    const retryCount = current.retryCount + 1;
    this.updateStatus(id, {
      status: 'FAILED',
      retryCount,
      lastError: error.message,
      lastErrorKind: error.kind,
    });

    const willRetry =
      error.retryable && retryCount < this.options.maxAttempts && !this.stopped;

    if (error.retryable) {
      logger.warn('Upload attempt failed', {
        submissionId: id,
        kind: error.kind,
        error: error.message,
        retryCount,
        maxAttempts: this.options.maxAttempts,
        willRetry,
      });
    } else {
      logger.error('Upload failed with a non-retryable error', error, {
        submissionId: id,
        kind: error.kind,
        retryCount,
      });
    }

    if (willRetry) entry.retryAfter = retryCount;
  }

  private scheduleRetry(id: string, retryCount: number): void {
    const delay = this.options.backoff.delayFor(retryCount - 1);
    const controller = new AbortController();
    this.retryTimers.set(id, controller);

    logger.info('Scheduling automatic retry', {
      submissionId: id,
      retryCount,
      delayMs: delay,
    });

    this.clock
      .sleep(delay, controller.signal)
      .then(
        () => {
          if (this.retryTimers.get(id) !== controller) return;
          this.retryTimers.delete(id);
          if (!this.enqueue(id)) {
            logger.warn('Automatic retry not queued', { submissionId: id });
          }
        },
        error => {
          if (this.retryTimers.get(id) === controller) this.retryTimers.delete(id);
          if (!(error instanceof CancelledError)) {
            logger.error('Retry timer failed', error, { submissionId: id });
          }
        }
      )
      .catch(error => {
        logger.error('Failed to requeue submission after backoff', error, {
          submissionId: id,
        });
      })
      .finally(() => this.checkIdle());
  }
}
