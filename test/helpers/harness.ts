import fs from 'fs';
import os from 'os';
import path from 'path';
import type { SubmissionRecord } from '@/types/submission';
import { LocalMediaStore } from '@/lib/media-store';
import { PresignedTransferClient } from '@/lib/presigned-transfer';
import { createBackoffPolicy } from '@/lib/retry';
import { IN_MEMORY, closeDatabase, openDatabase, type SqliteDatabase } from '@/lib/sqlite-db';
import { SubmissionsApi } from '@/lib/submissions-api';
import { SubmissionsDb } from '@/lib/submissions-db';
import { SubmissionsManager } from '@/lib/submissions-manager';
import { SyncReconciler } from '@/lib/sync-reconciler';
import { UploadCoordinator } from '@/lib/upload-coordinator';
import { API_BASE_URL, FakeBackend, TEST_TOKEN } from './fake-backend';
import { ManualClock } from './manual-clock';

export interface HarnessOptions {
  concurrency?: number;
  maxAttempts?: number;
  autoAdvance?: boolean;
}

export interface Harness {
  database: SqliteDatabase;
  db: SubmissionsDb;
  store: LocalMediaStore;
  backend: FakeBackend;
  clock: ManualClock;
  api: SubmissionsApi;
  transfer: PresignedTransferClient;
  coordinator: UploadCoordinator;
  reconciler: SyncReconciler;
  manager: SubmissionsManager;
  /** Every record the coordinator emitted, in order */
  updates: SubmissionRecord[];
  cleanup: () => Promise<void>;
}

export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'submission-sync-'));
}

/**
 * Fully wired subsystem over an in-memory database, a temp media directory
 * and the fake backend. Backoff jitter is zero, so delays are exactly
 * 1000 * 2^n.
 */
export function createHarness(options: HarnessOptions = {}): Harness {
  const mediaDir = createTempDir();
  const database = openDatabase(IN_MEMORY);
  const clock = new ManualClock(undefined, options.autoAdvance ?? true);
  const db = new SubmissionsDb(database, clock);
  const store = new LocalMediaStore(mediaDir);
  const backend = new FakeBackend();
  const maxAttempts = options.maxAttempts ?? 5;

  const api = new SubmissionsApi({
    baseUrl: API_BASE_URL,
    getToken: () => TEST_TOKEN,
    timeoutMs: 30_000,
    fetchImpl: backend.fetch,
  });

  const transfer = new PresignedTransferClient({
    api,
    store,
    transferTimeoutMs: 60_000,
    remoteNamespace: 'videos',
    clock,
    fetchImpl: backend.fetch,
  });

  const coordinator = new UploadCoordinator({
    db,
    store,
    transfer,
    backoff: createBackoffPolicy({
      initialDelay: 1000,
      maxDelay: 60_000,
      backoffMultiplier: 2,
      random: () => 0,
    }),
    concurrency: options.concurrency ?? 3,
    maxAttempts,
    clock,
  });

  const reconciler = new SyncReconciler({
    db,
    api,
    transfer,
    coordinator,
    maxAttempts,
  });

  const manager = new SubmissionsManager({
    db,
    store,
    api,
    coordinator,
    reconciler,
    maxAttempts,
    syncIntervalMs: 300_000,
  });

  const updates: SubmissionRecord[] = [];
  coordinator.on('submission:updated', (record: SubmissionRecord) => {
    updates.push(record);
  });

  return {
    database,
    db,
    store,
    backend,
    clock,
    api,
    transfer,
    coordinator,
    reconciler,
    manager,
    updates,
    cleanup: async () => {
      backend.release();
      await manager.shutdown();
      closeDatabase(database);
      fs.rmSync(mediaDir, { recursive: true, force: true });
    },
  };
}

export function videoBytes(size = 1024, fill = 7): Uint8Array {
  return new Uint8Array(size).fill(fill);
}

/**
 * Write media and insert a PENDING record directly, bypassing the manager
 */
export async function seedSubmission(
  harness: Harness,
  id: string,
  options: { ownerId?: number; thumbnail?: boolean } = {}
): Promise<SubmissionRecord> {
  const video = videoBytes(1024);
  const thumbnail = options.thumbnail ? videoBytes(64, 1) : null;

  const localVideoPath = await harness.store.save(video, id, 'video');
  const localThumbnailPath = thumbnail
    ? await harness.store.save(thumbnail, id, 'thumbnail')
    : null;

  return harness.db.insert({
    id,
    ownerId: options.ownerId ?? 2,
    context: { kind: 'none' },
    localVideoPath,
    localThumbnailPath,
    videoByteLength: video.byteLength,
    thumbnailByteLength: thumbnail?.byteLength ?? null,
    durationSeconds: 30,
    notes: null,
  });
}
