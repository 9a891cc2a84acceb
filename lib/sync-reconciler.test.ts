import { describe, it, expect, afterEach, vi } from 'vitest';
import { createHarness, seedSubmission, type Harness } from '@/test/helpers/harness';
import type { SubmissionErrorKind } from './errors';
import { isPushEligible } from './sync-reconciler';

describe('SyncReconciler', () => {
  let h: Harness;

  afterEach(async () => {
    vi.useRealTimers();
    await h.cleanup();
  });

  async function seedFailed(id: string, retryCount: number, kind: SubmissionErrorKind) {
    await seedSubmission(h, id);
    h.db.updateStatus(id, { status: 'UPLOADING' });
    return h.db.updateStatus(id, {
      status: 'FAILED',
      retryCount,
      lastError: 'earlier failure',
      lastErrorKind: kind,
    });
  }

  async function seedUploaded(id: string) {
    await seedSubmission(h, id);
    h.coordinator.enqueue(id);
    await h.coordinator.onIdle();
    return h.db.require(id);
  }

  it('pushes pending records with one negotiation each', async () => {
    h = createHarness();
    await seedSubmission(h, 'a');
    await seedSubmission(h, 'b');

    const report = await h.reconciler.run();
    await h.coordinator.onIdle();

    expect(report).toEqual({
      trigger: 'manual',
      pushed: 2,
      deletionsFlushed: 0,
      pulled: 0,
      merged: 0,
      errors: [],
    });
    expect(h.db.list().map(record => record.status)).toEqual(['UPLOADED', 'UPLOADED']);
    expect(h.backend.calls.negotiate).toBe(2);
  });

  it('pushes only FAILED records still eligible for automatic retry', async () => {
    h = createHarness();
    await seedFailed('retryable', 1, 'transient_network');
    await seedFailed('fatal', 1, 'quota_or_validation');
    await seedFailed('exhausted', 5, 'transient_network');

    const report = await h.reconciler.onConnectivityRegained();
    await h.coordinator.onIdle();

    expect(report.trigger).toBe('connectivity');
    expect(report.pushed).toBe(1);
    expect(h.db.require('retryable').status).toBe('UPLOADED');
    expect(h.db.require('fatal').status).toBe('FAILED');
    expect(h.db.require('exhausted').status).toBe('FAILED');
  });

  it('skips records the coordinator is already working on', async () => {
    h = createHarness();
    await seedSubmission(h, 'a');
    h.backend.hold('put');
    h.coordinator.enqueue('a');
    await h.backend.waitForHeld(1);

    const report = await h.reconciler.run();

    expect(report.pushed).toBe(0);
    expect(h.backend.calls.negotiate).toBe(1);
    h.backend.release();
    await h.coordinator.onIdle();
  });

  it('still hands off a record whose negotiation failed', async () => {
    h = createHarness();
    await seedSubmission(h, 'a');
    h.backend.failNext('negotiate', 503);

    const report = await h.reconciler.run();
    await h.coordinator.onIdle();

    expect(report.pushed).toBe(1);
    expect(report.errors).toEqual([
      {
        submissionId: 'a',
        phase: 'push',
        message: 'Negotiate upload failed: HTTP 503',
      },
    ]);
    expect(h.db.require('a').status).toBe('UPLOADED');
    expect(h.backend.calls.negotiate).toBe(2);
  });

  it('does not negotiate for a record deleted while an earlier one negotiates', async () => {
    h = createHarness();
    await seedSubmission(h, 'a');
    await seedSubmission(h, 'b');
    h.backend.hold('negotiate');

    const running = h.reconciler.run();
    await h.backend.waitForHeld(1);
    await h.manager.deleteSubmission('b');
    h.backend.release();

    const report = await running;
    await h.coordinator.onIdle();

    expect(report.pushed).toBe(1);
    expect(report.errors).toEqual([]);
    expect(h.backend.negotiations.has('b')).toBe(false);
    expect(h.backend.records.has('b')).toBe(false);
    expect(h.db.get('b')).toBeNull();
    expect(h.db.listTombstones()).toEqual([]);
    expect(h.db.require('a').status).toBe('UPLOADED');
  });

  it('deletes the server copy of a record deleted during its negotiation', async () => {
    h = createHarness();
    await seedSubmission(h, 'a');
    h.backend.hold('negotiate');

    const running = h.reconciler.run();
    await h.backend.waitForHeld(1);
    await h.manager.deleteSubmission('a');
    h.backend.release();

    const report = await running;
    await h.coordinator.onIdle();

    expect(report.pushed).toBe(0);
    expect(report.errors).toEqual([]);
    expect(h.backend.negotiations.get('a')).toBe(1);
    expect(h.backend.records.has('a')).toBe(false);
    expect(h.backend.calls.delete).toBe(2);
    expect(h.backend.calls.put).toBe(0);
    expect(h.transfer.cachedCredential('a')).toBeNull();
    expect(h.db.listTombstones()).toEqual([]);
  });

  it('keeps a tombstone when the late server deletion fails', async () => {
    h = createHarness();
    await seedSubmission(h, 'a');
    h.backend.hold('negotiate');
    // The first answers the user's delete, the second the cleanup after negotiation
    h.backend.failNext('delete', 404, 503);

    const running = h.reconciler.run();
    await h.backend.waitForHeld(1);
    await h.manager.deleteSubmission('a');
    h.backend.release();

    const report = await running;

    expect(report.errors).toEqual([
      { submissionId: 'a', phase: 'delete', message: 'Delete submission failed: HTTP 503' },
    ]);
    expect(h.backend.records.has('a')).toBe(true);
    expect(h.db.listTombstones()).toMatchObject([
      { submissionId: 'a', attempts: 1, lastError: 'Delete submission failed: HTTP 503' },
    ]);

    const retry = await h.reconciler.run();

    expect(retry.deletionsFlushed).toBe(1);
    expect(h.backend.records.has('a')).toBe(false);
    expect(h.db.listTombstones()).toEqual([]);
  });

  it('merges server-owned fields without touching client fields', async () => {
    h = createHarness();
    const uploaded = await seedUploaded('a');
    h.backend.review('a', {
      reviewedAt: '2024-05-03T08:00:00Z',
      reviewedBy: 9,
      annotations: { markers: [{ at: 12.5, label: 'rushing' }] },
      updatedAt: '2024-05-03T08:00:00Z',
    });
    const changed: string[] = [];
    h.reconciler.on('submission:updated', (record: { id: string }) => {
      changed.push(record.id);
    });

    const report = await h.reconciler.run();

    expect(report).toMatchObject({ pulled: 1, merged: 1, errors: [] });
    expect(changed).toEqual(['a']);

    const record = h.db.require('a');
    expect(record).toMatchObject({
      reviewedAt: '2024-05-03T08:00:00.000Z',
      reviewedBy: 9,
      annotations: { markers: [{ at: 12.5, label: 'rushing' }] },
      serverUpdatedAt: '2024-05-03T08:00:00.000Z',
      status: 'UPLOADED',
      remoteVideoKey: uploaded.remoteVideoKey,
      notes: uploaded.notes,
      durationSeconds: 30,
    });
  });

  it('does not re-merge an unchanged view', async () => {
    h = createHarness();
    await seedUploaded('a');
    await h.reconciler.run();

    const report = await h.reconciler.run();

    expect(report).toMatchObject({ pulled: 1, merged: 0 });
  });

  it('drops a server view older than the stored one', async () => {
    h = createHarness();
    await seedUploaded('a');
    h.backend.review('a', {
      reviewedAt: '2024-05-03T08:00:00Z',
      reviewedBy: 9,
      annotations: null,
      updatedAt: '2024-05-03T08:00:00Z',
    });
    await h.reconciler.run();

    h.backend.review('a', {
      reviewedAt: '2024-05-02T08:00:00Z',
      reviewedBy: 99,
      annotations: null,
      updatedAt: '2024-05-02T08:00:00Z',
    });
    const report = await h.reconciler.run();

    expect(report).toMatchObject({ pulled: 1, merged: 0 });
    expect(h.db.require('a').reviewedBy).toBe(9);
  });

  it('leaves a record alone when the server no longer has it', async () => {
    h = createHarness();
    const before = await seedUploaded('a');
    h.backend.records.delete('a');

    const report = await h.reconciler.run();

    expect(report).toMatchObject({ pulled: 0, merged: 0, errors: [] });
    expect(h.db.require('a')).toEqual(before);
  });

  it('reports pull failures and carries on', async () => {
    h = createHarness();
    await seedUploaded('a');
    await seedUploaded('b');
    h.backend.failNext('get', 500);

    const report = await h.reconciler.run();

    expect(report.pulled).toBe(1);
    expect(report.errors).toEqual([
      { submissionId: 'a', phase: 'pull', message: 'Fetch submission failed: HTTP 500' },
    ]);
  });

  it('flushes deletion tombstones', async () => {
    h = createHarness();
    await seedUploaded('a');
    h.db.deleteWithTombstone('a', 2);
    h.db.addTombstone('gone-already', 2, 'fetch failed');

    const report = await h.reconciler.run();

    expect(report.deletionsFlushed).toBe(2);
    expect(h.db.listTombstones()).toEqual([]);
    expect(h.backend.records.has('a')).toBe(false);
    expect(h.backend.objects.size).toBe(0);
  });

  it('keeps a tombstone whose deletion failed again', async () => {
    h = createHarness();
    h.db.addTombstone('a', 2, 'fetch failed');
    h.backend.failNext('delete', 503);

    const report = await h.reconciler.run();

    expect(report.deletionsFlushed).toBe(0);
    expect(report.errors).toEqual([
      { submissionId: 'a', phase: 'delete', message: 'Delete submission failed: HTTP 503' },
    ]);
    expect(h.db.listTombstones()).toMatchObject([
      { submissionId: 'a', attempts: 2, lastError: 'Delete submission failed: HTTP 503' },
    ]);
  });

  it('coalesces overlapping triggers into one run', async () => {
    h = createHarness();

    const first = h.reconciler.onConnectivityRegained();
    const second = h.reconciler.onForegrounded();

    expect(second).toBe(first);
    expect(h.reconciler.isRunning()).toBe(true);
    await first;
    expect(h.reconciler.isRunning()).toBe(false);
  });

  it('runs periodically until stopped', async () => {
    h = createHarness();
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
    const run = vi.spyOn(h.reconciler, 'run');

    h.reconciler.start(1000);
    vi.advanceTimersByTime(2000);
    expect(run).toHaveBeenCalledTimes(2);
    expect(run).toHaveBeenCalledWith('interval');

    h.reconciler.stop();
    vi.advanceTimersByTime(5000);
    expect(run).toHaveBeenCalledTimes(2);

    await h.reconciler.run();
  });
});

describe('isPushEligible', () => {
  let h: Harness;

  afterEach(async () => {
    await h.cleanup();
  });

  async function failedWith(id: string, retryCount: number, kind: SubmissionErrorKind) {
    await seedSubmission(h, id);
    h.db.updateStatus(id, { status: 'UPLOADING' });
    return h.db.updateStatus(id, {
      status: 'FAILED',
      retryCount,
      lastError: 'earlier failure',
      lastErrorKind: kind,
    });
  }

  it('accepts PENDING records', async () => {
    h = createHarness();
    const record = await seedSubmission(h, 'sub-1');

    expect(isPushEligible(record, 5)).toBe(true);
  });

  it('accepts FAILED records with a retryable error and attempts left', async () => {
    h = createHarness();

    expect(isPushEligible(await failedWith('sub-1', 4, 'expired_credential'), 5)).toBe(
      true
    );
  });

  it('rejects exhausted and fatal FAILED records', async () => {
    h = createHarness();

    expect(isPushEligible(await failedWith('sub-1', 5, 'transient_network'), 5)).toBe(
      false
    );
    expect(isPushEligible(await failedWith('sub-2', 1, 'authorization'), 5)).toBe(false);
  });
});
