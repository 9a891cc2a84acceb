import type { SubmissionRecord, SubmissionStatus } from '@/types/submission';
import { InvalidTransitionError } from './errors';

/**
 * Allowed status transitions. Deletion is not a status: it removes the row
 * and is permitted from every state.
 *
 * UPLOADING -> PENDING covers cancellation before finalize and recovery of
 * a transfer interrupted by a process restart.
 */
const TRANSITIONS: Record<SubmissionStatus, readonly SubmissionStatus[]> = {
  PENDING: ['UPLOADING'],
  UPLOADING: ['UPLOADED', 'FAILED', 'PENDING'],
  FAILED: ['UPLOADING'],
  UPLOADED: [],
};

export function canTransition(
  from: SubmissionStatus,
  to: SubmissionStatus
): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(
  from: SubmissionStatus,
  to: SubmissionStatus,
  submissionId?: string
): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError({
      message: `Invalid submission transition ${from} -> ${to}`,
      details: { submissionId, from, to },
    });
  }
}

/**
 * UPLOADED is final; FAILED only leaves through a retry.
 */
export function isTerminal(status: SubmissionStatus): boolean {
  return status === 'UPLOADED' || status === 'FAILED';
}

/**
 * Statuses whose backing file must exist on disk
 */
export function requiresLocalMedia(status: SubmissionStatus): boolean {
  return status === 'PENDING' || status === 'UPLOADING';
}

/**
 * Structural invariants that hold for every persisted record. File existence
 * is checked separately against the media store.
 */
export function assertRecordInvariants(record: SubmissionRecord): void {
  const uploaded = record.status === 'UPLOADED';

  if (uploaded && record.remoteVideoKey === null) {
    throw new InvalidTransitionError({
      message: 'Uploaded submission has no remote video key',
      details: { submissionId: record.id },
    });
  }

  if (!uploaded && (record.remoteVideoKey !== null || record.remoteThumbnailKey !== null)) {
    throw new InvalidTransitionError({
      message: 'Remote keys present on a submission that is not uploaded',
      details: { submissionId: record.id, status: record.status },
    });
  }

  if (record.retryCount < 0) {
    throw new InvalidTransitionError({
      message: 'Negative retry count',
      details: { submissionId: record.id, retryCount: record.retryCount },
    });
  }
}
