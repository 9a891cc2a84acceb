/**
 * Submission types
 */

import type { SubmissionErrorKind } from '@/lib/errors';

/**
 * Lifecycle status of a submission, always durably persisted
 */
export type SubmissionStatus = 'PENDING' | 'UPLOADING' | 'UPLOADED' | 'FAILED';

export const SUBMISSION_STATUSES: readonly SubmissionStatus[] = [
  'PENDING',
  'UPLOADING',
  'UPLOADED',
  'FAILED',
];

/**
 * What the practice video was recorded for. At most one reference at a time.
 */
export type SubmissionContext =
  | { kind: 'exercise'; exerciseId: string }
  | { kind: 'piece'; pieceId: string }
  | { kind: 'session'; sessionId: string }
  | { kind: 'none' };

/**
 * Annotations layered on top of a finalized submission by downstream
 * features (markers, mastery). Opaque to this package.
 */
export type ServerAnnotations = Record<string, unknown>;

/**
 * A single practice video submission
 */
export interface SubmissionRecord {
  id: string; // Client-generated UUID, also the idempotency key
  ownerId: number;
  context: SubmissionContext;

  localVideoPath: string;
  localThumbnailPath: string | null;
  videoByteLength: number;
  thumbnailByteLength: number | null;

  remoteVideoKey: string | null; // Set once UPLOADED, never replaced
  remoteThumbnailKey: string | null;

  durationSeconds: number;
  notes: string | null;

  status: SubmissionStatus;
  retryCount: number;
  lastError: string | null;
  lastErrorKind: SubmissionErrorKind | null;

  // Server-owned, written only by the reconciler pull
  reviewedAt: string | null;
  reviewedBy: number | null;
  annotations: ServerAnnotations | null;
  serverUpdatedAt: string | null;

  createdAt: string; // ISO timestamp
  updatedAt: string; // ISO timestamp
}

/**
 * Read-only view handed to UI and downstream features
 */
export type SubmissionSnapshot = Readonly<
  Omit<SubmissionRecord, 'context' | 'annotations'> & {
    context: Readonly<SubmissionContext>;
    annotations: Readonly<ServerAnnotations> | null;
  }
>;

/**
 * Fields owned by the server and merged in by the reconciler
 */
export interface ServerOwnedFields {
  reviewedAt: string | null;
  reviewedBy: number | null;
  annotations: ServerAnnotations | null;
  serverUpdatedAt: string | null;
}

/**
 * Status/retry bookkeeping written by the upload coordinator
 */
export interface StatusUpdate {
  status: SubmissionStatus;
  retryCount?: number;
  lastError?: string | null;
  lastErrorKind?: SubmissionErrorKind | null;
  remoteVideoKey?: string;
  remoteThumbnailKey?: string | null;
}

export interface RemoteKeys {
  videoKey: string;
  thumbnailKey: string | null;
}

export type MediaKind = 'video' | 'thumbnail';
