/**
 * Application server protocol types
 *
 * Payloads are camelCase JSON. Response types are inferred from the zod
 * schemas in lib/submissions-api.ts so runtime validation and types agree.
 */

import type { SubmissionContext } from './submission';

/**
 * Body of POST /submissions. Repeating it with the same id never creates a
 * second server record.
 */
export interface NegotiateRequest {
  id: string;
  ownerId: number;
  context: SubmissionContext;
  durationSeconds: number;
  notes: string | null;
  video: { contentType: string; contentLength: number };
  thumbnail: { contentType: string; contentLength: number } | null;
}

/**
 * An upload credential held by the client, with its absolute expiry
 */
export interface UploadCredential {
  submissionId: string;
  uploadUrl: string;
  thumbnailUploadUrl: string | null;
  issuedAt: number; // epoch ms, clock based
  expiresAt: number;
}

/**
 * Bytes confirmed in object storage, not yet finalized
 */
export interface TransferReceipt {
  submissionId: string;
  videoBytes: number;
  thumbnailBytes: number;
  negotiations: number;
}
