export * from '@/types/submission';
export * from '@/types/transfer';
export { systemClock, type Clock } from './clock';
export {
  MAX_ALLOWED_CONCURRENCY,
  loadConfig,
  requireApiBaseUrl,
  type RetryConfig,
  type SyncConfig,
} from './config';
export * from './errors';
export type { FetchLike } from './http';
export { Logger, createLogger, type LogContext, type LogLevel } from './logger';
export { LocalMediaStore } from './media-store';
export {
  MAX_CREDENTIAL_REFRESHES,
  PresignedTransferClient,
  buildRemoteKeys,
  type PresignedTransferOptions,
} from './presigned-transfer';
export {
  calculateDelay,
  createBackoffPolicy,
  retryWithBackoff,
  type BackoffOptions,
  type BackoffPolicy,
  type RetryOptions,
} from './retry';
export { IN_MEMORY, closeDatabase, openDatabase, type SqliteDatabase } from './sqlite-db';
export {
  assertRecordInvariants,
  assertTransition,
  canTransition,
  isTerminal,
  requiresLocalMedia,
} from './status-machine';
export {
  SubmissionsApi,
  type NegotiateResponse,
  type FinalizeResponse,
  type PlaybackUrlResponse,
  type ServerSubmission,
  type ServerSubmissionSummary,
  type SubmissionListQuery,
  type SubmissionsApiOptions,
  type TokenProvider,
} from './submissions-api';
export {
  SubmissionsDb,
  type DeletionTombstone,
  type NewSubmission,
  type SubmissionFilter,
} from './submissions-db';
export {
  SubmissionsManager,
  createSubmissionsManager,
  toSnapshot,
  type CreateSubmissionInput,
  type CreateSubmissionsManagerOptions,
  type PlaybackUrl,
  type RecoveryReport,
  type SubmissionsManagerOptions,
} from './submissions-manager';
export {
  SyncReconciler,
  isPushEligible,
  type SyncError,
  type SyncReconcilerOptions,
  type SyncReport,
  type SyncTrigger,
} from './sync-reconciler';
export {
  UploadCoordinator,
  type CancelIntent,
  type UploadCoordinatorOptions,
} from './upload-coordinator';
export type { UploadStats } from './upload-rate-tracker';
