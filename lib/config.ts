import path from 'path';
import { z } from 'zod';
import { ExtendedError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('config');

// Hard cap on parallel transfers regardless of UPLOAD_CONCURRENCY
export const MAX_ALLOWED_CONCURRENCY = 8;

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
  SUBMISSIONS_API_URL: z.string().url().optional(),
  SUBMISSIONS_DB_PATH: z
    .string()
    .default(path.join(process.cwd(), 'data', 'submissions.db')),
  MEDIA_DIR: z.string().default(path.join(process.cwd(), 'data', 'media')),
  UPLOAD_CONCURRENCY: intFromEnv(3, 1).transform(value =>
    Math.min(value, MAX_ALLOWED_CONCURRENCY)
  ),
  UPLOAD_MAX_ATTEMPTS: intFromEnv(5, 1),
  RETRY_INITIAL_DELAY_MS: intFromEnv(1000),
  RETRY_MAX_DELAY_MS: intFromEnv(60_000),
  RETRY_BACKOFF_MULTIPLIER: z.coerce.number().min(1).default(2),
  REQUEST_TIMEOUT_MS: intFromEnv(30_000, 1),
  TRANSFER_TIMEOUT_MS: intFromEnv(600_000, 1),
  REMOTE_NAMESPACE: z.string().min(1).default('videos'),
  SYNC_INTERVAL_MS: intFromEnv(300_000, 1),
});

export interface RetryConfig {
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
}

export interface SyncConfig {
  apiBaseUrl: string | null;
  dbPath: string;
  mediaDir: string;
  concurrency: number;
  retry: RetryConfig;
  requestTimeoutMs: number;
  transferTimeoutMs: number;
  remoteNamespace: string;
  syncIntervalMs: number;
}

/**
 * Build configuration from environment variables.
 * Empty strings count as unset so `.env` templates can leave values blank.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): SyncConfig {
  const cleaned: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      variable: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ExtendedError({
      message: `Invalid configuration: ${issues.map(i => i.variable).join(', ')}`,
      cause: parsed.error,
      details: { issues },
    });
  }

  const values = parsed.data;
  const config: SyncConfig = {
    apiBaseUrl: values.SUBMISSIONS_API_URL ?? null,
    dbPath: values.SUBMISSIONS_DB_PATH,
    mediaDir: values.MEDIA_DIR,
    concurrency: values.UPLOAD_CONCURRENCY,
    retry: {
      maxAttempts: values.UPLOAD_MAX_ATTEMPTS,
      initialDelay: values.RETRY_INITIAL_DELAY_MS,
      maxDelay: Math.max(values.RETRY_MAX_DELAY_MS, values.RETRY_INITIAL_DELAY_MS),
      backoffMultiplier: values.RETRY_BACKOFF_MULTIPLIER,
    },
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    transferTimeoutMs: values.TRANSFER_TIMEOUT_MS,
    remoteNamespace: values.REMOTE_NAMESPACE,
    syncIntervalMs: values.SYNC_INTERVAL_MS,
  };

  logger.debug('Configuration loaded', {
    apiBaseUrl: config.apiBaseUrl,
    dbPath: config.dbPath,
    mediaDir: config.mediaDir,
    concurrency: config.concurrency,
    maxAttempts: config.retry.maxAttempts,
  });

  return config;
}

/**
 * The API base URL is optional while loading so tooling can read the rest of
 * the config offline; anything that talks to the server goes through here.
 */
export function requireApiBaseUrl(config: SyncConfig): string {
  if (!config.apiBaseUrl) {
    throw new ExtendedError({
      message: 'SUBMISSIONS_API_URL is not configured',
      details: { variable: 'SUBMISSIONS_API_URL' },
    });
  }
  return config.apiBaseUrl;
}
