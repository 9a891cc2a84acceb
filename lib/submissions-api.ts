import { z } from 'zod';
import type { NegotiateRequest } from '@/types/transfer';
import { AuthorizationError, TransientNetworkError } from './errors';
import { errorFromResponse, fetchWithTimeout, type FetchLike } from './http';
import { createLogger } from './logger';

const logger = createLogger('submissions-api');

export const NegotiateResponseSchema = z.object({
  id: z.string(),
  uploadUrl: z.string().url(),
  thumbnailUploadUrl: z.string().url().nullish(),
  expiresIn: z.number().nonnegative(),
});

export const FinalizeResponseSchema = z.object({
  id: z.string(),
  videoKey: z.string().min(1).nullish(),
  thumbnailKey: z.string().min(1).nullish(),
});

export const ServerSubmissionSchema = z.object({
  id: z.string(),
  reviewedAt: z.string().nullish(),
  reviewedBy: z.number().int().nullish(),
  annotations: z.record(z.unknown()).nullish(),
  updatedAt: z.string().nullish(),
});

/** A submission as listed for its owner or their instructor */
export const ServerSubmissionSummarySchema = ServerSubmissionSchema.extend({
  ownerId: z.number().int(),
  exerciseId: z.string().nullish(),
  pieceId: z.string().nullish(),
  sessionId: z.string().nullish(),
  videoKey: z.string().nullish(),
  thumbnailKey: z.string().nullish(),
  createdAt: z.string().nullish(),
});

const SubmissionListSchema = z.array(ServerSubmissionSummarySchema);

export const PlaybackUrlResponseSchema = z.object({
  url: z.string().url(),
  thumbnailUrl: z.string().url().nullish(),
  expiresIn: z.number().nonnegative(),
});

export type NegotiateResponse = z.infer<typeof NegotiateResponseSchema>;
export type FinalizeResponse = z.infer<typeof FinalizeResponseSchema>;
export type ServerSubmission = z.infer<typeof ServerSubmissionSchema>;
export type ServerSubmissionSummary = z.infer<typeof ServerSubmissionSummarySchema>;
export type PlaybackUrlResponse = z.infer<typeof PlaybackUrlResponseSchema>;

export interface SubmissionListQuery {
  pieceId?: string;
  exerciseId?: string;
  /** Only submissions nobody has reviewed yet */
  pendingReviewOnly?: boolean;
}

function queryString(query: SubmissionListQuery): string {
  const params = new URLSearchParams();
  if (query.pieceId) params.set('pieceId', query.pieceId);
  if (query.exerciseId) params.set('exerciseId', query.exerciseId);
  if (query.pendingReviewOnly) params.set('pendingReviewOnly', 'true');
  const encoded = params.toString();
  return encoded ? `?${encoded}` : '';
}

interface RequestOptions {
  body?: unknown;
  signal?: AbortSignal;
  operation: string;
}

/**
 * Supplies the opaque bearer credential of the signed-in user
 */
export type TokenProvider = () => string | Promise<string>;

export interface SubmissionsApiOptions {
  baseUrl: string;
  getToken: TokenProvider;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

/**
 * Client for the application server's submission endpoints
 */
export class SubmissionsApi {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: SubmissionsApiOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * POST /submissions. Idempotent on `request.id`.
   */
  createSubmission(
    request: NegotiateRequest,
    signal?: AbortSignal
  ): Promise<NegotiateResponse> {
    return this.request('POST', '/submissions', NegotiateResponseSchema, {
      body: request,
      signal,
      operation: 'Negotiate upload',
    });
  }

  /**
   * POST /submissions/{id}/finalize. Re-finalizing is a no-op success.
   */
  finalize(id: string, signal?: AbortSignal): Promise<FinalizeResponse> {
    return this.request(
      'POST',
      `/submissions/${encodeURIComponent(id)}/finalize`,
      FinalizeResponseSchema,
      { signal, operation: 'Finalize submission' }
    );
  }

  getSubmission(id: string, signal?: AbortSignal): Promise<ServerSubmission> {
    return this.request(
      'GET',
      `/submissions/${encodeURIComponent(id)}`,
      ServerSubmissionSchema,
      { signal, operation: 'Fetch submission' }
    );
  }

  getPlaybackUrl(id: string, signal?: AbortSignal): Promise<PlaybackUrlResponse> {
    return this.request(
      'GET',
      `/submissions/${encodeURIComponent(id)}/playback-url`,
      PlaybackUrlResponseSchema,
      { signal, operation: 'Fetch playback URL' }
    );
  }

  async deleteSubmission(id: string, signal?: AbortSignal): Promise<void> {
    await this.request('DELETE', `/submissions/${encodeURIComponent(id)}`, null, {
      signal,
      operation: 'Delete submission',
    });
  }

  /**
   * GET /submissions. The signed-in user's finalized submissions.
   */
  listSubmissions(
    query: SubmissionListQuery = {},
    signal?: AbortSignal
  ): Promise<ServerSubmissionSummary[]> {
    return this.request('GET', `/submissions${queryString(query)}`, SubmissionListSchema, {
      signal,
      operation: 'List submissions',
    });
  }

  /**
   * GET /students/{studentId}/submissions, for the student's instructor.
   */
  listStudentSubmissions(
    studentId: number,
    query: SubmissionListQuery = {},
    signal?: AbortSignal
  ): Promise<ServerSubmissionSummary[]> {
    return this.request(
      'GET',
      `/students/${studentId}/submissions${queryString(query)}`,
      SubmissionListSchema,
      { signal, operation: 'List student submissions' }
    );
  }

  /**
   * POST /submissions/{id}/review. Stamps the review with the caller as reviewer.
   */
  markReviewed(id: string, signal?: AbortSignal): Promise<ServerSubmission> {
    return this.request(
      'POST',
      `/submissions/${encodeURIComponent(id)}/review`,
      ServerSubmissionSchema,
      { signal, operation: 'Mark reviewed' }
    );
  }

  private async authorizationHeader(): Promise<string> {
    try {
      const token = await this.options.getToken();
      return `Bearer ${token}`;
    } catch (error) {
      throw new AuthorizationError({
        message: 'No credential available for the submissions API',
        cause: error,
      });
    }
  }

  private request<T>(
    method: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions
  ): Promise<T>;
  private request(
    method: string,
    path: string,
    schema: null,
    options: RequestOptions
  ): Promise<undefined>;
  private async request<T>(
    method: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown> | null,
    options: RequestOptions
  ): Promise<T | undefined> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = {
      Authorization: await this.authorizationHeader(),
      Accept: 'application/json',
    };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    logger.debug('API request', { method, url });

    const response = await fetchWithTimeout(
      this.fetchImpl,
      url,
      {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
      },
      { timeoutMs: this.options.timeoutMs, signal: options.signal }
    );

    if (!response.ok) {
      throw await errorFromResponse(response, {
        url,
        method,
        operation: options.operation,
      });
    }

    if (schema === null) return undefined;

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new TransientNetworkError({
        message: `${options.operation} returned a body that is not JSON`,
        cause: error,
        details: { url, method, statusCode: response.status },
      });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new TransientNetworkError({
        message: `${options.operation} returned an unexpected payload`,
        cause: parsed.error,
        details: { url, method, issues: parsed.error.issues },
      });
    }
    return parsed.data;
  }
}
