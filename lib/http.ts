import {
  CancelledError,
  TransientNetworkError,
  classifyError,
  errorForStatus,
  type SubmissionError,
} from './errors';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface TimeoutOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

const MAX_ERROR_BODY = 2000;

/**
 * fetch bounded by a timeout and an optional caller signal. A timeout
 * surfaces as TransientNetworkError, a caller abort as CancelledError.
 */
export async function fetchWithTimeout(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  options: TimeoutOptions
): Promise<Response> {
  const { signal } = options;
  if (signal?.aborted) {
    throw new CancelledError({
      message: 'Request cancelled before start',
      details: { url, method: init.method ?? 'GET' },
    });
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  try {
    return await fetchImpl(url, { ...init, signal: controller.signal });
  } catch (error) {
    const details = { url, method: init.method ?? 'GET' };
    if (timedOut) {
      throw new TransientNetworkError({
        message: `Request timed out after ${options.timeoutMs}ms`,
        cause: error,
        details: { ...details, timeoutMs: options.timeoutMs },
      });
    }
    if (signal?.aborted) {
      throw new CancelledError({
        message: 'Request cancelled',
        cause: error,
        details,
      });
    }
    const classified = classifyError(error);
    if (classified === error) throw classified;
    throw new TransientNetworkError({
      message: `Network request failed: ${classified.message}`,
      cause: error,
      details,
    });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Build a taxonomy error from a non-2xx response, keeping a truncated body
 * for diagnostics.
 */
export async function errorFromResponse(
  response: Response,
  context: { url: string; method: string; operation: string }
): Promise<SubmissionError> {
  let responseBody = '';
  try {
    responseBody = await response.text();
  } catch {
    responseBody = '(response body unreadable)';
  }

  const truncatedBody =
    responseBody.length > MAX_ERROR_BODY
      ? responseBody.slice(0, MAX_ERROR_BODY) + '... (truncated)'
      : responseBody;

  return errorForStatus(
    response.status,
    `${context.operation} failed: HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
    {
      url: context.url,
      method: context.method,
      responseBody: truncatedBody,
    }
  );
}
