import type { ResponseHeaders, TransportResponse } from './transport.js';

/** Exit code for unexpected failures */
export const EXIT_UNEXPECTED = 1;

/** Exit code for invalid PR numbers, URLs or repository slugs */
export const EXIT_INVALID_INPUT = 2;

/** Exit code when the batch could not start (repo missing, credentials rejected everywhere) */
export const EXIT_API_ERROR = 3;

/** Exit code when at least one PR failed to fetch or save */
export const EXIT_PARTIAL_FAILURE = 4;

/**
 * Classified failure of a GitHub API call.
 * Everything except TransportError is derived from a well-formed HTTP response.
 */
export type ApiError =
  | { kind: 'NotFound'; status: 404; message: string }
  | { kind: 'ClientError'; status: number; message: string }
  | { kind: 'RateLimited'; status: number; message: string; resetAt: Date | null }
  | { kind: 'ServerError'; status: number; message: string }
  | { kind: 'TransportError'; message: string }
  | { kind: 'InvalidResponse'; message: string };

export type ApiErrorKind = ApiError['kind'];

export type Result<T, E = ApiError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * A fault below the HTTP layer: DNS, refused connection, reset, timeout.
 * This is the only failure the transport throws.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * Raised by the batch driver when no PR could be attempted meaningfully:
 * discovery failed, or the credentials were rejected for every PR.
 */
export class BatchPreconditionError extends Error {
  readonly apiError: ApiError;

  constructor(message: string, apiError: ApiError) {
    super(message);
    this.name = 'BatchPreconditionError';
    this.apiError = apiError;
  }
}

/** Case-insensitive header lookup; Octokit lowercases names but fakes may not. */
export function getHeader(headers: ResponseHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && value !== undefined) {
      return String(value);
    }
  }
  return undefined;
}

function responseMessage(response: TransportResponse): string {
  const body = response.body;
  if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return `HTTP ${response.status}`;
}

/**
 * Work out when a rate-limited request may be retried.
 * `retry-after` (secondary limits) wins over `x-ratelimit-reset` (primary limit).
 */
export function parseResetTime(headers: ResponseHeaders, now: number = Date.now()): Date | null {
  const retryAfter = getHeader(headers, 'retry-after');
  if (retryAfter !== undefined && Number.isFinite(Number(retryAfter))) {
    return new Date(now + Number(retryAfter) * 1000);
  }

  const reset = getHeader(headers, 'x-ratelimit-reset');
  if (reset !== undefined && Number.isFinite(Number(reset))) {
    return new Date(Number(reset) * 1000);
  }

  return null;
}

function isRateLimited(response: TransportResponse): boolean {
  if (response.status === 429) return true;
  if (response.status !== 403) return false;
  return (
    getHeader(response.headers, 'x-ratelimit-remaining') === '0' ||
    getHeader(response.headers, 'retry-after') !== undefined
  );
}

/**
 * Classify an HTTP response. Returns null for anything below 400.
 */
export function classifyResponse(response: TransportResponse, now: number = Date.now()): ApiError | null {
  const { status } = response;
  if (status < 400) return null;

  const message = responseMessage(response);

  if (status === 404) {
    return { kind: 'NotFound', status: 404, message };
  }
  if (isRateLimited(response)) {
    return { kind: 'RateLimited', status, message, resetAt: parseResetTime(response.headers, now) };
  }
  if (status < 500) {
    return { kind: 'ClientError', status, message };
  }
  return { kind: 'ServerError', status, message };
}

/**
 * Convert a thrown value into an ApiError so it can sit in a batch report.
 */
export function toApiError(error: unknown): ApiError {
  return { kind: 'TransportError', message: sanitizeError(error) };
}

/**
 * One-line description of an ApiError for terminal output.
 */
export function describeApiError(error: ApiError): string {
  switch (error.kind) {
    case 'NotFound':
      return `not found (404): ${error.message}`;
    case 'ClientError':
      return `request rejected (${error.status}): ${error.message}`;
    case 'RateLimited':
      return error.resetAt
        ? `rate limited (${error.status}) until ${error.resetAt.toISOString()}`
        : `rate limited (${error.status})`;
    case 'ServerError':
      return `GitHub server error (${error.status}): ${error.message}`;
    case 'TransportError':
      return `network failure: ${error.message}`;
    case 'InvalidResponse':
      return `unexpected response: ${error.message}`;
  }
}

/**
 * Scrub secrets and credentials from a string.
 * Replaces known token patterns with [REDACTED].
 */
export function scrubSecrets(text: string): string {
  return text
    // GitHub classic tokens (ghp_, gho_, ghs_, ghr_, ghu_)
    .replace(/\b(ghp_|gho_|ghs_|ghr_|ghu_)[a-zA-Z0-9_]+/g, '[REDACTED]')
    // GitHub fine-grained PATs
    .replace(/\bgithub_pat_[a-zA-Z0-9_]+/g, '[REDACTED]')
    // Bearer/token auth headers
    .replace(/(Bearer|token)\s+[a-zA-Z0-9._\-]+/gi, '$1 [REDACTED]')
    // URL-embedded credentials
    .replace(/https?:\/\/[^@\s]+@/g, 'https://[REDACTED]@');
}

/**
 * Extract a safe error message from an unknown error value.
 * Converts to string, then scrubs any embedded secrets.
 */
export function sanitizeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return scrubSecrets(message);
}
