import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import { TransportError, sanitizeError } from './errors.js';
import type { RateLimitBudget } from './rate-limit.js';

/** Default per-request timeout: 30 seconds */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** REST API version pinned on every request */
export const GITHUB_API_VERSION = '2022-11-28';

export const DEFAULT_BASE_URL = 'https://api.github.com';

export type ResponseHeaders = Record<string, string | number | undefined>;

export type QueryParams = Record<string, string | number | boolean>;

export interface TransportResponse {
  status: number;
  headers: ResponseHeaders;
  body: unknown;
}

/**
 * Issues GET requests against the GitHub REST API.
 * HTTP error responses are returned, never thrown; only faults below HTTP
 * (DNS, refused connection, timeout) reject, with a TransportError.
 */
export interface Transport {
  request(path: string, query?: QueryParams): Promise<TransportResponse>;
}

export interface OctokitOptions {
  token?: string;
  baseUrl?: string;
  /** Replaces the global fetch. Tests use this to serve canned responses. */
  fetch?: typeof fetch;
}

/**
 * Create an Octokit instance. Without a token the client is unauthenticated
 * and GitHub applies the lower anonymous rate limit.
 */
export function createOctokit(options: OctokitOptions = {}): Octokit {
  return new Octokit({
    auth: options.token,
    baseUrl: options.baseUrl ?? DEFAULT_BASE_URL,
    userAgent: 'prscribe',
    request: options.fetch ? { fetch: options.fetch } : undefined,
    // HTTP errors come back to the caller as values; Octokit's own error log
    // would print each of them a second time.
    log: {
      debug: () => {},
      info: () => {},
      warn: console.warn,
      error: () => {},
    },
  });
}

export interface OctokitTransportOptions {
  timeoutMs?: number;
  budget?: RateLimitBudget;
}

export class OctokitTransport implements Transport {
  private readonly timeoutMs: number;
  private readonly budget: RateLimitBudget | undefined;

  constructor(
    private readonly octokit: Octokit,
    options: OctokitTransportOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.budget = options.budget;
  }

  async request(path: string, query: QueryParams = {}): Promise<TransportResponse> {
    let response: TransportResponse;
    try {
      const res = await this.octokit.request(`GET ${path}`, {
        ...query,
        headers: {
          accept: 'application/vnd.github+json',
          'x-github-api-version': GITHUB_API_VERSION,
        },
        request: { signal: AbortSignal.timeout(this.timeoutMs) },
      });
      const body: unknown = res.data;
      response = { status: res.status, headers: res.headers, body };
    } catch (error: unknown) {
      // RequestError with a response is a well-formed HTTP error: hand it back.
      if (error instanceof RequestError && error.response) {
        const body: unknown = error.response.data;
        response = { status: error.status, headers: error.response.headers, body };
      } else {
        throw new TransportError(`GET ${path} failed: ${sanitizeError(error)}`, { cause: error });
      }
    }

    this.budget?.update(response.headers);
    return response;
  }
}
