import { setTimeout as delay } from 'node:timers/promises';
import { assembleConversation, type SectionFailure } from './assembler.js';
import {
  BatchPreconditionError,
  describeApiError,
  ok,
  toApiError,
  type ApiError,
  type Result,
} from './errors.js';
import { checkRepository, listPullRequests } from './github.js';
import { DEFAULT_PER_PAGE } from './paginator.js';
import type { RateLimitBudget } from './rate-limit.js';
import type { Transport } from './transport.js';
import type { ConversationRecord, ConversationSection, PRScope, RepoRef } from './types.js';

/** Default number of PRs assembled at once */
export const DEFAULT_CONCURRENCY = 2;

/** Upper bound on concurrency; the rate limit is shared by every worker */
export const MAX_CONCURRENCY = 8;

/** Start backing off once this many requests (or fewer) remain in the window */
export const DEFAULT_LOW_BUDGET_THRESHOLD = 10;

/** Rate-limited attempts retried before a PR is recorded as failed */
export const DEFAULT_MAX_RATE_LIMIT_RETRIES = 3;

/** Slack added after the advertised reset time; GitHub's clock and ours differ slightly */
export const RESET_BUFFER_MS = 1_000;

/** Wait used when a rate-limited response carries no reset time */
export const DEFAULT_RATE_LIMIT_DELAY_MS = 60_000;

/** Everything the driver needs to talk to GitHub for one run */
export interface GitHubSession {
  transport: Transport;
  budget: RateLimitBudget;
}

export type PRSelection =
  | { kind: 'numbers'; numbers: number[] }
  | { kind: 'latest'; count: number; scope: PRScope };

export interface BatchFailure {
  prNumber: number;
  error: ApiError;
  /** Null when the failure was not tied to one section (network fault) */
  section: ConversationSection | null;
  attempts: number;
}

export interface BatchReport {
  succeeded: ConversationRecord[];
  failed: BatchFailure[];
}

export type BatchLogEvent =
  | { type: 'discovered'; numbers: number[] }
  | { type: 'waiting'; reason: 'rate-limited' | 'low-budget'; ms: number; prNumber: number | null }
  | { type: 'assembled'; prNumber: number; attempts: number }
  | { type: 'failed'; failure: BatchFailure };

export interface BatchOptions {
  concurrency?: number;
  lowBudgetThreshold?: number;
  maxRateLimitRetries?: number;
  /** Page size for every list endpoint */
  perPage?: number;
  /** Fetch a PR's four sections concurrently */
  parallelSections?: boolean;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  log?: (event: BatchLogEvent) => void;
}

type RateLimitedError = Extract<ApiError, { kind: 'RateLimited' }>;

interface RetryContext {
  maxRetries: number;
  sleep: (ms: number) => Promise<void>;
  now: () => number;
  log: (event: BatchLogEvent) => void;
}

/**
 * How long to wait before retrying a rate-limited request.
 */
export function rateLimitDelay(error: RateLimitedError, now: number): number {
  if (!error.resetAt) return DEFAULT_RATE_LIMIT_DELAY_MS;
  return Math.max(0, error.resetAt.getTime() - now) + RESET_BUFFER_MS;
}

/**
 * Run `attempt` until it succeeds, fails with something other than a rate
 * limit, or has been retried `maxRetries` times after rate limits.
 */
async function withRateLimitRetry<T, E>(
  attempt: () => Promise<Result<T, E>>,
  rateLimitOf: (error: E) => RateLimitedError | null,
  prNumber: number | null,
  ctx: RetryContext,
): Promise<{ result: Result<T, E>; attempts: number }> {
  let attempts = 0;
  for (;;) {
    attempts++;
    const result = await attempt();
    if (result.ok) return { result, attempts };

    const limited = rateLimitOf(result.error);
    if (!limited || attempts > ctx.maxRetries) return { result, attempts };

    const ms = rateLimitDelay(limited, ctx.now());
    ctx.log({ type: 'waiting', reason: 'rate-limited', ms, prNumber });
    await ctx.sleep(ms);
  }
}

function asRateLimited(error: ApiError): RateLimitedError | null {
  return error.kind === 'RateLimited' ? error : null;
}

/**
 * Resolve the `count` most recently updated PR numbers, newest first.
 * Stops paging as soon as enough are known, so at most one page more than
 * strictly necessary is requested.
 */
export async function resolveLatest(
  transport: Transport,
  repo: RepoRef,
  count: number,
  scope: PRScope,
  options: { perPage?: number; now?: () => number } = {},
): Promise<Result<number[]>> {
  if (count <= 0) return ok([]);

  const perPage = Math.min(count, options.perPage ?? DEFAULT_PER_PAGE);
  const numbers: number[] = [];

  for await (const page of listPullRequests(transport, repo, { scope, perPage, now: options.now })) {
    if (!page.ok) return page;
    for (const pr of page.value) {
      numbers.push(pr.number);
    }
    if (numbers.length >= count) break;
  }

  return ok(numbers.slice(0, count));
}

/**
 * Run `fn` over `items` with at most `limit` calls in flight.
 * Results keep the input order regardless of completion order.
 */
async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index]);
    }
  }

  const workers = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

type PROutcome = { ok: true; record: ConversationRecord } | { ok: false; failure: BatchFailure };

/**
 * Fetch the conversation of every selected PR.
 *
 * One PR failing never stops the others: failures land in the report next to
 * the successes, both in submission order (or newest-first for latest-N).
 * Rate-limited PRs are retried after the advertised reset. The only thrown
 * error is BatchPreconditionError, when discovery fails, the credentials
 * were rejected for every PR, or every PR is missing because the repository
 * does not exist.
 */
export async function runBatch(
  session: GitHubSession,
  repo: RepoRef,
  selection: PRSelection,
  options: BatchOptions = {},
): Promise<BatchReport> {
  const concurrency = Math.min(options.concurrency ?? DEFAULT_CONCURRENCY, MAX_CONCURRENCY);
  const threshold = options.lowBudgetThreshold ?? DEFAULT_LOW_BUDGET_THRESHOLD;
  const now = options.now ?? Date.now;
  const ctx: RetryContext = {
    maxRetries: options.maxRateLimitRetries ?? DEFAULT_MAX_RATE_LIMIT_RETRIES,
    sleep: options.sleep ?? ((ms) => delay(ms)),
    now,
    log: options.log ?? (() => {}),
  };
  const { transport, budget } = session;

  let numbers: number[];
  if (selection.kind === 'numbers') {
    numbers = [...new Set(selection.numbers)];
  } else {
    numbers = await discover(session, repo, selection.count, selection.scope, options.perPage, ctx);
    ctx.log({ type: 'discovered', numbers });
  }

  async function backOffIfLow(prNumber: number): Promise<void> {
    if (!budget.isLow(threshold)) return;
    const untilReset = budget.msUntilReset(now());
    if (untilReset <= 0) return;
    const ms = untilReset + RESET_BUFFER_MS;
    ctx.log({ type: 'waiting', reason: 'low-budget', ms, prNumber });
    await ctx.sleep(ms);
  }

  async function processPR(prNumber: number): Promise<PROutcome> {
    const ref = { ...repo, prNumber };
    let attempts = 0;
    try {
      const outcome = await withRateLimitRetry(
        async () => {
          attempts++;
          await backOffIfLow(prNumber);
          return assembleConversation(transport, ref, {
            parallel: options.parallelSections ?? true,
            perPage: options.perPage,
            now,
          });
        },
        (failure: SectionFailure) => asRateLimited(failure.error),
        prNumber,
        ctx,
      );
      if (outcome.result.ok) {
        ctx.log({ type: 'assembled', prNumber, attempts: outcome.attempts });
        return { ok: true, record: outcome.result.value };
      }
      const { section, error } = outcome.result.error;
      return fail({ prNumber, error, section, attempts: outcome.attempts });
    } catch (error: unknown) {
      return fail({ prNumber, error: toApiError(error), section: null, attempts });
    }
  }

  function fail(failure: BatchFailure): PROutcome {
    ctx.log({ type: 'failed', failure });
    return { ok: false, failure };
  }

  const outcomes = await mapWithConcurrency(numbers, concurrency, processPR);

  const report: BatchReport = { succeeded: [], failed: [] };
  for (const outcome of outcomes) {
    if (outcome.ok) report.succeeded.push(outcome.record);
    else report.failed.push(outcome.failure);
  }

  const [firstFailure] = report.failed;
  if (
    firstFailure &&
    report.succeeded.length === 0 &&
    report.failed.every((f) => f.error.kind === 'ClientError' && f.error.status === 401)
  ) {
    throw new BatchPreconditionError('GitHub rejected the credentials for every pull request', firstFailure.error);
  }

  if (
    firstFailure &&
    report.succeeded.length === 0 &&
    report.failed.every((f) => f.section === 'metadata' && f.error.kind === 'NotFound')
  ) {
    await ensureRepository(session, repo, now);
  }

  return report;
}

/**
 * Every PR came back NotFound: tell a missing repository apart from missing
 * PR numbers. Throws when the repository itself does not resolve.
 */
async function ensureRepository(session: GitHubSession, repo: RepoRef, now: () => number): Promise<void> {
  const target = `${repo.owner}/${repo.repo}`;
  let result: Result<RepoRef>;
  try {
    result = await checkRepository(session.transport, repo, { now });
  } catch (error: unknown) {
    const apiError = toApiError(error);
    throw new BatchPreconditionError(`Could not look up ${target}: ${describeApiError(apiError)}`, apiError);
  }
  if (!result.ok && result.error.kind === 'NotFound') {
    throw new BatchPreconditionError(`Repository ${target} not found`, result.error);
  }
}

async function discover(
  session: GitHubSession,
  repo: RepoRef,
  count: number,
  scope: PRScope,
  perPage: number | undefined,
  ctx: RetryContext,
): Promise<number[]> {
  const target = `${repo.owner}/${repo.repo}`;
  let outcome: { result: Result<number[]>; attempts: number };
  try {
    outcome = await withRateLimitRetry(
      () => resolveLatest(session.transport, repo, count, scope, { perPage, now: ctx.now }),
      asRateLimited,
      null,
      ctx,
    );
  } catch (error: unknown) {
    const apiError = toApiError(error);
    throw new BatchPreconditionError(`Could not list pull requests for ${target}: ${describeApiError(apiError)}`, apiError);
  }

  if (!outcome.result.ok) {
    const apiError = outcome.result.error;
    throw new BatchPreconditionError(`Could not list pull requests for ${target}: ${describeApiError(apiError)}`, apiError);
  }
  return outcome.result.value;
}
