import type { z } from 'zod';
import { classifyResponse, err, ok, type Result } from './errors.js';
import { collectAll, paginate, type PaginateOptions } from './paginator.js';
import {
  RawIssueCommentSchema,
  RawPullRequestSchema,
  RawReviewCommentSchema,
  RawReviewSchema,
  toComment,
  toPRMetadata,
  toPullRequestSummary,
  toReview,
  toReviewComment,
} from './schemas.js';
import type { Transport } from './transport.js';
import type {
  Comment,
  ParsedPR,
  PRMetadata,
  PRScope,
  PullRequestSummary,
  RepoRef,
  Review,
  ReviewComment,
} from './types.js';

export type FetchOptions = Pick<PaginateOptions, 'perPage' | 'now'>;

function repoPath({ owner, repo }: RepoRef): string {
  return `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`;
}

/**
 * Validate raw items against a schema and normalize them, keeping order.
 * The first item that does not match fails the whole endpoint.
 */
function normalizeItems<R, T>(
  items: unknown[],
  schema: z.ZodType<R>,
  normalize: (raw: R) => T,
  endpoint: string,
): Result<T[]> {
  const normalized: T[] = [];
  for (let i = 0; i < items.length; i++) {
    const parsed = schema.safeParse(items[i]);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.map(String).join('.')}` : '';
      return err({
        kind: 'InvalidResponse',
        message: `${endpoint} item ${i}${where}: ${issue?.message ?? 'invalid shape'}`,
      });
    }
    normalized.push(normalize(parsed.data));
  }
  return ok(normalized);
}

async function fetchList<R, T>(
  transport: Transport,
  path: string,
  schema: z.ZodType<R>,
  normalize: (raw: R) => T,
  options: FetchOptions,
): Promise<Result<T[]>> {
  const raw = await collectAll(paginate(transport, path, options));
  if (!raw.ok) return raw;
  return normalizeItems(raw.value, schema, normalize, path);
}

/**
 * Confirm the repository itself resolves. NotFound means a wrong owner or
 * name, or a private repository the token cannot see.
 */
export async function checkRepository(
  transport: Transport,
  repo: RepoRef,
  options: Pick<FetchOptions, 'now'> = {},
): Promise<Result<RepoRef>> {
  const response = await transport.request(repoPath(repo));
  const failure = classifyResponse(response, (options.now ?? Date.now)());
  return failure ? err(failure) : ok(repo);
}

/**
 * Fetch the PR itself: title, author, state, description.
 * A PR number that does not exist in the repo yields NotFound.
 */
export async function fetchPRMetadata(
  transport: Transport,
  ref: ParsedPR,
  options: FetchOptions = {},
): Promise<Result<PRMetadata>> {
  const path = `${repoPath(ref)}/pulls/${ref.prNumber}`;
  const raw = await collectAll(paginate(transport, path, options));
  if (!raw.ok) return raw;

  const metadata = normalizeItems(raw.value, RawPullRequestSchema, toPRMetadata, path);
  if (!metadata.ok) return metadata;

  const [pr] = metadata.value;
  if (!pr) {
    return err({ kind: 'InvalidResponse', message: `${path}: empty response` });
  }
  return ok(pr);
}

/** Top-level conversation comments (PRs are issues, so these live under /issues) */
export async function fetchIssueComments(
  transport: Transport,
  ref: ParsedPR,
  options: FetchOptions = {},
): Promise<Result<Comment[]>> {
  const path = `${repoPath(ref)}/issues/${ref.prNumber}/comments`;
  return fetchList(transport, path, RawIssueCommentSchema, toComment, options);
}

export async function fetchReviews(
  transport: Transport,
  ref: ParsedPR,
  options: FetchOptions = {},
): Promise<Result<Review[]>> {
  const path = `${repoPath(ref)}/pulls/${ref.prNumber}/reviews`;
  return fetchList(transport, path, RawReviewSchema, toReview, options);
}

/** Inline diff comments */
export async function fetchReviewComments(
  transport: Transport,
  ref: ParsedPR,
  options: FetchOptions = {},
): Promise<Result<ReviewComment[]>> {
  const path = `${repoPath(ref)}/pulls/${ref.prNumber}/comments`;
  return fetchList(transport, path, RawReviewCommentSchema, toReviewComment, options);
}

export interface ListPullRequestsOptions extends FetchOptions {
  scope?: PRScope;
}

/**
 * List a repository's PRs, most recently updated first, one page at a time.
 * Callers stop iterating once they have enough.
 */
export async function* listPullRequests(
  transport: Transport,
  repo: RepoRef,
  options: ListPullRequestsOptions = {},
): AsyncGenerator<Result<PullRequestSummary[]>, void, undefined> {
  const path = `${repoPath(repo)}/pulls`;
  const pages = paginate(transport, path, {
    perPage: options.perPage,
    now: options.now,
    query: { state: options.scope ?? 'all', sort: 'updated', direction: 'desc' },
  });

  for await (const page of pages) {
    if (!page.ok) {
      yield page;
      return;
    }
    const summaries = normalizeItems(page.value, RawPullRequestSchema, toPullRequestSummary, path);
    yield summaries;
    if (!summaries.ok) return;
  }
}
