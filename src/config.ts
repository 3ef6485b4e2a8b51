import { execFileSync } from 'node:child_process';
import { z } from 'zod';
import type { PRSelection } from './batch.js';
import { DEFAULT_CONCURRENCY, DEFAULT_LOW_BUDGET_THRESHOLD, DEFAULT_MAX_RATE_LIMIT_RETRIES, MAX_CONCURRENCY } from './batch.js';
import { err, ok, type Result } from './errors.js';
import { DEFAULT_PER_PAGE } from './paginator.js';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './transport.js';
import type { OutputFormat, PRScope, RepoRef } from './types.js';
import { isValidName, parsePRNumbers, parsePRUrl, parseRepoSlug } from './url-parser.js';
import { DEFAULT_OUTPUT_DIR } from './writer.js';

/** Raw option values as commander hands them over */
export interface CliOptions {
  owner?: string;
  repo?: string;
  pr?: string;
  prs?: string;
  latest?: string;
  state?: string;
  format?: string;
  outputDir?: string;
  outputFile?: string;
  token?: string;
  baseUrl?: string;
  timeout?: string;
  concurrency?: string;
  rateLimitThreshold?: string;
  maxRetries?: string;
  pageSize?: string;
  verbose?: boolean;
}

export type TokenSource = '--token' | 'GITHUB_TOKEN' | 'GH_TOKEN' | 'gh' | 'none';

export interface AppConfig {
  owner: string;
  repo: string;
  token: string | undefined;
  tokenSource: TokenSource;
  selection: PRSelection;
  format: OutputFormat;
  outputDir: string;
  outputFile: string | undefined;
  baseUrl: string;
  timeoutMs: number;
  concurrency: number;
  lowBudgetThreshold: number;
  maxRateLimitRetries: number;
  perPage: number;
  verbose: boolean;
}

const OptionsSchema = z.object({
  state: z.enum(['open', 'closed', 'all']).default('all'),
  format: z.enum(['md', 'json']).default('md'),
  outputDir: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  outputFile: z.string().min(1).optional(),
  baseUrl: z.url().default(DEFAULT_BASE_URL),
  timeout: z.coerce.number().positive().default(DEFAULT_TIMEOUT_MS / 1000),
  concurrency: z.coerce.number().int().min(1).max(MAX_CONCURRENCY).default(DEFAULT_CONCURRENCY),
  rateLimitThreshold: z.coerce.number().int().min(0).default(DEFAULT_LOW_BUDGET_THRESHOLD),
  maxRetries: z.coerce.number().int().min(0).default(DEFAULT_MAX_RATE_LIMIT_RETRIES),
  pageSize: z.coerce.number().int().min(1).max(DEFAULT_PER_PAGE).default(DEFAULT_PER_PAGE),
  latest: z.coerce.number().int().positive().optional(),
  verbose: z.boolean().default(false),
});

function toFlag(key: PropertyKey): string {
  return '--' + String(key).replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

/**
 * Read a token from the gh CLI, if it is installed and logged in.
 */
export function getGhToken(): string | undefined {
  try {
    const token = execFileSync('gh', ['auth', 'token'], {
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
    }).trim();
    return token || undefined;
  } catch {
    // gh missing or not logged in: fall through to unauthenticated access
    return undefined;
  }
}

/**
 * Pick the GitHub token: --token, then GITHUB_TOKEN, then GH_TOKEN, then
 * `gh auth token`. No token at all is allowed; requests go out anonymously.
 */
export function resolveToken(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv,
  ghToken: () => string | undefined = getGhToken,
): { token: string | undefined; source: TokenSource } {
  if (explicit) return { token: explicit, source: '--token' };
  if (env.GITHUB_TOKEN) return { token: env.GITHUB_TOKEN, source: 'GITHUB_TOKEN' };
  if (env.GH_TOKEN) return { token: env.GH_TOKEN, source: 'GH_TOKEN' };
  const fromGh = ghToken();
  if (fromGh) return { token: fromGh, source: 'gh' };
  return { token: undefined, source: 'none' };
}

/**
 * Repository from `--repo owner/name`, or from `--owner` and `--repo`.
 */
function resolveRepo(owner: string | undefined, repo: string | undefined): Result<RepoRef, string> {
  if (repo?.includes('/')) {
    const slug = parseRepoSlug(repo);
    if (!slug) return err(`Invalid repository: ${repo} (expected owner/name)`);
    if (owner !== undefined && owner !== slug.owner) return err(`--owner ${owner} conflicts with --repo ${repo}`);
    return ok(slug);
  }
  if (!owner || !repo) {
    return err('Specify the repository with --repo owner/name (or --owner and --repo)');
  }
  if (!isValidName(owner) || !isValidName(repo)) {
    return err(`Invalid repository: ${owner}/${repo}`);
  }
  return ok({ owner, repo });
}

interface Target {
  owner: string;
  repo: string;
  selection: PRSelection;
}

function resolveTarget(prUrl: string | undefined, options: CliOptions, latest: number | undefined, scope: PRScope): Result<Target, string[]> {
  const selectors = [prUrl, options.pr, options.prs, options.latest].filter((s) => s !== undefined);
  if (selectors.length === 0) {
    return err(['Specify pull requests with --pr <n>, --prs <list>, --latest <n> or a PR URL']);
  }
  if (selectors.length > 1) {
    return err(['Use only one of --pr, --prs, --latest or a PR URL']);
  }

  if (prUrl !== undefined) {
    const parsed = parsePRUrl(prUrl);
    if (!parsed) {
      return err([`Invalid PR URL: ${prUrl} (expected https://github.com/owner/repo/pull/123)`]);
    }
    return ok({ owner: parsed.owner, repo: parsed.repo, selection: { kind: 'numbers', numbers: [parsed.prNumber] } });
  }

  const errors: string[] = [];
  const repoRef = resolveRepo(options.owner, options.repo);
  if (!repoRef.ok) errors.push(repoRef.error);

  let selection: PRSelection | undefined;
  if (options.pr !== undefined) {
    const numbers = parsePRNumbers(options.pr);
    if (!numbers || numbers.length !== 1) errors.push(`Invalid PR number: ${options.pr}`);
    else selection = { kind: 'numbers', numbers };
  } else if (options.prs !== undefined) {
    const numbers = parsePRNumbers(options.prs);
    if (!numbers) errors.push(`Invalid PR list: ${options.prs} (expected e.g. 1,2,3)`);
    else selection = { kind: 'numbers', numbers };
  } else if (latest !== undefined) {
    selection = { kind: 'latest', count: latest, scope };
  }

  if (!repoRef.ok || !selection) {
    return err(errors);
  }
  return ok({ ...repoRef.value, selection });
}

/**
 * Validate CLI options and environment into a complete run configuration.
 * Collects every problem instead of stopping at the first.
 */
export function resolveConfig(
  prUrl: string | undefined,
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  ghToken: () => string | undefined = getGhToken,
): Result<AppConfig, string[]> {
  const parsed = OptionsSchema.safeParse(options);
  if (!parsed.success) {
    return err(parsed.error.issues.map((issue) => `${toFlag(issue.path[0] ?? 'options')}: ${issue.message}`));
  }
  const values = parsed.data;

  const target = resolveTarget(prUrl, options, values.latest, values.state);
  if (!target.ok) return target;

  const { owner, repo, selection } = target.value;
  const single = selection.kind === 'numbers' && selection.numbers.length === 1;
  if (values.outputFile && !single) {
    return err(['--output-file can only be used when fetching a single PR']);
  }

  const { token, source } = resolveToken(options.token, env, ghToken);

  return ok({
    owner,
    repo,
    token,
    tokenSource: source,
    selection,
    format: values.format,
    outputDir: values.outputDir,
    outputFile: values.outputFile,
    baseUrl: values.baseUrl,
    timeoutMs: Math.round(values.timeout * 1000),
    concurrency: values.concurrency,
    lowBudgetThreshold: values.rateLimitThreshold,
    maxRateLimitRetries: values.maxRetries,
    perPage: values.pageSize,
    verbose: values.verbose,
  });
}
