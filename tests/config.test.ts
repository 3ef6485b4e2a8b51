import { describe, it, expect, vi, beforeEach } from 'vitest';
import { execFileSync } from 'node:child_process';
import { getGhToken, resolveConfig, resolveToken, type AppConfig } from '../src/config.js';

vi.mock('node:child_process', () => ({
  execFileSync: vi.fn(),
}));

const mockedExecFileSync = vi.mocked(execFileSync);

beforeEach(() => {
  mockedExecFileSync.mockReset();
});

const noGh = () => undefined;

function resolved(prUrl: string | undefined, options: Parameters<typeof resolveConfig>[1]): AppConfig {
  const result = resolveConfig(prUrl, options, {}, noGh);
  if (!result.ok) throw new Error(`expected a config, got: ${result.error.join('; ')}`);
  return result.value;
}

function errors(prUrl: string | undefined, options: Parameters<typeof resolveConfig>[1]): string[] {
  const result = resolveConfig(prUrl, options, {}, noGh);
  return result.ok ? [] : result.error;
}

describe('resolveConfig', () => {
  it('takes owner, repo and number from a PR URL and applies defaults', () => {
    expect(resolved('https://github.com/octocat/hello-world/pull/123', {})).toEqual({
      owner: 'octocat',
      repo: 'hello-world',
      token: undefined,
      tokenSource: 'none',
      selection: { kind: 'numbers', numbers: [123] },
      format: 'md',
      outputDir: 'pr-conversation',
      outputFile: undefined,
      baseUrl: 'https://api.github.com',
      timeoutMs: 30_000,
      concurrency: 2,
      lowBudgetThreshold: 10,
      maxRateLimitRetries: 3,
      perPage: 100,
      verbose: false,
    });
  });

  it('accepts --repo owner/name with --prs', () => {
    const config = resolved(undefined, { repo: 'octocat/hello-world', prs: '3,1,2' });

    expect(config.owner).toBe('octocat');
    expect(config.repo).toBe('hello-world');
    expect(config.selection).toEqual({ kind: 'numbers', numbers: [3, 1, 2] });
  });

  it('accepts --owner and --repo with --pr', () => {
    const config = resolved(undefined, { owner: 'octocat', repo: 'hello-world', pr: '7' });

    expect(config.selection).toEqual({ kind: 'numbers', numbers: [7] });
  });

  it('builds a latest-N selection with its state filter', () => {
    const config = resolved(undefined, { repo: 'octocat/hello-world', latest: '5', state: 'open' });

    expect(config.selection).toEqual({ kind: 'latest', count: 5, scope: 'open' });
  });

  it('converts numeric options', () => {
    const config = resolved(undefined, {
      repo: 'octocat/hello-world',
      pr: '1',
      timeout: '2.5',
      concurrency: '4',
      rateLimitThreshold: '0',
      maxRetries: '1',
      pageSize: '50',
      format: 'json',
      verbose: true,
    });

    expect(config.timeoutMs).toBe(2500);
    expect(config.concurrency).toBe(4);
    expect(config.lowBudgetThreshold).toBe(0);
    expect(config.maxRateLimitRetries).toBe(1);
    expect(config.perPage).toBe(50);
    expect(config.format).toBe('json');
    expect(config.verbose).toBe(true);
  });

  it('allows --output-file for a single PR', () => {
    const config = resolved(undefined, { repo: 'octocat/hello-world', pr: '1', outputFile: 'out.md' });

    expect(config.outputFile).toBe('out.md');
  });

  it('requires a pull request selector', () => {
    expect(errors(undefined, { repo: 'octocat/hello-world' })).toEqual([
      'Specify pull requests with --pr <n>, --prs <list>, --latest <n> or a PR URL',
    ]);
  });

  it('rejects more than one selector', () => {
    expect(errors('https://github.com/octocat/hello-world/pull/1', { pr: '2' })).toEqual([
      'Use only one of --pr, --prs, --latest or a PR URL',
    ]);
  });

  it('rejects an invalid PR URL', () => {
    expect(errors('https://gitlab.com/octocat/hello-world/pull/1', {})).toEqual([
      'Invalid PR URL: https://gitlab.com/octocat/hello-world/pull/1 (expected https://github.com/owner/repo/pull/123)',
    ]);
  });

  it('requires a repository', () => {
    expect(errors(undefined, { pr: '1' })).toEqual([
      'Specify the repository with --repo owner/name (or --owner and --repo)',
    ]);
  });

  it('reports a bad repository and a bad PR number together', () => {
    expect(errors(undefined, { repo: 'octocat/hello/world', pr: 'abc' })).toEqual([
      'Invalid repository: octocat/hello/world (expected owner/name)',
      'Invalid PR number: abc',
    ]);
  });

  it('rejects --owner that disagrees with --repo owner/name', () => {
    expect(errors(undefined, { owner: 'someone', repo: 'octocat/hello-world', pr: '1' })).toEqual([
      '--owner someone conflicts with --repo octocat/hello-world',
    ]);
  });

  it('rejects a PR list with a bad entry', () => {
    expect(errors(undefined, { repo: 'octocat/hello-world', prs: '1,two' })).toEqual([
      'Invalid PR list: 1,two (expected e.g. 1,2,3)',
    ]);
  });

  it('rejects --output-file with several PRs', () => {
    expect(errors(undefined, { repo: 'octocat/hello-world', prs: '1,2', outputFile: 'out.md' })).toEqual([
      '--output-file can only be used when fetching a single PR',
    ]);
  });

  it('names the flag of an out-of-range option', () => {
    const problems = errors(undefined, { repo: 'octocat/hello-world', pr: '1', concurrency: '0' });

    expect(problems).toHaveLength(1);
    expect(problems[0]).toMatch(/^--concurrency: /);
  });

  it('names camelCase options in kebab case', () => {
    const problems = errors(undefined, { repo: 'octocat/hello-world', pr: '1', pageSize: '500' });

    expect(problems[0]).toMatch(/^--page-size: /);
  });

  it('rejects a non-positive --latest', () => {
    const problems = errors(undefined, { repo: 'octocat/hello-world', latest: '0' });

    expect(problems[0]).toMatch(/^--latest: /);
  });
});

describe('resolveToken', () => {
  it('prefers --token', () => {
    expect(resolveToken('test-flag', { GITHUB_TOKEN: 'test-env' }, noGh)).toEqual({
      token: 'test-flag',
      source: '--token',
    });
  });

  it('falls back to GITHUB_TOKEN, then GH_TOKEN', () => {
    expect(resolveToken(undefined, { GITHUB_TOKEN: 'test-a', GH_TOKEN: 'test-b' }, noGh)).toEqual({
      token: 'test-a',
      source: 'GITHUB_TOKEN',
    });
    expect(resolveToken(undefined, { GH_TOKEN: 'test-b' }, noGh)).toEqual({ token: 'test-b', source: 'GH_TOKEN' });
  });

  it('asks gh last', () => {
    expect(resolveToken(undefined, {}, () => 'test-gh')).toEqual({ token: 'test-gh', source: 'gh' });
  });

  it('allows running without a token', () => {
    expect(resolveToken(undefined, {}, noGh)).toEqual({ token: undefined, source: 'none' });
  });

  it('is what resolveConfig uses', () => {
    const result = resolveConfig('https://github.com/octocat/hello-world/pull/1', {}, { GH_TOKEN: 'test-token' }, noGh);

    expect(result.ok && result.value.tokenSource).toBe('GH_TOKEN');
    expect(result.ok && result.value.token).toBe('test-token');
  });
});

describe('getGhToken', () => {
  it('returns the trimmed token printed by gh', () => {
    mockedExecFileSync.mockReturnValue('test-token\n');

    expect(getGhToken()).toBe('test-token');
    expect(mockedExecFileSync).toHaveBeenCalledWith('gh', ['auth', 'token'], expect.objectContaining({ encoding: 'utf-8' }));
  });

  it('returns undefined when gh is missing or logged out', () => {
    mockedExecFileSync.mockImplementation(() => {
      throw new Error('not found');
    });

    expect(getGhToken()).toBeUndefined();
  });

  it('returns undefined for empty output', () => {
    mockedExecFileSync.mockReturnValue('\n');

    expect(getGhToken()).toBeUndefined();
  });
});
