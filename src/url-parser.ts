import type { ParsedPR, RepoRef } from './types.js';

const PR_URL_REGEX =
  /^https?:\/\/github\.com\/([a-zA-Z0-9_.-]+)\/([a-zA-Z0-9_.-]+)\/pull\/(\d+)\/?(?:\?.*)?(?:#.*)?$/;

const NAME_REGEX = /^[a-zA-Z0-9_.-]+$/;

const REPO_SLUG_REGEX = /^([a-zA-Z0-9_.-]+)\/([a-zA-Z0-9_.-]+)$/;

/**
 * Parse a GitHub PR URL into its components.
 *
 * Accepts full GitHub PR URLs like:
 *   https://github.com/owner/repo/pull/123
 *   https://github.com/owner/repo/pull/123/
 *   https://github.com/owner/repo/pull/123?query=1
 *   https://github.com/owner/repo/pull/123#discussion
 *
 * Returns null for any invalid, malformed, or non-GitHub input.
 */
export function parsePRUrl(input: string): ParsedPR | null {
  try {
    new URL(input);
  } catch {
    return null;
  }

  const match = input.match(PR_URL_REGEX);
  if (!match) return null;

  const prNumber = parseInt(match[3], 10);
  if (prNumber <= 0) return null;

  return {
    owner: match[1],
    repo: match[2],
    prNumber,
  };
}

/** True for a valid GitHub owner or repository name */
export function isValidName(name: string): boolean {
  return NAME_REGEX.test(name) && name !== '.' && name !== '..';
}

/**
 * Parse `owner/repo`. Returns null when either half is not a valid name.
 */
export function parseRepoSlug(input: string): RepoRef | null {
  const match = input.trim().match(REPO_SLUG_REGEX);
  if (!match) return null;
  const [, owner, repo] = match;
  if (!isValidName(owner) || !isValidName(repo)) return null;
  return { owner, repo };
}

/**
 * Parse a comma-separated list of PR numbers (`"1, 2,3"`).
 * Returns null if any entry is not a positive integer.
 */
export function parsePRNumbers(input: string): number[] | null {
  const parts = input.split(',').map((part) => part.trim());
  if (parts.length === 0 || parts.some((part) => !/^\d+$/.test(part))) return null;

  const numbers = parts.map((part) => parseInt(part, 10));
  if (numbers.some((n) => n <= 0)) return null;
  return numbers;
}
