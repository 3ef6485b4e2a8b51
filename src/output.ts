import pc from 'picocolors';
import type { BatchFailure, BatchLogEvent } from './batch.js';
import { describeApiError, scrubSecrets } from './errors.js';

/**
 * Print a [debug] line in dimmed text. Only call when --verbose is active.
 */
export function printDebug(message: string): void {
  console.log(pc.dim(`[debug] ${scrubSecrets(message)}`));
}

export function printWarning(message: string): void {
  console.error(pc.yellow(`\u26A0 ${scrubSecrets(message)}`));
}

/**
 * Print errors in red, one per line.
 */
export function printErrors(messages: string[]): void {
  for (const message of messages) {
    console.error(pc.red(`\u2716 ${scrubSecrets(message)}`));
  }
}

export function printSaved(prNumber: number, filePath: string): void {
  console.log(`${pc.green('\u2714')} ${pc.dim(`#${prNumber}`)} ${scrubSecrets(filePath)}`);
}

/**
 * Format milliseconds as human-readable duration.
 * Under 60s: "1.2s", over 60s: "1m 12s"
 */
export function formatDuration(ms: number): string {
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/** Label for the part of a PR that failed */
function sectionLabel(failure: BatchFailure): string {
  switch (failure.section) {
    case 'metadata':
      return 'details';
    case 'comments':
      return 'comments';
    case 'reviews':
      return 'reviews';
    case 'reviewComments':
      return 'review comments';
    case null:
      return 'request';
  }
}

export function formatFailure(failure: BatchFailure): string {
  return `#${failure.prNumber} ${sectionLabel(failure)}: ${scrubSecrets(describeApiError(failure.error))}`;
}

/**
 * Print the batch outcome: one summary line, then each failure.
 * Format: "✔ 3 saved · ✖ 1 failed"
 */
export function printBatchSummary(saved: number, failures: string[]): void {
  const parts = [pc.green(`\u2714 ${saved} saved`)];
  if (failures.length > 0) {
    parts.push(pc.red(`\u2716 ${failures.length} failed`));
  }
  console.log();
  console.log(parts.join(pc.dim(' \u00B7 ')));
  for (const failure of failures) {
    console.log(pc.red(`  ${failure}`));
  }
}

/**
 * Map driver events onto terminal output. Rate-limit waits are always shown
 * because they can pause the run for minutes; the rest only with --verbose.
 */
export function printBatchEvent(event: BatchLogEvent, verbose: boolean): void {
  switch (event.type) {
    case 'waiting': {
      const who = event.prNumber !== null ? ` before PR #${event.prNumber}` : '';
      const why = event.reason === 'rate-limited' ? 'Rate limit reached' : 'Rate limit nearly exhausted';
      printWarning(`${why}. Waiting ${formatDuration(event.ms)}${who}`);
      break;
    }
    case 'discovered':
      console.log(pc.dim(`Found ${event.numbers.length} PRs: ${event.numbers.map((n) => `#${n}`).join(', ')}`));
      break;
    case 'assembled':
      if (verbose) {
        const retries = event.attempts > 1 ? ` after ${event.attempts} attempts` : '';
        printDebug(`Fetched PR #${event.prNumber}${retries}`);
      }
      break;
    case 'failed':
      if (verbose) printDebug(`Failed ${formatFailure(event.failure)}`);
      break;
  }
}
