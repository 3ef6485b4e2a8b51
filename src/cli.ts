#!/usr/bin/env node
import { Command, Option } from 'commander';
import { config as loadEnv } from 'dotenv';
import pc from 'picocolors';
import { DEFAULT_CONCURRENCY, DEFAULT_LOW_BUDGET_THRESHOLD, DEFAULT_MAX_RATE_LIMIT_RETRIES, runBatch, type BatchReport } from './batch.js';
import { resolveConfig, type CliOptions } from './config.js';
import {
  BatchPreconditionError,
  EXIT_API_ERROR,
  EXIT_INVALID_INPUT,
  EXIT_PARTIAL_FAILURE,
  EXIT_UNEXPECTED,
  sanitizeError,
} from './errors.js';
import {
  formatDuration,
  formatFailure,
  printBatchEvent,
  printBatchSummary,
  printDebug,
  printErrors,
  printSaved,
  printWarning,
} from './output.js';
import { DEFAULT_PER_PAGE } from './paginator.js';
import { RateLimitBudget } from './rate-limit.js';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, OctokitTransport, createOctokit } from './transport.js';
import { DEFAULT_OUTPUT_DIR, writeConversation } from './writer.js';

loadEnv();

const program = new Command();

program
  .name('prscribe')
  .description('Save the full conversation of GitHub pull requests as Markdown or JSON')
  .version('0.1.0')
  .argument('[pr-url]', 'GitHub pull request URL (alternative to --repo with --pr)')
  .option('--owner <owner>', 'Repository owner')
  .option('--repo <repo>', 'Repository name, or owner/name')
  .option('--pr <number>', 'Single pull request number')
  .option('--prs <list>', 'Comma-separated pull request numbers (e.g. 1,2,3)')
  .option('--latest <n>', 'The N most recently updated pull requests')
  .addOption(
    new Option('--state <state>', 'Pull requests considered by --latest')
      .choices(['open', 'closed', 'all'])
      .default('all'),
  )
  .addOption(
    new Option('--format <format>', 'Output format: md (Markdown) or json')
      .choices(['md', 'json'])
      .default('md'),
  )
  .option('--output-dir <dir>', 'Directory for conversation files', DEFAULT_OUTPUT_DIR)
  .option('--output-file <path>', 'Output file for a single PR (default: <output-dir>/<repo>-<n>.<format>)')
  .option('--token <token>', 'GitHub token (default: GITHUB_TOKEN, GH_TOKEN, then gh auth token)')
  .option('--base-url <url>', 'GitHub API root, for GitHub Enterprise', DEFAULT_BASE_URL)
  .option('--timeout <seconds>', 'Per-request timeout in seconds', String(DEFAULT_TIMEOUT_MS / 1000))
  .option('--concurrency <n>', 'Pull requests fetched at once', String(DEFAULT_CONCURRENCY))
  .option('--rate-limit-threshold <n>', 'Pause until reset when this few requests remain', String(DEFAULT_LOW_BUDGET_THRESHOLD))
  .option('--max-retries <n>', 'Retries per pull request after hitting the rate limit', String(DEFAULT_MAX_RATE_LIMIT_RETRIES))
  .option('--page-size <n>', 'Items requested per page (1-100)', String(DEFAULT_PER_PAGE))
  .option('--verbose', 'Show debug info: token source, timing, rate-limit budget')
  .action(async (prUrl: string | undefined, options: CliOptions) => {
    // 1. Resolve configuration (collect all problems, report at once)
    const resolved = resolveConfig(prUrl, options);
    if (!resolved.ok) {
      printErrors(resolved.error);
      process.exit(EXIT_INVALID_INPUT);
    }
    const config = resolved.value;
    const target = `${config.owner}/${config.repo}`;

    if (config.verbose) {
      printDebug(`Token: ${config.tokenSource}`);
      printDebug(`API: ${config.baseUrl}`);
    }
    if (!config.token) {
      printWarning('No GitHub token found, using unauthenticated requests (lower rate limit)');
    }

    // 2. Fetch conversations
    const budget = new RateLimitBudget();
    const transport = new OctokitTransport(
      createOctokit({ token: config.token, baseUrl: config.baseUrl }),
      { timeoutMs: config.timeoutMs, budget },
    );

    const what =
      config.selection.kind === 'latest'
        ? `the ${config.selection.count} latest pull requests (${config.selection.scope})`
        : config.selection.numbers.map((n) => `#${n}`).join(', ');
    console.log(pc.dim(`Fetching ${what} from ${target}...`));

    let report: BatchReport;
    const fetchStart = performance.now();
    try {
      report = await runBatch({ transport, budget }, config, config.selection, {
        concurrency: config.concurrency,
        lowBudgetThreshold: config.lowBudgetThreshold,
        maxRateLimitRetries: config.maxRateLimitRetries,
        perPage: config.perPage,
        log: (event) => printBatchEvent(event, config.verbose),
      });
    } catch (error: unknown) {
      if (error instanceof BatchPreconditionError) {
        printErrors([error.message]);
        process.exit(EXIT_API_ERROR);
      }
      printErrors([`Unexpected failure: ${sanitizeError(error)}`]);
      process.exit(EXIT_UNEXPECTED);
    }

    if (config.verbose) {
      printDebug(`Fetch: ${formatDuration(performance.now() - fetchStart)}`);
      const { remaining, limit, resetAt } = budget.snapshot();
      if (remaining !== null && limit !== null) {
        printDebug(`Rate limit: ${remaining}/${limit} remaining${resetAt ? `, resets ${resetAt.toISOString()}` : ''}`);
      }
    }

    // 3. Write each conversation
    const failures = report.failed.map(formatFailure);
    let saved = 0;
    for (const record of report.succeeded) {
      try {
        const file = writeConversation(record, {
          repo: config.repo,
          format: config.format,
          outputDir: config.outputDir,
          outputFile: config.outputFile,
        });
        printSaved(record.prNumber, file);
        saved++;
      } catch (error: unknown) {
        failures.push(`#${record.prNumber} write: ${sanitizeError(error)}`);
      }
    }

    // 4. Summary and exit status
    printBatchSummary(saved, failures);
    if (failures.length > 0) {
      process.exit(EXIT_PARTIAL_FAILURE);
    }
  });

await program.parseAsync();
