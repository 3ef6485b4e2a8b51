import { mkdirSync, writeFileSync } from 'node:fs';
import * as path from 'node:path';
import { formatConversationJson, formatConversationMarkdown } from './formatter.js';
import type { ConversationRecord, OutputFormat } from './types.js';

/** Default directory conversations are written to, relative to the cwd */
export const DEFAULT_OUTPUT_DIR = 'pr-conversation';

export interface WriteOptions {
  repo: string;
  format: OutputFormat;
  outputDir: string;
  /** Explicit destination; only meaningful when a single PR is fetched */
  outputFile?: string;
}

/**
 * Build `{outputDir}/{repo}-{number}.{md|json}`.
 *
 * The repo name becomes part of a file name, so separators and `..` are
 * rejected and the result must stay inside the output directory.
 */
export function getOutputPath(repo: string, prNumber: number, format: OutputFormat, outputDir: string): string {
  if (!repo || repo.includes('/') || repo.includes('\\') || repo.includes('..')) {
    throw new Error(`Repository name '${repo}' contains unsafe path characters`);
  }

  const base = path.resolve(outputDir);
  const resolved = path.resolve(base, `${repo}-${prNumber}.${format}`);

  if (!resolved.startsWith(base + path.sep)) {
    throw new Error('Output path escapes the output directory');
  }

  return resolved;
}

/**
 * Render a conversation and write it to disk. Returns the absolute path written.
 */
export function writeConversation(record: ConversationRecord, options: WriteOptions): string {
  const target = options.outputFile
    ? path.resolve(options.outputFile)
    : getOutputPath(options.repo, record.prNumber, options.format, options.outputDir);

  const content =
    options.format === 'json' ? formatConversationJson(record) : formatConversationMarkdown(record);

  mkdirSync(path.dirname(target), { recursive: true });
  writeFileSync(target, content, 'utf-8');
  return target;
}
