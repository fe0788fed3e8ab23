import pc from 'picocolors';
import { LocalVcsError, RemoteApiError, type PublishError } from './errors.js';
import type { CombinedState, PrereqFailure, PublishResult } from './types.js';

const STATUS_GLYPHS: Record<CombinedState, string> = {
  failure: '\u274C',
  pending: '\u{1F550}',
  success: '\u2705',
  unknown: '?',
};

/**
 * Render a publish result on one line:
 * `status:<glyph>  assignee:<login> <pr url>[ <ci url>]`
 */
export function formatPublishResult(result: PublishResult): string {
  let line = `status:${STATUS_GLYPHS[result.pullRequestCombinedStatus]}`;
  line += `  assignee:${result.pullRequestAssignee} ${result.pullRequestUrl}`;
  if (result.ciBuildUrl) {
    line += ` ${result.ciBuildUrl}`;
  }
  return line;
}

export function printPublishResult(result: PublishResult): void {
  console.log(formatPublishResult(result));
}

/** The failing git command or HTTP status behind an error, when it carries one */
export function formatFailureDetail(error: PublishError): string | null {
  if (error instanceof LocalVcsError) return `command: ${error.command}`;
  if (error instanceof RemoteApiError && error.status !== null) return `HTTP status: ${error.status}`;
  return null;
}

/**
 * Print prerequisite failures as red errors with actionable help.
 */
export function printErrors(failures: PrereqFailure[]): void {
  for (const f of failures) {
    console.error(pc.red(`\u2716 ${f.message}`));
    console.error(pc.dim(`  ${f.help}`));
  }
}

/**
 * Print a progress message without a trailing newline.
 * Used for "Publishing <branch>..." where " done" is appended on the same line.
 */
export function printProgress(message: string): void {
  process.stdout.write(message);
}

/**
 * Complete a progress line by printing " done" in green with a newline.
 */
export function printProgressDone(): void {
  console.log(pc.green(' done'));
}

/**
 * Print a [debug] line in dimmed text. Only call when --verbose is active.
 */
export function printDebug(message: string): void {
  console.log(pc.dim(`[debug] ${message}`));
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
