import { SyncError } from '../types/errors.js';
import type { GitHubPullRequest } from '../types/github.js';
import type { SyncOperation, SyncOutcome } from '../types/sync.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * One-line failure summary naming the error kind and the step it stopped at
 */
export function describeFailure(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof SyncError) {
    return `Fatal error [${error.describe()}]: ${message}`;
  }
  return `Fatal error: ${message}`;
}

function formatOperation(operation: SyncOperation): string {
  switch (operation) {
    case 'created':
      return green('CREATED');
    case 'updated':
      return cyan('UPDATED');
    case 'not-updated':
      return dim('NOT UPDATED');
    case 'closed':
      return yellow('CLOSED');
  }
}

/**
 * Human-readable run summary
 */
export function formatOutcome(outcome: SyncOutcome, pullRequest: GitHubPullRequest | null): string {
  const lines: string[] = [];
  lines.push(bold('Branch Sync'));
  lines.push('');
  lines.push(`${bold('Branch:')}       ${outcome.branch}`);
  lines.push(`${bold('Operation:')}    ${formatOperation(outcome.operation)}`);
  lines.push(`${bold('Head:')}         ${outcome.headSha}`);
  if (outcome.rewritten) {
    lines.push(`${bold('History:')}      ${yellow('rebased onto base')}`);
  }
  if (pullRequest) {
    lines.push(`${bold('Pull Request:')} #${pullRequest.number} ${cyan(pullRequest.url)}`);
  }
  return lines.join('\n');
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}
