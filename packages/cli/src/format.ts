import chalk from 'chalk';
import type { JobStatus, Severity, SuggestionStatus } from '@pr-sentinel/shared';

export function statusColor(status: JobStatus | SuggestionStatus): (text: string) => string {
  switch (status) {
    case 'completed':
    case 'accepted':
      return chalk.green;
    case 'processing':
      return chalk.blue;
    case 'pending':
      return chalk.yellow;
    case 'failed':
    case 'rejected':
      return chalk.red;
    case 'ignored':
      return chalk.gray;
  }
}

export function severityColor(severity: Severity): (text: string) => string {
  switch (severity) {
    case 'critical':
      return chalk.red.bold;
    case 'moderate':
      return chalk.yellow;
    case 'minor':
      return chalk.gray;
  }
}

export function progressBar(progress: number, width = 20): string {
  const filled = Math.round((Math.min(Math.max(progress, 0), 100) / 100) * width);
  const bar = chalk.green('█'.repeat(filled)) + chalk.gray('░'.repeat(width - filled));
  return `${bar} ${progress}%`;
}

/** Keeps the tail of long paths, which is the part that identifies the file */
export function truncatePath(path: string, max: number): string {
  return path.length > max ? '...' + path.slice(-(max - 3)) : path;
}

export function formatLocation(filePath: string, lineNumber: number, lineEnd: number | null): string {
  if (lineNumber === 0) return filePath;
  return lineEnd !== null && lineEnd !== lineNumber ? `${filePath}:${lineNumber}-${lineEnd}` : `${filePath}:${lineNumber}`;
}

export function formatRate(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

export function formatDuration(ms: number | null): string {
  if (ms === null) return '-';
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

export function isTerminal(status: JobStatus): boolean {
  return status === 'completed' || status === 'failed';
}
