/**
 * @fileoverview Progress and formatting helpers for CLI output
 *
 * Progress bars draw on stderr and only when stderr is a terminal, so piped
 * stdout (answers, --json payloads) stays clean.
 */

import cliProgress from 'cli-progress';

export interface ProgressBarHandle {
  increment(delta?: number, payload?: Record<string, unknown>): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  format?: string;
  /** Force the bar off (e.g. --json); it is also off when stderr is not a TTY. */
  enabled?: boolean;
}

const NOOP_PROGRESS: ProgressBarHandle = {
  increment(): void {},
  stop(): void {},
};

export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const enabled = (options.enabled ?? true) && process.stderr.isTTY === true;
  if (!enabled || options.total === 0) return NOOP_PROGRESS;

  const bar = new cliProgress.SingleBar(
    {
      format: options.format ?? '{bar} {percentage}% | {value}/{total} | {task}',
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true,
      stream: process.stderr,
    },
    cliProgress.Presets.shades_classic,
  );
  bar.start(options.total, 0, { task: 'Starting...' });

  return {
    increment(delta = 1, payload?: Record<string, unknown>): void {
      bar.increment(delta, payload);
    },
    stop(): void {
      bar.stop();
    },
  };
}

/**
 * Format milliseconds into a human-readable duration
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format a file size in bytes to human-readable format
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Render a key-value list, keys padded to the longest
 */
export function formatKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): string {
  const maxKeyLength = Math.max(0, ...items.map((item) => item.key.length));
  return items
    .map((item) => `  ${item.key.padEnd(maxKeyLength)}: ${item.value === null ? 'N/A' : String(item.value)}`)
    .join('\n');
}
