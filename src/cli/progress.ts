/**
 * @fileoverview Progress display for CLI runs
 *
 * Worker progress goes to stderr so `--json` output on stdout stays clean.
 */

import cliProgress from 'cli-progress';
import type { WorkerEvent } from '../types.js';

export interface WorkerProgressHandle {
  /** Consume events until the source ends, then stop the bar. */
  follow(events: AsyncIterable<WorkerEvent>): Promise<void>;
}

export function createWorkerProgress(total: number): WorkerProgressHandle {
  const bar = new cliProgress.SingleBar(
    {
      format: '{bar} {value}/{total} workers | {worker}: {status}',
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: false,
      forceRedraw: true,
      stream: process.stderr,
    },
    cliProgress.Presets.shades_classic,
  );

  return {
    async follow(events: AsyncIterable<WorkerEvent>): Promise<void> {
      bar.start(total, 0, { worker: '-', status: 'waiting' });
      try {
        for await (const event of events) {
          const payload = { worker: event.worker, status: event.message };
          if (event.phase === 'started') {
            bar.update(payload);
          } else {
            bar.increment(1, payload);
          }
        }
      } finally {
        bar.stop();
      }
    },
  };
}

/**
 * Format milliseconds into a human-readable duration
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/** Column-aligned table lines, header first. */
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, i) => {
    const maxRowWidth = Math.max(0, ...rows.map((row) => (row[i] ?? '').length));
    return Math.max(header.length, maxRowWidth);
  });

  const pad = (cells: string[]): string =>
    cells.map((cell, i) => (cell ?? '').padEnd(widths[i] ?? 0)).join(' | ').trimEnd();

  return [pad(headers), widths.map((w) => '-'.repeat(w)).join('-+-'), ...rows.map(pad)];
}

export function printTable(headers: string[], rows: string[][]): void {
  for (const line of formatTable(headers, rows)) {
    console.log(line);
  }
}

/**
 * Print a key-value list
 */
export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  const maxKeyLength = Math.max(...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}
