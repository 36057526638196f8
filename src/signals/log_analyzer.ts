/**
 * @fileoverview Log analyzer: deterministic signals from raw log lines.
 *
 * - error rate spike (ERROR lines vs total)
 * - dominant error type (most frequent normalized message)
 * - error signatures that only appear after the first fifth of the log
 */

import type { SignalDraft } from './types.js';
import { formatPercent, roundTo } from '../utils/math.js';

const SOURCE = 'log_analyzer';

/** Emit a spike signal when more than this share of lines are errors. */
export const ERROR_RATE_THRESHOLD = 0.1;
/** Assumed healthy error rate. */
export const ERROR_RATE_BASELINE = 0.01;
const DOMINANT_MIN_OCCURRENCES = 3;
const PREFIX_LENGTH = 60;

const isErrorLine = (line: string): boolean => line.startsWith('ERROR');

/**
 * Strip the level tag, replace standalone integers with `N` and keep the
 * first 60 characters, so lines that differ only in durations or counts
 * share a signature.
 */
export function errorSignature(line: string): string {
  return line
    .replace(/^(ERROR|WARN|INFO)\s+/, '')
    .replace(/\b\d+\b/g, 'N')
    .slice(0, PREFIX_LENGTH)
    .trim();
}

export function analyzeLogs(logs: readonly string[]): SignalDraft[] {
  if (logs.length === 0) return [];

  const signals: SignalDraft[] = [];
  const total = logs.length;
  const errorLines = logs.filter(isErrorLine);
  const errorRate = errorLines.length / total;

  if (errorRate > ERROR_RATE_THRESHOLD) {
    const ratio = roundTo(errorRate / ERROR_RATE_BASELINE, 1);
    signals.push({
      type: 'log_anomaly',
      description: `Error rate is ${formatPercent(errorRate)}, ${ratio}x above baseline of ${formatPercent(ERROR_RATE_BASELINE)}`,
      value: ratio,
      severity: ratio >= 2 ? 'high' : 'medium',
      source: SOURCE,
    });
  }

  const dominant = mostFrequent(errorLines.map(errorSignature));
  if (dominant && dominant.count >= DOMINANT_MIN_OCCURRENCES) {
    const share = dominant.count / total;
    signals.push({
      type: 'log_anomaly',
      description: `Dominant error: '${dominant.value}' (${dominant.count} occurrences, ${formatPercent(share)} of all logs)`,
      value: dominant.count,
      severity: share > 0.15 ? 'high' : 'medium',
      source: SOURCE,
    });
  }

  const split = Math.max(1, Math.floor(total / 5));
  const early = new Set(logs.slice(0, split).filter(isErrorLine).map(errorSignature));
  const late = new Set(logs.slice(split).filter(isErrorLine).map(errorSignature));
  const appeared = [...late].filter((signature) => !early.has(signature)).sort();
  for (const signature of appeared) {
    signals.push({
      type: 'log_anomaly',
      description: `New error pattern appeared after deploy: '${signature}'`,
      severity: 'medium',
      source: SOURCE,
    });
  }

  return signals;
}

/** Highest count wins; ties go to the value seen first. */
function mostFrequent(values: string[]): { value: string; count: number } | null {
  const counts = new Map<string, number>();
  for (const value of values) counts.set(value, (counts.get(value) ?? 0) + 1);
  let best: { value: string; count: number } | null = null;
  for (const [value, count] of counts) {
    if (!best || count > best.count) best = { value, count };
  }
  return best;
}
