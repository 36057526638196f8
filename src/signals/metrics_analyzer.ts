import type { SignalDraft } from './types.js';
import { formatPercent, roundTo } from '../utils/math.js';

const SOURCE = 'metrics_analyzer';

export const LATENCY_SPIKE_MULTIPLIER = 2.0;
export const POOL_SATURATION_THRESHOLD = 0.9;
/** Hit rate must fall below this fraction of its baseline. */
export const CACHE_DEGRADATION_THRESHOLD = 0.5;
const CACHE_HEALTHY_FLOOR = 0.5;

type Metrics = Readonly<Record<string, number>>;

/**
 * Deterministic signals from the incident metrics. Missing keys are skipped;
 * the analyzer emits only what it can compute.
 *
 * Recognised keys: `latency_p99_ms`, `latency_baseline_p99_ms`,
 * `db_connection_pool_used`, `db_connection_pool_max`, `cache_hit_rate`,
 * `cache_hit_rate_baseline`.
 */
export function analyzeMetrics(metrics: Metrics): SignalDraft[] {
  return [...checkLatency(metrics), ...checkDbPool(metrics), ...checkCache(metrics)];
}

function checkLatency(m: Metrics): SignalDraft[] {
  const p99 = m.latency_p99_ms;
  const baseline = m.latency_baseline_p99_ms;
  if (p99 === undefined || baseline === undefined || baseline === 0) return [];

  const ratio = p99 / baseline;
  if (ratio < LATENCY_SPIKE_MULTIPLIER) return [];

  return [{
    type: 'metric_spike',
    description: `p99 latency ${p99}ms vs baseline ${baseline}ms (${Math.round(ratio)}x spike)`,
    value: roundTo(ratio, 1),
    severity: ratio >= 5 ? 'high' : 'medium',
    source: SOURCE,
  }];
}

function checkDbPool(m: Metrics): SignalDraft[] {
  const used = m.db_connection_pool_used;
  const max = m.db_connection_pool_max;
  if (used === undefined || max === undefined || max === 0) return [];

  const saturation = used / max;
  if (saturation < POOL_SATURATION_THRESHOLD) return [];

  return [{
    type: 'resource_saturation',
    description: `DB connection pool ${formatPercent(saturation)} saturated (${used}/${max} connections used)`,
    value: roundTo(saturation, 3),
    severity: 'high',
    source: SOURCE,
  }];
}

function checkCache(m: Metrics): SignalDraft[] {
  const hitRate = m.cache_hit_rate;
  const baseline = m.cache_hit_rate_baseline;
  if (hitRate === undefined) return [];

  const belowFloor = hitRate < CACHE_HEALTHY_FLOOR;
  const degraded = baseline !== undefined && baseline > 0 && hitRate < baseline * CACHE_DEGRADATION_THRESHOLD;
  if (!belowFloor && !degraded) return [];

  const description = baseline !== undefined && baseline > 0
    ? `Cache hit rate dropped from ${formatPercent(baseline)} to ${formatPercent(hitRate)} (${formatPercent((baseline - hitRate) / baseline)} degradation)`
    : `Cache hit rate is ${formatPercent(hitRate)}, below healthy threshold`;

  return [{
    type: 'metric_degradation',
    description,
    value: roundTo(hitRate, 3),
    severity: hitRate < 0.2 ? 'high' : 'medium',
    source: SOURCE,
  }];
}
