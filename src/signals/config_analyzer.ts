import type { ConfigValue } from '../types.js';
import type { SignalDraft } from './types.js';

const SOURCE = 'config_analyzer';

/** Key fragments that mark a capacity or rate limit. */
const LIMIT_KEYWORDS = /(max|limit|pool|size|connections|workers|threads|concurren|rate|ttl|timeout)/i;
const FEATURE_FLAGS_KEY = 'FEATURE_FLAGS';
const LOW_CONNECTION_LIMIT = 5;

type ConfigMap = Readonly<Record<string, ConfigValue>>;

/**
 * Flags reduced numeric limits against `baseline` when one is given, or
 * suspiciously low connection limits when it is not, plus feature flags
 * newly switched on.
 */
export function analyzeConfig(config: ConfigMap, baseline?: ConfigMap): SignalDraft[] {
  return [...checkNumericLimits(config, baseline), ...checkFeatureFlags(config, baseline)];
}

function checkNumericLimits(config: ConfigMap, baseline: ConfigMap | undefined): SignalDraft[] {
  const signals: SignalDraft[] = [];

  for (const [key, value] of Object.entries(config)) {
    if (typeof value !== 'number' || !Number.isFinite(value)) continue;
    if (!LIMIT_KEYWORDS.test(key)) continue;

    if (baseline) {
      const before = baseline[key];
      if (typeof before === 'number' && value < before) {
        signals.push({
          type: 'config_change',
          description: `Config '${key}' reduced from ${before} to ${value}`,
          value,
          severity: before > 0 && value / before < 0.5 ? 'high' : 'medium',
          source: SOURCE,
        });
      }
      continue;
    }

    const lowConnectionLimit =
      Number.isInteger(value) && value <= LOW_CONNECTION_LIMIT && key.toLowerCase().includes('connection');
    if (value === 0 || lowConnectionLimit) {
      signals.push({
        type: 'config_change',
        description: `Config '${key}' is set to ${value}, unusually low for a limit/capacity setting`,
        value,
        severity: 'medium',
        source: SOURCE,
      });
    }
  }

  return signals;
}

function checkFeatureFlags(config: ConfigMap, baseline: ConfigMap | undefined): SignalDraft[] {
  const flags = asRecord(config[FEATURE_FLAGS_KEY]);
  const previous = asRecord(baseline?.[FEATURE_FLAGS_KEY]);

  return Object.entries(flags)
    .filter(([flag, enabled]) => enabled === true && previous[flag] !== true)
    .map(([flag]): SignalDraft => ({
      type: 'config_change',
      description: `Feature flag '${flag}' newly enabled`,
      severity: 'medium',
      source: SOURCE,
    }));
}

function asRecord(value: ConfigValue | undefined): Record<string, ConfigValue> {
  if (value === null || value === undefined || typeof value !== 'object' || Array.isArray(value)) return {};
  return value;
}
