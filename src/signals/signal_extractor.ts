/**
 * @fileoverview Default extraction collaborator.
 *
 * Runs the four analyzers in a fixed order (log, metrics, commit, config),
 * isolates each one's failures, then assigns sequential ids. Ids are assigned
 * here rather than in the analyzers so each analyzer stays position-free.
 */

import { ExtractionError } from '../core/errors.js';
import { logDebug, logError } from '../telemetry/logger.js';
import type { IncidentInput, Signal } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import { analyzeCommits } from './commit_analyzer.js';
import { analyzeConfig } from './config_analyzer.js';
import { analyzeLogs } from './log_analyzer.js';
import { analyzeMetrics } from './metrics_analyzer.js';
import type { SignalDraft, SignalExtractor } from './types.js';

const TAG = '[SignalExtractor]';

export interface SignalAnalyzer {
  readonly name: string;
  analyze(incident: IncidentInput): SignalDraft[];
}

export const DEFAULT_ANALYZERS: readonly SignalAnalyzer[] = [
  { name: 'log_analyzer', analyze: (incident) => analyzeLogs(incident.logs) },
  { name: 'metrics_analyzer', analyze: (incident) => analyzeMetrics(incident.metrics) },
  { name: 'commit_analyzer', analyze: (incident) => analyzeCommits(incident.recentCommits) },
  {
    name: 'config_analyzer',
    analyze: (incident) => analyzeConfig(incident.configSnapshot, incident.baselineConfig),
  },
];

export function formatSignalId(position: number): string {
  return `sig_${String(position).padStart(3, '0')}`;
}

export class DefaultSignalExtractor implements SignalExtractor {
  private readonly analyzers: readonly SignalAnalyzer[];

  constructor(analyzers: readonly SignalAnalyzer[] = DEFAULT_ANALYZERS) {
    this.analyzers = analyzers;
  }

  extract(incident: IncidentInput): Signal[] {
    const drafts = this.analyzers.flatMap((analyzer) => this.runAnalyzer(analyzer, incident));
    const signals = drafts.map((draft, index) => ({ ...draft, id: formatSignalId(index + 1) }));
    logDebug(`${TAG}: produced ${signals.length} signal(s)`, { deploymentId: incident.deploymentId });
    return signals;
  }

  private runAnalyzer(analyzer: SignalAnalyzer, incident: IncidentInput): SignalDraft[] {
    try {
      return analyzer.analyze(incident);
    } catch (error) {
      const failure = new ExtractionError(analyzer.name, 'analyze', getErrorMessage(error));
      logError(`${TAG}: ${failure.message}; skipping`, { extractor: failure.extractor, code: failure.code });
      return [];
    }
  }
}
