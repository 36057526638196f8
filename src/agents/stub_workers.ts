/**
 * @fileoverview Canned workers used by `triage demo` and `triage analyze`.
 *
 * Each one waits a fixed delay, then cites up to two signals whose source
 * contains its keyword (or the first signal when none match) under a fixed
 * label and confidence.
 */

import type { Signal, WorkerResult } from '../types.js';
import { sleep } from '../utils/async.js';
import type { Worker, WorkerContext, WorkerRunOptions } from './types.js';

export interface StubWorkerSpec {
  name: string;
  label: string;
  description: string;
  confidence: number;
  delayMs: number;
  /** Matched as a substring of `Signal.source` */
  sourceKeyword: string;
}

const MAX_CITED_SIGNALS = 2;

export const DEMO_WORKER_SPECS: readonly StubWorkerSpec[] = [
  {
    name: 'log_agent',
    label: 'Error Rate Spike',
    description: 'Error rate elevated above baseline',
    confidence: 0.82,
    delayMs: 800,
    sourceKeyword: 'log',
  },
  {
    name: 'metrics_agent',
    label: 'DB Connection Pool Exhaustion',
    description: 'Connection pool near capacity',
    confidence: 0.91,
    delayMs: 600,
    sourceKeyword: 'metrics',
  },
  {
    name: 'commit_agent',
    label: 'Cache Removal Impact',
    description: 'Recent commit removed cache layer',
    confidence: 0.78,
    delayMs: 1000,
    sourceKeyword: 'commit',
  },
  {
    name: 'config_agent',
    label: 'Connection Pool Undersized',
    description: 'Pool size insufficient for traffic',
    confidence: 0.65,
    delayMs: 700,
    sourceKeyword: 'config',
  },
];

export class StubWorker implements Worker {
  readonly name: string;

  constructor(private readonly spec: StubWorkerSpec) {
    this.name = spec.name;
  }

  async run(context: WorkerContext, options: WorkerRunOptions): Promise<WorkerResult> {
    await sleep(this.spec.delayMs, options.signal);

    const cited = pickSignals(context.signals, this.spec.sourceKeyword);
    if (cited.length === 0) {
      return { agentName: this.name, hypotheses: [], executionTimeMs: 0 };
    }

    return {
      agentName: this.name,
      hypotheses: [
        {
          label: this.spec.label,
          description: this.spec.description,
          confidence: this.spec.confidence,
          severity: 'high',
          supportingSignals: cited.map((signal) => signal.id),
          contributingAgent: this.name,
        },
      ],
      executionTimeMs: this.spec.delayMs,
    };
  }
}

function pickSignals(signals: readonly Signal[], keyword: string): Signal[] {
  const matching = signals.filter((signal) => signal.source.includes(keyword));
  return (matching.length > 0 ? matching : signals.slice(0, 1)).slice(0, MAX_CITED_SIGNALS);
}

/** `delayScale` shortens or stretches every delay; tests pass 0. */
export function createDemoWorkers(delayScale = 1): StubWorker[] {
  return DEMO_WORKER_SPECS.map((spec) => new StubWorker({ ...spec, delayMs: spec.delayMs * delayScale }));
}
