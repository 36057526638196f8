/**
 * @fileoverview Core data model for the triage runtime.
 *
 * Signals are facts produced before any worker runs; hypotheses are worker
 * claims that must cite them. Everything a caller receives back is built
 * from these types.
 */

// ============================================================================
// EVIDENCE
// ============================================================================

export type Severity = 'low' | 'medium' | 'high';

export const SEVERITIES: readonly Severity[] = ['low', 'medium', 'high'];

/**
 * A verified, immutable fact about an incident.
 */
export interface Signal {
  /** Sequential id assigned by the extractor (`sig_001`, `sig_002`, ...) */
  readonly id: string;
  /** e.g. `log_anomaly`, `metric_spike`, `resource_saturation`, `config_change` */
  readonly type: string;
  readonly description: string;
  /** Absent for qualitative signals such as a commit or flag change */
  readonly value?: number;
  readonly severity: Severity;
  /** Name of the analyzer that produced the signal */
  readonly source: string;
}

// ============================================================================
// INCIDENT INPUT
// ============================================================================

export interface CommitRecord {
  sha: string;
  message: string;
  diffSummary: string;
}

export type ConfigValue = string | number | boolean | null | ConfigValue[] | { [key: string]: ConfigValue };

export interface IncidentInput {
  deploymentId: string;
  logs: string[];
  metrics: Record<string, number>;
  recentCommits: CommitRecord[];
  configSnapshot: Record<string, ConfigValue>;
  /** Known-good config the snapshot is compared against, when available */
  baselineConfig?: Record<string, ConfigValue>;
}

// ============================================================================
// CLAIMS
// ============================================================================

/**
 * A candidate explanation proposed by one worker.
 */
export interface Hypothesis {
  label: string;
  description: string;
  /** 0.0 - 1.0 */
  confidence: number;
  severity: Severity;
  /** Signal ids the claim rests on; must be non-empty to survive validation */
  supportingSignals: string[];
  contributingAgent: string;
}

/**
 * A merged claim produced by the aggregator. Contributors are kept as a
 * sorted list rather than a joined string; use `formatContributors` for display.
 */
export interface RankedHypothesis extends Omit<Hypothesis, 'contributingAgent'> {
  contributingAgents: string[];
}

export interface WorkerResult {
  agentName: string;
  hypotheses: Hypothesis[];
  /** Overwritten by the executor with its own wall-clock measurement */
  executionTimeMs: number;
}

export type RejectionCode =
  | 'empty_agent_name'
  | 'unsupported_hypothesis'
  | 'unknown_signal'
  | 'confidence_out_of_range';

export type Verdict =
  | { valid: true; result: WorkerResult }
  | { valid: false; result: WorkerResult; rejectionCode: RejectionCode; rejectionReason: string };

// ============================================================================
// OUTPUT
// ============================================================================

export interface NarrativeSynthesis {
  summary: string;
  keyFinding: string;
  /** Confidence that the ranked order is right, 0.0 - 1.0 */
  confidence: number;
}

export interface ExecutionStats {
  workersRegistered: number;
  workersSucceeded: number;
  verdictsRejected: number;
  durationMs: number;
}

export interface ExecutionResult {
  readonly executionId: string;
  readonly rankedHypotheses: readonly RankedHypothesis[];
  readonly signalsUsed: readonly Signal[];
  readonly synthesis?: NarrativeSynthesis;
  readonly requiresHumanReview: boolean;
  readonly stats: ExecutionStats;
}

// ============================================================================
// WORKER EVENTS
// ============================================================================

export type WorkerPhase = 'started' | 'completed' | 'errored';

export interface WorkerEvent {
  worker: string;
  phase: WorkerPhase;
  message: string;
  /** Milliseconds since the start of the whole fan-out */
  relativeMs: number;
}

export interface WorkerEventSink {
  emit(event: WorkerEvent): void;
}

// ============================================================================
// HELPERS
// ============================================================================

export function formatContributors(hypothesis: Pick<RankedHypothesis, 'contributingAgents'>): string {
  return hypothesis.contributingAgents.join(', ');
}
