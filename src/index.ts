/**
 * @fileoverview triage-runtime - ranked root-cause hypotheses from independent workers
 *
 * Runs every registered worker concurrently against one incident, rejects
 * any claim that does not cite an extracted signal, merges corroborating
 * claims and returns up to five ranked hypotheses.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { TriagePipeline } from 'triage-runtime';
 *
 * const pipeline = new TriagePipeline({ config: { workerTimeoutMs: 10_000 } });
 * pipeline.register({
 *   name: 'metrics_agent',
 *   async run({ signals }, { signal }) {
 *     // ... call a model, honour `signal` for cancellation ...
 *     return { agentName: 'metrics_agent', hypotheses: [], executionTimeMs: 0 };
 *   },
 * });
 *
 * const result = await pipeline.execute(incident);
 * if (result.requiresHumanReview) {
 *   // page someone
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// DATA MODEL
// ============================================================================

export type {
  Severity,
  Signal,
  CommitRecord,
  ConfigValue,
  IncidentInput,
  Hypothesis,
  RankedHypothesis,
  WorkerResult,
  RejectionCode,
  Verdict,
  NarrativeSynthesis,
  ExecutionStats,
  ExecutionResult,
  WorkerPhase,
  WorkerEvent,
  WorkerEventSink,
} from './types.js';
export { SEVERITIES, formatContributors } from './types.js';
export { TRIAGE_VERSION } from './version.js';

// ============================================================================
// PIPELINE
// ============================================================================

export { TriagePipeline, type TriagePipelineOptions, type PipelineStage } from './orchestrator/pipeline.js';
export type { Worker, WorkerContext, WorkerRunOptions } from './agents/types.js';
export { WorkerRegistry } from './agents/registry.js';
export { ParallelExecutor, DEFAULT_WORKER_TIMEOUT_MS, type ParallelExecutorOptions } from './agents/parallel_executor.js';
export { StubWorker, createDemoWorkers, DEMO_WORKER_SPECS, type StubWorkerSpec } from './agents/stub_workers.js';
export { EvidenceStore } from './memory/evidence_store.js';
export { Validator } from './judge/validator.js';
export {
  Aggregator,
  labelsMatch,
  roundConfidence,
  MAX_RANKED_HYPOTHESES,
  AGREEMENT_BONUS,
  type AggregatorOptions,
  type GroupingStrategy,
} from './aggregation/aggregator.js';
export { WorkerEventQueue, DEFAULT_EVENT_QUEUE_CAPACITY } from './events.js';
export {
  fallbackSynthesis,
  NO_HYPOTHESES_SUMMARY,
  NO_HYPOTHESES_FINDING,
  type NarrativeSynthesizer,
} from './synthesis/fallback.js';

// ============================================================================
// SIGNALS
// ============================================================================

export type { SignalDraft, SignalExtractor } from './signals/types.js';
export { DefaultSignalExtractor, DEFAULT_ANALYZERS, formatSignalId, type SignalAnalyzer } from './signals/signal_extractor.js';
export { analyzeLogs, errorSignature } from './signals/log_analyzer.js';
export { analyzeMetrics } from './signals/metrics_analyzer.js';
export { analyzeCommits } from './signals/commit_analyzer.js';
export { analyzeConfig } from './signals/config_analyzer.js';

// ============================================================================
// BOUNDARY SCHEMAS
// ============================================================================

export {
  incidentInputSchema,
  signalSchema,
  hypothesisSchema,
  workerResultSchema,
  checkIncidentInput,
  checkSignal,
  checkWorkerResult,
  type SchemaCheck,
} from './schemas/incident.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export {
  loadPipelineConfig,
  createPipelineConfig,
  pipelineConfigSchema,
  DEFAULT_PIPELINE_CONFIG,
  DEFAULT_HUMAN_REVIEW_THRESHOLD,
  CONFIG_ENV_VARS,
  type PipelineConfig,
  type LoadPipelineConfigOptions,
} from './config/index.js';

// ============================================================================
// ERRORS & LOGGING
// ============================================================================

export {
  TriageError,
  DuplicateNameError,
  ConfigError,
  IncidentValidationError,
  WorkerExecutionError,
  ExtractionError,
  isTriageError,
  type ErrorJSON,
} from './core/errors.js';
export { getErrorMessage, getErrorStack } from './utils/errors.js';
export { TimeoutError, withTimeout, sleep } from './utils/async.js';
export { setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';
