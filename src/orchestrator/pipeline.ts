/**
 * @fileoverview Triage pipeline
 *
 * One `execute()` call walks a fixed sequence of stages:
 *
 *   init -> extract -> dispatch -> validate -> aggregate -> synthesize -> decide
 *
 * Nothing but the worker registry survives between calls. Only a malformed
 * incident (or, at construction, bad configuration) throws; every later
 * failure narrows the result and, at worst, yields an empty ranking that
 * requires human review.
 */

import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import { Aggregator } from '../aggregation/aggregator.js';
import { ParallelExecutor } from '../agents/parallel_executor.js';
import { WorkerRegistry } from '../agents/registry.js';
import type { Worker, WorkerContext } from '../agents/types.js';
import { createPipelineConfig, type PipelineConfig } from '../config/index.js';
import { ExtractionError, IncidentValidationError } from '../core/errors.js';
import { Validator } from '../judge/validator.js';
import { EvidenceStore } from '../memory/evidence_store.js';
import { checkIncidentInput, checkSignal } from '../schemas/incident.js';
import { DefaultSignalExtractor } from '../signals/signal_extractor.js';
import type { SignalExtractor } from '../signals/types.js';
import { fallbackSynthesis, type NarrativeSynthesizer } from '../synthesis/fallback.js';
import { logDebug, logError, logWarning } from '../telemetry/logger.js';
import type {
  ExecutionResult,
  IncidentInput,
  NarrativeSynthesis,
  RankedHypothesis,
  Signal,
  Verdict,
  WorkerEventSink,
} from '../types.js';
import { getErrorMessage } from '../utils/errors.js';

const TAG = '[TriagePipeline]';

export type PipelineStage = 'extract' | 'dispatch' | 'validate' | 'aggregate' | 'synthesize' | 'decide';

export interface TriagePipelineOptions {
  /** Partial values are merged over the defaults and validated */
  config?: Partial<PipelineConfig>;
  extractor?: SignalExtractor;
  /** Absent: the deterministic fallback narrative is used */
  synthesizer?: NarrativeSynthesizer;
}

function deepFreeze<T>(value: T): T {
  if (!value || typeof value !== 'object' || Object.isFrozen(value)) return value;
  Object.freeze(value);
  for (const entry of Object.values(value)) {
    deepFreeze(entry);
  }
  return value;
}

export class TriagePipeline {
  readonly config: Readonly<PipelineConfig>;
  private readonly registry = new WorkerRegistry();
  private readonly executor: ParallelExecutor;
  private readonly validator = new Validator();
  private readonly aggregator: Aggregator;
  private readonly extractor: SignalExtractor;
  private readonly synthesizer?: NarrativeSynthesizer;

  constructor(options: TriagePipelineOptions = {}) {
    this.config = Object.freeze(createPipelineConfig(options.config));
    this.executor = new ParallelExecutor({ timeoutMs: this.config.workerTimeoutMs });
    this.aggregator = new Aggregator({ grouping: this.config.grouping });
    this.extractor = options.extractor ?? new DefaultSignalExtractor();
    this.synthesizer = options.synthesizer;
  }

  /** @throws DuplicateNameError when a worker with the same name is already registered */
  register(worker: Worker): void {
    this.registry.register(worker);
  }

  get workerCount(): number {
    return this.registry.count();
  }

  /**
   * Run one analysis. `incident` is validated first; unknown fields are
   * stripped and missing collections default to empty.
   *
   * @throws IncidentValidationError when the payload does not match the incident schema
   */
  async execute(incident: unknown, sink?: WorkerEventSink): Promise<ExecutionResult> {
    const startedAt = performance.now();
    const executionId = randomUUID();

    const checked = checkIncidentInput(incident);
    if (!checked.success) throw new IncidentValidationError(checked.issues);
    const input = checked.data;

    const store = new EvidenceStore();
    store.addSignals(await this.extractSignals(input));
    this.stage('extract', executionId, { signals: store.size });

    const context: WorkerContext = deepFreeze({ signals: store.signals(), incident: input });
    const workers = this.registry.all();
    const results = await this.executor.execute(workers, context, sink);
    this.stage('dispatch', executionId, { workers: workers.length, succeeded: results.length });

    const verdicts = results.map((result) => this.validator.validate(result, store));
    const rejected = verdicts.filter((verdict) => !verdict.valid).length;
    this.logRejections(verdicts, executionId);
    this.stage('validate', executionId, { valid: verdicts.length - rejected, rejected });

    const rankedHypotheses = this.aggregator.aggregate(verdicts);
    this.stage('aggregate', executionId, { ranked: rankedHypotheses.length });

    const synthesis = await this.synthesize(context.signals, rankedHypotheses, executionId);
    this.stage('synthesize', executionId, { custom: this.synthesizer !== undefined });

    const top = rankedHypotheses[0];
    const requiresHumanReview = !top || top.confidence < this.config.humanReviewThreshold;
    this.stage('decide', executionId, { requiresHumanReview });

    return deepFreeze({
      executionId,
      rankedHypotheses,
      signalsUsed: store.signals(),
      synthesis,
      requiresHumanReview,
      stats: {
        workersRegistered: workers.length,
        workersSucceeded: results.length,
        verdictsRejected: rejected,
        durationMs: performance.now() - startedAt,
      },
    });
  }

  private async extractSignals(incident: IncidentInput): Promise<Signal[]> {
    let extracted: unknown;
    try {
      extracted = await this.extractor.extract(incident);
    } catch (error) {
      const failure = new ExtractionError(this.extractor.constructor.name, 'extract', getErrorMessage(error));
      logError(`${TAG}: ${failure.message}; continuing without signals`, {
        deploymentId: incident.deploymentId,
        code: failure.code,
      });
      return [];
    }
    if (!Array.isArray(extracted)) {
      logError(`${TAG}: signal extractor returned a non-array; continuing without signals`, {
        deploymentId: incident.deploymentId,
      });
      return [];
    }

    const signals: Signal[] = [];
    for (const candidate of extracted) {
      const check = checkSignal(candidate);
      if (check.success) {
        signals.push(check.data);
      } else {
        logWarning(`${TAG}: dropping malformed signal`, { issues: check.issues });
      }
    }
    return signals;
  }

  private logRejections(verdicts: readonly Verdict[], executionId: string): void {
    for (const verdict of verdicts) {
      if (verdict.valid) continue;
      logWarning(`${TAG}: rejected result from ${verdict.result.agentName || '<unnamed>'}: ${verdict.rejectionReason}`, {
        executionId,
        code: verdict.rejectionCode,
      });
    }
  }

  private async synthesize(
    signals: readonly Signal[],
    ranked: readonly RankedHypothesis[],
    executionId: string,
  ): Promise<NarrativeSynthesis> {
    if (!this.synthesizer) return fallbackSynthesis(ranked);
    try {
      return await this.synthesizer.synthesize(signals, ranked);
    } catch (error) {
      logWarning(`${TAG}: synthesizer failed; using fallback narrative`, {
        executionId,
        error: getErrorMessage(error),
      });
      return fallbackSynthesis(ranked);
    }
  }

  private stage(stage: PipelineStage, executionId: string, details: Record<string, unknown>): void {
    logDebug(`${TAG}: ${stage} done`, { executionId, ...details });
  }
}
