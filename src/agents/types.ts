/**
 * @fileoverview Worker interfaces for the triage runtime
 *
 * Workers are independent analysis units. They receive the same frozen
 * context snapshot, propose hypotheses that cite signal ids, and know
 * nothing about scheduling, validation or ranking.
 */

import type { IncidentInput, Signal, WorkerResult } from '../types.js';

// ============================================================================
// CONTEXT
// ============================================================================

/**
 * Snapshot handed unmodified to every worker in one invocation.
 * Deep-frozen by the pipeline; workers must treat it as read-only.
 */
export interface WorkerContext {
  readonly signals: readonly Signal[];
  readonly incident: Readonly<IncidentInput>;
}

export interface WorkerRunOptions {
  /**
   * Aborted when the executor stops waiting for this worker. Workers doing
   * I/O should pass it along so abandoned calls are released.
   */
  signal: AbortSignal;
}

// ============================================================================
// WORKER INTERFACE
// ============================================================================

export interface Worker {
  /** Unique across the registry; used to attribute hypotheses */
  readonly name: string;

  /**
   * Analyse the context and return zero or more hypotheses. May throw or
   * hang; the executor treats both as "produced nothing".
   */
  run(context: WorkerContext, options: WorkerRunOptions): Promise<WorkerResult>;
}
