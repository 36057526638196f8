import { performance } from 'node:perf_hooks';
import type { WorkerEventSink, WorkerPhase, WorkerResult } from '../types.js';
import type { Worker, WorkerContext } from './types.js';
import { WorkerExecutionError } from '../core/errors.js';
import { checkWorkerResult } from '../schemas/incident.js';
import { TimeoutError, withTimeout } from '../utils/async.js';
import { getErrorMessage } from '../utils/errors.js';
import { logDebug, logError, logWarning } from '../telemetry/logger.js';

const TAG = 'ParallelExecutor';

export const DEFAULT_WORKER_TIMEOUT_MS = 30_000;

export interface ParallelExecutorOptions {
  /** Per-worker deadline. Defaults to 30s. */
  timeoutMs?: number;
}

/**
 * Runs every worker concurrently against one context snapshot.
 *
 * Each worker gets its own timer and its own error boundary: a worker that
 * throws or misses its deadline is logged and left out of the returned list,
 * and nothing it does reaches its siblings or the caller. The executor also
 * owns timing and overwrites whatever `executionTimeMs` a worker reported.
 *
 * On timeout the worker's AbortSignal is aborted and the executor stops
 * waiting. A worker that ignores the signal runs to completion unobserved.
 */
export class ParallelExecutor {
  readonly timeoutMs: number;

  constructor(options: ParallelExecutorOptions = {}) {
    const timeoutMs = options.timeoutMs ?? DEFAULT_WORKER_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`Worker timeout must be a positive finite number of ms, got ${timeoutMs}`);
    }
    this.timeoutMs = timeoutMs;
  }

  /**
   * Results come back in worker order, not completion order. Workers that
   * failed are absent; the list may be empty.
   */
  async execute(
    workers: readonly Worker[],
    context: WorkerContext,
    sink?: WorkerEventSink,
  ): Promise<WorkerResult[]> {
    if (workers.length === 0) return [];

    const fanOutStart = performance.now();
    const settled = await Promise.all(
      workers.map((worker) => this.runSafely(worker, context, sink, fanOutStart))
    );
    return settled.filter((result): result is WorkerResult => result !== null);
  }

  /** Never rejects: every failure is converted to `null`. */
  private async runSafely(
    worker: Worker,
    context: WorkerContext,
    sink: WorkerEventSink | undefined,
    fanOutStart: number,
  ): Promise<WorkerResult | null> {
    const emit = (phase: WorkerPhase, message: string): void => {
      if (!sink) return;
      try {
        sink.emit({
          worker: worker.name,
          phase,
          message,
          relativeMs: performance.now() - fanOutStart,
        });
      } catch (error) {
        logWarning(`${TAG}: event sink rejected ${phase} event`, {
          worker: worker.name,
          error: getErrorMessage(error),
        });
      }
    };

    const startedAt = performance.now();
    const controller = new AbortController();
    emit('started', 'analyzing...');

    try {
      // async wrapper so a synchronous throw inside run() becomes a rejection
      const pending = (async () => worker.run(context, { signal: controller.signal }))();
      const raw = await withTimeout(pending, this.timeoutMs, {
        context: `worker ${worker.name}`,
        controller,
      });
      const checked = checkWorkerResult(raw);
      if (!checked.success) {
        throw new Error(`malformed result: ${checked.issues.join('; ')}`);
      }
      const result = checked.data;
      const elapsedMs = performance.now() - startedAt;
      const count = result.hypotheses.length;
      emit('completed', `${count} ${count === 1 ? 'hypothesis' : 'hypotheses'} generated`);
      logDebug(`${TAG}: worker completed`, { worker: worker.name, hypotheses: count, elapsedMs });
      return { ...result, executionTimeMs: elapsedMs };
    } catch (error) {
      const elapsedMs = performance.now() - startedAt;
      const timedOut = error instanceof TimeoutError;
      const failure = new WorkerExecutionError(
        worker.name,
        timedOut ? 'timeout' : 'exception',
        elapsedMs,
        getErrorMessage(error),
      );
      emit('errored', timedOut ? `timed out after ${(elapsedMs / 1000).toFixed(1)}s` : getErrorMessage(error));
      logError(`${TAG}: ${failure.message}; skipping`, {
        worker: worker.name,
        kind: failure.kind,
        elapsedMs: Math.round(elapsedMs),
        timeoutMs: this.timeoutMs,
      });
      return null;
    }
  }
}
