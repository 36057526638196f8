/**
 * @fileoverview Analyze Command
 *
 * Runs the triage pipeline with the demo workers against an incident file.
 *
 * Usage:
 *   triage analyze <incident.json> [--config <file>] [--timeout <ms>] [--json]
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { createDemoWorkers } from '../../agents/stub_workers.js';
import { createPipelineConfig, loadPipelineConfig, type PipelineConfig } from '../../config/index.js';
import { WorkerEventQueue } from '../../events.js';
import { TriagePipeline } from '../../orchestrator/pipeline.js';
import { setLogLevel } from '../../telemetry/logger.js';
import { formatContributors, type ExecutionResult } from '../../types.js';
import { getErrorMessage } from '../../utils/errors.js';
import { createError } from '../errors.js';
import { createWorkerProgress, formatDuration, printKeyValue, printTable } from '../progress.js';

// ============================================================================
// Types
// ============================================================================

export interface AnalyzeCommandOptions {
  args: string[];
}

export interface RunOptions {
  configPath?: string;
  timeoutMs?: number;
  json: boolean;
}

// ============================================================================
// Argument parsing
// ============================================================================

function parseFlags(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        config: { type: 'string', short: 'c' },
        timeout: { type: 'string', short: 't' },
        json: { type: 'boolean', default: false },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

export function parseRunOptions(args: string[]): { positionals: string[]; options: RunOptions } {
  const { values, positionals } = parseFlags(args);
  let timeoutMs: number | undefined;
  if (values.timeout !== undefined) {
    timeoutMs = Number(values.timeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw createError('INVALID_ARGUMENT', `--timeout must be a positive integer (ms), got '${values.timeout}'`);
    }
  }

  return {
    positionals,
    options: { configPath: values.config, timeoutMs, json: values.json ?? false },
  };
}

// ============================================================================
// Incident loading
// ============================================================================

export async function readIncidentFile(filePath: string): Promise<unknown> {
  const resolved = path.resolve(filePath);
  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf8');
  } catch (error) {
    throw createError('FILE_NOT_FOUND', `Cannot read incident file ${resolved}: ${getErrorMessage(error)}`, {
      path: resolved,
    });
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw createError('INVALID_INCIDENT', `Incident file ${resolved} is not valid JSON: ${getErrorMessage(error)}`, {
      path: resolved,
    });
  }
}

// ============================================================================
// Run + report
// ============================================================================

async function resolveConfig(options: RunOptions): Promise<PipelineConfig> {
  const loaded = await loadPipelineConfig({ configPath: options.configPath });
  return options.timeoutMs === undefined ? loaded : createPipelineConfig({ ...loaded, workerTimeoutMs: options.timeoutMs });
}

/** Shared by `analyze` and `demo`. */
export async function runTriage(incident: unknown, options: RunOptions): Promise<ExecutionResult> {
  const config = await resolveConfig(options);
  setLogLevel(config.logLevel);

  const pipeline = new TriagePipeline({ config });
  for (const worker of createDemoWorkers()) pipeline.register(worker);

  const events = new WorkerEventQueue(config.eventQueueCapacity);
  const rendering = options.json ? null : createWorkerProgress(pipeline.workerCount).follow(events);

  let result: ExecutionResult;
  try {
    result = await pipeline.execute(incident, events);
  } finally {
    events.close();
    await rendering;
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    printReport(result);
  }
  return result;
}

export function rankedRows(result: ExecutionResult): string[][] {
  return result.rankedHypotheses.map((hypothesis, index) => [
    String(index + 1),
    hypothesis.label,
    hypothesis.confidence.toFixed(2),
    hypothesis.severity,
    formatContributors(hypothesis),
    hypothesis.supportingSignals.join(', '),
  ]);
}

function printReport(result: ExecutionResult): void {
  console.log('');
  if (result.rankedHypotheses.length === 0) {
    console.log('No validated hypotheses.');
  } else {
    printTable(['#', 'Hypothesis', 'Confidence', 'Severity', 'Agents', 'Signals'], rankedRows(result));
  }

  console.log('');
  printKeyValue([
    { key: 'Execution', value: result.executionId },
    { key: 'Signals', value: result.signalsUsed.length },
    { key: 'Workers', value: `${result.stats.workersSucceeded}/${result.stats.workersRegistered} succeeded` },
    { key: 'Rejected', value: result.stats.verdictsRejected },
    { key: 'Duration', value: formatDuration(result.stats.durationMs) },
    { key: 'Human review', value: result.requiresHumanReview ? 'REQUIRED' : 'not required' },
  ]);

  if (result.synthesis) {
    console.log('');
    console.log(result.synthesis.summary);
    console.log(`Key finding: ${result.synthesis.keyFinding}`);
  }
}

export async function analyzeCommand(options: AnalyzeCommandOptions): Promise<void> {
  const { positionals, options: runOptions } = parseRunOptions(options.args);
  const [incidentPath, ...extra] = positionals;
  if (!incidentPath) {
    throw createError('INVALID_ARGUMENT', 'Missing incident file. Usage: triage analyze <incident.json>');
  }
  if (extra.length > 0) {
    throw createError('INVALID_ARGUMENT', `Unexpected arguments: ${extra.join(' ')}`);
  }

  const incident = await readIncidentFile(incidentPath);
  await runTriage(incident, runOptions);
}
