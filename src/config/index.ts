/**
 * @fileoverview Pipeline configuration
 *
 * Values are layered: built-in defaults, then an optional YAML or JSON file,
 * then `TRIAGE_*` environment variables. The merged object is validated with
 * zod before anything uses it.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { DEFAULT_WORKER_TIMEOUT_MS } from '../agents/parallel_executor.js';
import { ConfigError } from '../core/errors.js';
import { DEFAULT_EVENT_QUEUE_CAPACITY } from '../events.js';
import { formatZodIssues } from '../schemas/incident.js';
import { getErrorMessage } from '../utils/errors.js';

export const DEFAULT_HUMAN_REVIEW_THRESHOLD = 0.5;

export const pipelineConfigSchema = z
  .object({
    workerTimeoutMs: z.number().int().positive(),
    humanReviewThreshold: z.number().min(0).max(1),
    grouping: z.enum(['representative', 'pairwise']),
    eventQueueCapacity: z.number().int().positive(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  })
  .strict();

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: Readonly<PipelineConfig> = Object.freeze({
  workerTimeoutMs: DEFAULT_WORKER_TIMEOUT_MS,
  humanReviewThreshold: DEFAULT_HUMAN_REVIEW_THRESHOLD,
  grouping: 'representative',
  eventQueueCapacity: DEFAULT_EVENT_QUEUE_CAPACITY,
  logLevel: 'info',
});

/** Environment variable for each overridable field. */
export const CONFIG_ENV_VARS = {
  workerTimeoutMs: 'TRIAGE_WORKER_TIMEOUT_MS',
  humanReviewThreshold: 'TRIAGE_REVIEW_THRESHOLD',
  grouping: 'TRIAGE_GROUPING',
  eventQueueCapacity: 'TRIAGE_EVENT_QUEUE_CAPACITY',
  logLevel: 'TRIAGE_LOG_LEVEL',
} as const satisfies Record<keyof PipelineConfig, string>;

const NUMERIC_FIELDS: ReadonlySet<string> = new Set(['workerTimeoutMs', 'humanReviewThreshold', 'eventQueueCapacity']);

export interface LoadPipelineConfigOptions {
  /** `.yaml`, `.yml` or `.json`; other extensions are parsed as YAML */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

function validate(candidate: Record<string, unknown>, source: string): PipelineConfig {
  const parsed = pipelineConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new ConfigError(issues.join('; '), issues, source);
  }
  return parsed.data;
}

export function createPipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return validate({ ...DEFAULT_PIPELINE_CONFIG, ...overrides }, 'overrides');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`cannot read file: ${getErrorMessage(error)}`, [], configPath);
  }

  let parsed: unknown;
  try {
    parsed = path.extname(configPath).toLowerCase() === '.json' ? JSON.parse(content) : YAML.parse(content);
  } catch (error) {
    throw new ConfigError(`cannot parse file: ${getErrorMessage(error)}`, [], configPath);
  }

  // An empty YAML document parses to null.
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError('file must contain a mapping', [], configPath);
  }
  return parsed;
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [field, variable] of Object.entries(CONFIG_ENV_VARS)) {
    const raw = env[variable]?.trim();
    if (!raw) continue;
    if (!NUMERIC_FIELDS.has(field)) {
      // Enum values are lower-case.
      overrides[field] = raw.toLowerCase();
      continue;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigError(`${variable} must be a number, got '${raw}'`, [`${field}: expected number`], 'env');
    }
    overrides[field] = value;
  }
  return overrides;
}

export async function loadPipelineConfig(options: LoadPipelineConfigOptions = {}): Promise<PipelineConfig> {
  const fromFile = options.configPath ? await readConfigFile(options.configPath) : {};
  const fromEnv = readEnvOverrides(options.env ?? process.env);
  const source = options.configPath ? `${options.configPath} + env` : 'env';
  return validate({ ...DEFAULT_PIPELINE_CONFIG, ...fromFile, ...fromEnv }, source);
}
