/**
 * @fileoverview Boundary schemas
 *
 * Incident payloads and extractor output arrive from outside the runtime and
 * are checked here before any stage sees them.
 */

import { z, type ZodError } from 'zod';
import type { ConfigValue, IncidentInput, Signal, WorkerResult } from '../types.js';

const configValueSchema: z.ZodType<ConfigValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(configValueSchema),
    z.record(configValueSchema),
  ])
);

const severitySchema = z.enum(['low', 'medium', 'high']);

export const commitRecordSchema = z.object({
  sha: z.string().min(1),
  message: z.string(),
  diffSummary: z.string().default(''),
});

export const incidentInputSchema = z.object({
  deploymentId: z.string().trim().min(1),
  logs: z.array(z.string()).default([]),
  metrics: z.record(z.number().finite()).default({}),
  recentCommits: z.array(commitRecordSchema).default([]),
  configSnapshot: z.record(configValueSchema).default({}),
  baselineConfig: z.record(configValueSchema).optional(),
});

export const signalSchema = z.object({
  id: z.string().trim().min(1),
  type: z.string().min(1),
  description: z.string(),
  value: z.number().finite().optional(),
  severity: severitySchema,
  source: z.string().min(1),
});

/**
 * Structural shape of a worker result. Content rules (citations, confidence
 * range, non-empty support) belong to the validator, so NaN and
 * out-of-range confidences pass here.
 */
export const hypothesisSchema = z.object({
  label: z.string(),
  description: z.string(),
  confidence: z.union([z.number(), z.nan()]),
  severity: severitySchema,
  supportingSignals: z.array(z.string()),
  contributingAgent: z.string(),
});

export const workerResultSchema = z.object({
  agentName: z.string(),
  hypotheses: z.array(hypothesisSchema),
  executionTimeMs: z.number().default(0),
});

export type SchemaCheck<T> =
  | { success: true; data: T }
  | { success: false; issues: string[] };

export function formatZodIssues(error: ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function checkIncidentInput(value: unknown): SchemaCheck<IncidentInput> {
  const parsed = incidentInputSchema.safeParse(value);
  if (parsed.success) return { success: true, data: parsed.data };
  return { success: false, issues: formatZodIssues(parsed.error) };
}

export function checkSignal(value: unknown): SchemaCheck<Signal> {
  const parsed = signalSchema.safeParse(value);
  if (parsed.success) return { success: true, data: parsed.data };
  return { success: false, issues: formatZodIssues(parsed.error) };
}

export function checkWorkerResult(value: unknown): SchemaCheck<WorkerResult> {
  const parsed = workerResultSchema.safeParse(value);
  if (parsed.success) return { success: true, data: parsed.data };
  return { success: false, issues: formatZodIssues(parsed.error) };
}
