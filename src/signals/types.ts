import type { IncidentInput, Signal } from '../types.js';

/** A signal before the extractor has assigned its sequential id. */
export type SignalDraft = Omit<Signal, 'id'>;

/**
 * Extraction collaborator: turns a raw incident into signals with unique,
 * sequential ids. Must isolate failures of its own sub-analyzers.
 */
export interface SignalExtractor {
  extract(incident: IncidentInput): Signal[] | Promise<Signal[]>;
}
