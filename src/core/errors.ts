/**
 * @fileoverview Triage runtime error hierarchy
 *
 * Only configuration and input errors escape `TriagePipeline.execute()`.
 * Worker and extraction failures are wrapped in these types for logging and
 * then absorbed by the stage that caught them.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class TriageError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

/**
 * Raised when a worker is registered under a name that is already taken.
 * Always a programming mistake; never retried or swallowed.
 */
export class DuplicateNameError extends TriageError {
  readonly code = 'DUPLICATE_NAME';
  readonly retryable = false;

  constructor(readonly workerName: string) {
    super(`Worker '${workerName}' is already registered. Each worker must have a unique name.`);
    this.name = 'DuplicateNameError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { workerName: this.workerName },
    };
  }
}

export class ConfigError extends TriageError {
  readonly code = 'CONFIG_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly issues: string[] = [],
    readonly source?: string,
  ) {
    super(source ? `Invalid configuration in ${source}: ${message}` : `Invalid configuration: ${message}`);
    this.name = 'ConfigError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { issues: this.issues, source: this.source },
    };
  }
}

// ============================================================================
// INPUT ERRORS
// ============================================================================

export class IncidentValidationError extends TriageError {
  readonly code = 'INVALID_INCIDENT';
  readonly retryable = false;

  constructor(readonly issues: string[]) {
    super(`Incident payload failed validation: ${issues.join('; ')}`);
    this.name = 'IncidentValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { issues: this.issues },
    };
  }
}

// ============================================================================
// RECOVERED ERRORS
// ============================================================================

export type WorkerFailureKind = 'timeout' | 'exception';

export class WorkerExecutionError extends TriageError {
  readonly code = 'WORKER_FAILED';
  readonly retryable = false;

  constructor(
    readonly workerName: string,
    readonly kind: WorkerFailureKind,
    readonly elapsedMs: number,
    message: string,
  ) {
    super(`Worker '${workerName}' ${kind === 'timeout' ? 'timed out' : 'failed'} after ${Math.round(elapsedMs)}ms: ${message}`);
    this.name = 'WorkerExecutionError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        workerName: this.workerName,
        kind: this.kind,
        elapsedMs: this.elapsedMs,
      },
    };
  }
}

export type ExtractionPhase = 'analyze' | 'extract';

export class ExtractionError extends TriageError {
  readonly code = 'EXTRACTION_ERROR';
  readonly retryable = false;

  constructor(
    readonly extractor: string,
    readonly phase: ExtractionPhase,
    message: string,
  ) {
    super(`Extraction ${extractor} failed at ${phase}: ${message}`);
    this.name = 'ExtractionError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { extractor: this.extractor, phase: this.phase },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isTriageError(error: unknown): error is TriageError {
  return error instanceof TriageError;
}
