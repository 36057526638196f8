/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { isTriageError } from '../core/errors.js';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'FILE_NOT_FOUND'
  | 'INVALID_INCIDENT'
  | 'CONFIG_ERROR';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `triage help <command>` for usage information.',
  FILE_NOT_FOUND: 'Check the path; relative paths resolve from the current directory.',
  INVALID_INCIDENT: 'The incident file must be a JSON object with at least a non-empty "deploymentId".',
  CONFIG_ERROR: 'Check the config file and TRIAGE_* environment variables against `triage help analyze`.',
};

/** Process exit code per error code; anything unrecognised exits with 1. */
export const EXIT_CODES: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  FILE_NOT_FOUND: 3,
  INVALID_INCIDENT: 4,
  CONFIG_ERROR: 5,
};

// Pipeline error codes that have a CLI counterpart.
const PIPELINE_CODES: Record<string, CliErrorCode> = {
  INVALID_INCIDENT: 'INVALID_INCIDENT',
  CONFIG_ERROR: 'CONFIG_ERROR',
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

export function formatError(error: unknown): string {
  if (error instanceof CliError) {
    return `Error [${error.code}]: ${error.message}`;
  }
  if (isTriageError(error)) {
    return `Error [${error.code}]: ${error.message}`;
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}

/** `formatError` plus the suggestion line, when one applies. */
export function formatErrorWithSuggestion(error: unknown): string {
  const suggestion = suggestionFor(error);
  return suggestion ? `${formatError(error)}\n\nSuggestion: ${suggestion}` : formatError(error);
}

function cliCodeOf(error: unknown): CliErrorCode | undefined {
  if (error instanceof CliError) return error.code;
  if (isTriageError(error)) return PIPELINE_CODES[error.code];
  return undefined;
}

function suggestionFor(error: unknown): string | undefined {
  if (error instanceof CliError) return error.suggestion;
  const code = cliCodeOf(error);
  return code ? ERROR_SUGGESTIONS[code] : undefined;
}

export function getExitCode(error: unknown): number {
  const code = cliCodeOf(error);
  return code ? EXIT_CODES[code] : 1;
}
