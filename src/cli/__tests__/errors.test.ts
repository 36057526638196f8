/**
 * @fileoverview Tests for CLI error formatting and exit codes
 */

import { describe, it, expect } from 'vitest';
import {
  CliError,
  ERROR_SUGGESTIONS,
  createError,
  formatError,
  formatErrorWithSuggestion,
  getExitCode,
} from '../errors.js';
import { ConfigError, IncidentValidationError, DuplicateNameError } from '../../core/errors.js';

describe('createError', () => {
  it('attaches the suggestion for its code', () => {
    const error = createError('FILE_NOT_FOUND', 'missing.json', { path: 'missing.json' });

    expect(error).toBeInstanceOf(CliError);
    expect(error.code).toBe('FILE_NOT_FOUND');
    expect(error.suggestion).toBe(ERROR_SUGGESTIONS.FILE_NOT_FOUND);
    expect(error.details).toEqual({ path: 'missing.json' });
  });
});

describe('formatError', () => {
  it('formats a CliError with its code', () => {
    expect(formatError(createError('INVALID_ARGUMENT', 'Unknown command: deploy'))).toBe(
      'Error [INVALID_ARGUMENT]: Unknown command: deploy',
    );
  });

  it('formats pipeline errors with their code', () => {
    expect(formatError(new IncidentValidationError(['deploymentId: Required']))).toBe(
      'Error [INVALID_INCIDENT]: Incident payload failed validation: deploymentId: Required',
    );
    expect(formatError(new DuplicateNameError('log_agent'))).toBe(
      "Error [DUPLICATE_NAME]: Worker 'log_agent' is already registered. Each worker must have a unique name.",
    );
  });

  it('formats plain errors and other values', () => {
    expect(formatError(new Error('boom'))).toBe('Error: boom');
    expect(formatError('boom')).toBe('Error: boom');
  });
});

describe('formatErrorWithSuggestion', () => {
  it('appends the suggestion when one applies', () => {
    expect(formatErrorWithSuggestion(createError('INVALID_ARGUMENT', 'bad flag'))).toBe(
      `Error [INVALID_ARGUMENT]: bad flag\n\nSuggestion: ${ERROR_SUGGESTIONS.INVALID_ARGUMENT}`,
    );
    expect(formatErrorWithSuggestion(new ConfigError('grouping: Invalid enum value', [], 'env'))).toBe(
      `Error [CONFIG_ERROR]: Invalid configuration in env: grouping: Invalid enum value\n\nSuggestion: ${ERROR_SUGGESTIONS.CONFIG_ERROR}`,
    );
  });

  it('leaves other errors unchanged', () => {
    expect(formatErrorWithSuggestion(new Error('boom'))).toBe('Error: boom');
  });
});

describe('getExitCode', () => {
  it('maps known codes', () => {
    expect(getExitCode(createError('INVALID_ARGUMENT', 'x'))).toBe(2);
    expect(getExitCode(createError('FILE_NOT_FOUND', 'x'))).toBe(3);
    expect(getExitCode(new IncidentValidationError(['x']))).toBe(4);
    expect(getExitCode(new ConfigError('x'))).toBe(5);
  });

  it('returns 1 for anything else', () => {
    expect(getExitCode(new DuplicateNameError('a'))).toBe(1);
    expect(getExitCode(new Error('boom'))).toBe(1);
    expect(getExitCode(undefined)).toBe(1);
  });
});
