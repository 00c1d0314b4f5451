/**
 * @fileoverview Tests for structured CLI error envelopes
 *
 * Validates that every failure maps to a stable code, exit status and
 * recovery hint, and serializes as a single JSON object.
 */

import { describe, expect, it } from 'vitest';
import { ConfigurationError, PipelineError, ProviderError, StorageError, ValidationError } from '../../core/errors.js';
import {
  CliError,
  ERROR_SUGGESTIONS,
  classifyError,
  createError,
  createErrorEnvelope,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
} from '../errors.js';

describe('createErrorEnvelope', () => {
  it('defaults to the code suggestion and no context', () => {
    expect(createErrorEnvelope('NOT_FOUND', 'Trace not found: t')).toEqual({
      code: 'NOT_FOUND',
      message: 'Trace not found: t',
      retryable: false,
      recoveryHints: [ERROR_SUGGESTIONS.NOT_FOUND],
      context: {},
    });
  });

  it('allows overriding hints, retryability and context', () => {
    const envelope = createErrorEnvelope('STORAGE_ERROR', 'locked', {
      retryable: true,
      recoveryHints: ['Wait'],
      context: { path: '/data' },
    });

    expect(envelope).toMatchObject({ retryable: true, recoveryHints: ['Wait'], context: { path: '/data' } });
  });
});

describe('classifyError', () => {
  it('keeps a CliError code, suggestion and details', () => {
    const envelope = classifyError(createError('NOT_FOUND', 'Document not found: doc-1', { documentId: 'doc-1' }));

    expect(envelope).toEqual({
      code: 'NOT_FOUND',
      message: 'Document not found: doc-1',
      retryable: false,
      recoveryHints: [ERROR_SUGGESTIONS.NOT_FOUND],
      context: { documentId: 'doc-1' },
    });
  });

  it('omits hints for a CliError without a suggestion', () => {
    expect(classifyError(new CliError('bad', 'INVALID_ARGUMENT')).recoveryHints).toEqual([]);
  });

  it.each([
    [new ValidationError('maxSources', 'an integer', '0'), 'VALIDATION_FAILED', 4],
    [new ConfigurationError('search.provider', 'missing key'), 'CONFIGURATION_ERROR', 5],
    [new StorageError('lock', true, 'busy'), 'STORAGE_ERROR', 10],
    [new ProviderError('openai', 'llm', 'rate_limit', true, 'slow down'), 'PROVIDER_UNAVAILABLE', 30],
    [new PipelineError('retrieve', 'trace-1', new Error('boom')), 'PIPELINE_FAILED', 40],
  ])('maps %s to its code and exit status', (error, code, exitCode) => {
    const envelope = classifyError(error);

    expect(envelope.code).toBe(code);
    expect(envelope.message).toBe(error.message);
    expect(getExitCode(envelope)).toBe(exitCode);
  });

  it('carries retryability and structured details from domain errors', () => {
    const envelope = classifyError(new StorageError('lock', true, 'busy'));

    expect(envelope.retryable).toBe(true);
    expect(envelope.context).toEqual({ errorCode: 'STORAGE_ERROR', operation: 'lock', cause: undefined });
  });

  it('includes the trace id of a failed run', () => {
    const envelope = classifyError(new PipelineError('retrieve', 'trace-1', new Error('boom')));

    expect(envelope.context).toMatchObject({ stage: 'retrieve', correlationId: 'trace-1', cause: 'boom' });
  });

  it('treats anything else as an internal error', () => {
    expect(classifyError('plain string')).toMatchObject({ code: 'INTERNAL_ERROR', message: 'plain string' });
    expect(getExitCode(classifyError(new Error('x')))).toBe(1);
  });
});

describe('formatting', () => {
  it('prints the message with suggestions', () => {
    const envelope = createErrorEnvelope('INVALID_ARGUMENT', 'Unknown command: fly', { recoveryHints: ['Try help', 'Check spelling'] });

    expect(formatErrorWithHints(envelope)).toBe(
      'Error [INVALID_ARGUMENT]: Unknown command: fly\n\nSuggestion: Try help\nSuggestion: Check spelling',
    );
  });

  it('prints only the message without hints', () => {
    const envelope = createErrorEnvelope('INTERNAL_ERROR', 'oops', { recoveryHints: [] });

    expect(formatErrorWithHints(envelope)).toBe('Error [INTERNAL_ERROR]: oops');
  });

  it('serializes as one JSON object under "error"', () => {
    const envelope = createErrorEnvelope('NOT_FOUND', 'missing', { recoveryHints: [] });

    expect(JSON.parse(formatErrorJson(envelope))).toEqual({ error: envelope });
  });
});
