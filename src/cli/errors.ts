/**
 * @fileoverview CLI error handling with helpful suggestions
 *
 * Every failure is turned into an ErrorEnvelope before it is printed, either
 * as a hint-annotated message or, with --json, as one JSON object on stderr.
 */

import {
  ConfigurationError,
  PipelineError,
  ProviderError,
  StorageError,
  ValidationError,
  isSourcewiseError,
} from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'VALIDATION_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'STORAGE_ERROR'
  | 'PROVIDER_UNAVAILABLE'
  | 'PIPELINE_FAILED'
  | 'INTERNAL_ERROR';

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
  INVALID_ARGUMENT: 'Run `sourcewise help <command>` for usage information.',
  NOT_FOUND: 'Check the id; ids are printed by `sourcewise ingest` and `sourcewise query`.',
  VALIDATION_FAILED: 'Check the values passed on the command line or in the config file.',
  CONFIGURATION_ERROR: 'Check sourcewise.config.yaml and the SOURCEWISE_*, OPENAI_*, BING_API_KEY and SERPAPI_KEY variables.',
  STORAGE_ERROR: 'Check that the data directory is writable and no other sourcewise process is using it.',
  PROVIDER_UNAVAILABLE: 'Check the provider API key and network access, then retry.',
  PIPELINE_FAILED: 'Inspect the partial trace with `sourcewise trace <trace-id>`.',
  INTERNAL_ERROR: 'Re-run with LOG_LEVEL=debug and report the output.',
};

export const EXIT_CODES: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  NOT_FOUND: 3,
  VALIDATION_FAILED: 4,
  CONFIGURATION_ERROR: 5,
  STORAGE_ERROR: 10,
  PROVIDER_UNAVAILABLE: 30,
  PIPELINE_FAILED: 40,
  INTERNAL_ERROR: 1,
};

export function createError(code: CliErrorCode, message: string, details?: Record<string, unknown>): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

// ============================================================================
// ENVELOPES
// ============================================================================

export interface ErrorEnvelope {
  code: CliErrorCode;
  message: string;
  retryable: boolean;
  recoveryHints: string[];
  context: Record<string, unknown>;
}

export function createErrorEnvelope(
  code: CliErrorCode,
  message: string,
  options: Partial<Pick<ErrorEnvelope, 'retryable' | 'recoveryHints' | 'context'>> = {},
): ErrorEnvelope {
  return {
    code,
    message,
    retryable: options.retryable ?? false,
    recoveryHints: options.recoveryHints ?? [ERROR_SUGGESTIONS[code]],
    context: options.context ?? {},
  };
}

function codeForSourcewiseError(error: unknown): CliErrorCode {
  if (error instanceof ValidationError) return 'VALIDATION_FAILED';
  if (error instanceof ConfigurationError) return 'CONFIGURATION_ERROR';
  if (error instanceof StorageError) return 'STORAGE_ERROR';
  if (error instanceof ProviderError) return 'PROVIDER_UNAVAILABLE';
  if (error instanceof PipelineError) return 'PIPELINE_FAILED';
  return 'INTERNAL_ERROR';
}

/** Map anything thrown by a command to an envelope. */
export function classifyError(error: unknown): ErrorEnvelope {
  if (error instanceof CliError) {
    return createErrorEnvelope(error.code, error.message, {
      recoveryHints: error.suggestion ? [error.suggestion] : [],
      context: { ...error.details },
    });
  }
  if (isSourcewiseError(error)) {
    const code = codeForSourcewiseError(error);
    const context: Record<string, unknown> = { errorCode: error.code, ...error.toJSON().details };
    return createErrorEnvelope(code, error.message, { retryable: error.retryable, context });
  }
  return createErrorEnvelope('INTERNAL_ERROR', getErrorMessage(error));
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return EXIT_CODES[envelope.code];
}

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  if (envelope.recoveryHints.length > 0) {
    lines.push('', ...envelope.recoveryHints.map((hint) => `Suggestion: ${hint}`));
  }
  return lines.join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope });
}
