/**
 * @fileoverview sourcewise error hierarchy
 *
 * Typed, structured errors shared by the stores, providers and pipeline.
 * Not-found is never an error here: lookups return null.
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

export abstract class SourcewiseError extends Error {
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
// STORAGE ERRORS
// ============================================================================

export type StorageOperation = 'open' | 'read' | 'write' | 'lock' | 'migrate' | 'query';

export class StorageError extends SourcewiseError {
  readonly code = 'STORAGE_ERROR';

  constructor(
    readonly operation: StorageOperation,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Storage ${operation} failed: ${message}`);
    this.name = 'StorageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// PROVIDER ERRORS
// ============================================================================

export type ProviderKind = 'llm' | 'embedding' | 'search' | 'fetch';
export type ProviderErrorReason =
  | 'timeout'
  | 'rate_limit'
  | 'auth_failed'
  | 'network_error'
  | 'invalid_response'
  | 'unavailable';

export class ProviderError extends SourcewiseError {
  readonly code = 'PROVIDER_ERROR';

  constructor(
    readonly provider: string,
    readonly kind: ProviderKind,
    readonly reason: ProviderErrorReason,
    readonly retryable: boolean,
    message: string,
  ) {
    super(`Provider ${provider} ${reason}: ${message}`);
    this.name = 'ProviderError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        provider: this.provider,
        kind: this.kind,
        reason: this.reason,
      },
    };
  }
}

// ============================================================================
// EMBEDDING ERRORS
// ============================================================================

export class EmbeddingError extends SourcewiseError {
  readonly code = 'EMBEDDING_ERROR';

  constructor(
    readonly model: string,
    readonly retryable: boolean,
    message: string,
    readonly inputCount?: number,
  ) {
    super(`Embedding with ${model} failed: ${message}`);
    this.name = 'EmbeddingError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        model: this.model,
        inputCount: this.inputCount,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends SourcewiseError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends SourcewiseError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// PIPELINE ERRORS
// ============================================================================

export type PipelineStage = 'plan' | 'retrieve' | 'write' | 'critique' | 'verify' | 'finalize' | 'persist';

/**
 * A run that could not complete. Only raised for conditions the stage
 * fallbacks cannot absorb, such as an unreachable store.
 */
export class PipelineError extends SourcewiseError {
  readonly code = 'PIPELINE_ERROR';
  readonly retryable: boolean;

  constructor(
    readonly stage: PipelineStage,
    readonly correlationId: string,
    readonly cause: Error,
  ) {
    super(`Pipeline run ${correlationId} failed at ${stage}: ${cause.message}`);
    this.name = 'PipelineError';
    this.retryable = cause instanceof SourcewiseError ? cause.retryable : false;
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        stage: this.stage,
        correlationId: this.correlationId,
        cause: this.cause.message,
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isSourcewiseError(error: unknown): error is SourcewiseError {
  return error instanceof SourcewiseError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

/**
 * Conditions that mean a capability the run depends on is gone, as opposed to
 * a single call degrading.
 */
export function isFatalToRun(error: unknown): boolean {
  return error instanceof StorageError || error instanceof ConfigurationError;
}
