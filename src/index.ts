/**
 * @fileoverview sourcewise - cited, verified answers over your own documents
 *
 * Documents are chunked and vectorized into a local store. A query runs a
 * fixed multi-agent pipeline (plan, retrieve, write, critique, verify) and
 * every stage is recorded in a replayable trace.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createResearchService, loadConfig } from 'sourcewise';
 *
 * const service = await createResearchService(loadConfig());
 * await service.ingestDocument('Tides rise twice a day.', 'tides.txt');
 * const result = await service.query('How often do tides rise?');
 * console.log(result.answer, result.citations);
 * await service.close();
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// SERVICE
// ============================================================================

export {
  createResearchService,
  createVectorizer,
  createPlanner,
  DEFAULT_MAX_SEARCH_RESULTS,
  MAX_SEARCH_RESULTS_LIMIT,
  SEARCH_NOT_CONFIGURED,
} from './api/service.js';
export type { ResearchService, ResearchServiceOverrides, SearchWebOptions, WebSearchResponse } from './api/service.js';

export { loadConfig, createConfig, DEFAULT_CONFIG, SourcewiseConfigSchema } from './config/index.js';
export type { SourcewiseConfig, ConfigOverrides, LoadConfigOptions } from './config/index.js';

export { VERSION } from './version.js';

// ============================================================================
// DATA MODEL
// ============================================================================

export type * from './types.js';

// ============================================================================
// BUILDING BLOCKS
// ============================================================================

export { chunkText, DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from './ingest/chunker.js';
export type { TextChunk } from './ingest/chunker.js';
export { SparseTokenVectorizer, DenseEmbeddingVectorizer, tokenize, cosineSimilarity, similarity } from './ingest/vectorizer.js';
export type { Vectorizer } from './ingest/vectorizer.js';
export { DocumentIndexer } from './ingest/indexer.js';

export { InMemoryDocumentStore, InMemoryTraceStore } from './storage/memory_storage.js';
export { SqliteDatabase, resolveDatabasePath } from './storage/sqlite_database.js';
export { SqliteDocumentStore, SqliteTraceStore, openSqliteStores } from './storage/sqlite_storage.js';
export type { DocumentStore, TraceStore, ScoredChunk, VectorSearchOptions } from './storage/types.js';
export { rankChunks } from './query/ranking.js';

export * from './agents/index.js';
export { ResearchPipeline, DEFAULT_MAX_SOURCES, MAX_SOURCES_LIMIT } from './pipeline/graph.js';
export type { RunOptions, ResearchPipelineDeps } from './pipeline/graph.js';
export { replayResult, toQueryResponse, formatServerSentEvent } from './pipeline/replay.js';
export type { ReplayEvent } from './pipeline/replay.js';

export * from './providers/index.js';

export { runEvaluation, formatEvaluationReport } from './evaluation/runner.js';
export type { EvaluationReport, EvaluationResult } from './evaluation/runner.js';
export { loadEvaluationDataset, parseEvaluationDataset, DEFAULT_DATASET_PATH } from './evaluation/dataset.js';
export type { EvaluationExample } from './evaluation/dataset.js';

// ============================================================================
// ERRORS & LOGGING
// ============================================================================

export * from './core/index.js';
export { configureLogger, logInfo, logWarning, logError, logDebug } from './telemetry/logger.js';
export type { LogLevel } from './telemetry/logger.js';
