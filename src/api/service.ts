/**
 * @fileoverview Research service: the one object an HTTP layer or the CLI talks to.
 *
 * Everything is constructed here, explicitly, from a validated config. There
 * is no module-level singleton; two services with two data directories can
 * live in one process.
 */

import { createClaimJudge } from '../agents/claim_judge.js';
import { Critic } from '../agents/critic.js';
import { GenerativePlanner, HeuristicPlanner, type Planner } from '../agents/planner.js';
import { Retriever } from '../agents/retriever.js';
import { Verifier } from '../agents/verifier.js';
import { Writer } from '../agents/writer.js';
import type { PipelineConfig, SourcewiseConfig } from '../config/index.js';
import { ConfigurationError, ValidationError } from '../core/errors.js';
import { DocumentIndexer } from '../ingest/indexer.js';
import { DenseEmbeddingVectorizer, SparseTokenVectorizer, type Vectorizer } from '../ingest/vectorizer.js';
import { ResearchPipeline, type RunOptions } from '../pipeline/graph.js';
import { toQueryResponse } from '../pipeline/replay.js';
import { newTraceId, TraceRecorder } from '../pipeline/trace_recorder.js';
import { createEmbeddingProvider } from '../providers/embeddings.js';
import { createPageExtractor } from '../providers/extraction.js';
import { createTextGenerator } from '../providers/llm.js';
import type { PageExtractor, TextGenerator, WebSearchProvider } from '../providers/types.js';
import { resolveSearchProvider } from '../providers/web_search.js';
import { resolveDatabasePath, type SqliteDatabase } from '../storage/sqlite_database.js';
import { openSqliteStores } from '../storage/sqlite_storage.js';
import type { DocumentStore, TraceStore } from '../storage/types.js';
import { logInfo } from '../telemetry/logger.js';
import type {
  Document,
  DocumentMetadata,
  HealthStatus,
  PipelineResult,
  QueryResponse,
  SearchResult,
  TraceEvent,
  TraceRecord,
} from '../types.js';
import { VERSION } from '../version.js';

export const DEFAULT_MAX_SEARCH_RESULTS = 10;
export const MAX_SEARCH_RESULTS_LIMIT = 50;

export const SEARCH_NOT_CONFIGURED = 'Search provider API key not configured';

export interface ResearchServiceOverrides {
  documentStore?: DocumentStore;
  traceStore?: TraceStore;
  /** Path for the SQLite database when a store is not supplied; `:memory:` for a throwaway one. */
  databasePath?: string;
  vectorizer?: Vectorizer;
  generator?: TextGenerator;
  /** null disables web search even when keys are configured. */
  searchProvider?: WebSearchProvider | null;
  extractor?: PageExtractor;
  now?: () => Date;
}

export interface SearchWebOptions {
  maxResults?: number;
}

export interface WebSearchResponse {
  traceId: string;
  results: SearchResult[];
}

export interface ResearchService {
  readonly config: SourcewiseConfig;
  runPipeline(query: string, options?: RunOptions): Promise<PipelineResult>;
  query(query: string, options?: RunOptions): Promise<QueryResponse>;
  ingestDocument(text: string, filename: string, metadata?: DocumentMetadata): Promise<Document>;
  getDocument(documentId: string): Promise<Document | null>;
  saveTrace(traceId: string, query: string, events: readonly TraceEvent[]): Promise<void>;
  getTrace(traceId: string): Promise<TraceRecord | null>;
  searchWeb(query: string, options?: SearchWebOptions): Promise<WebSearchResponse>;
  health(): HealthStatus;
  /** Number of indexed chunks across all documents. */
  countChunks(): Promise<number>;
  close(): Promise<void>;
}

export function createVectorizer(config: SourcewiseConfig): Vectorizer {
  const provider = createEmbeddingProvider(config.embedding);
  return provider ? new DenseEmbeddingVectorizer(provider) : new SparseTokenVectorizer();
}

export function createPlanner(pipeline: PipelineConfig, generator: TextGenerator): Planner {
  const generative =
    pipeline.planner === 'generative' || (pipeline.planner === 'auto' && generator.id !== 'stub');
  return generative ? new GenerativePlanner(generator, { maxPlanSteps: pipeline.maxPlanSteps }) : new HeuristicPlanner();
}

function resolveWebSearch(config: SourcewiseConfig, override: WebSearchProvider | null | undefined): WebSearchProvider | null {
  if (override !== undefined) return override;
  if (config.search.provider === 'none') return null;
  return resolveSearchProvider(config.search);
}

interface ResolvedStores {
  documentStore: DocumentStore;
  traceStore: TraceStore;
  database: SqliteDatabase | null;
}

/** Supplied stores win; whichever is missing comes from the SQLite database. */
async function resolveStores(config: SourcewiseConfig, overrides: ResearchServiceOverrides): Promise<ResolvedStores> {
  if (overrides.documentStore && overrides.traceStore) {
    return { documentStore: overrides.documentStore, traceStore: overrides.traceStore, database: null };
  }
  const sqlite = await openSqliteStores(overrides.databasePath ?? resolveDatabasePath(config.dataDir));
  return {
    documentStore: overrides.documentStore ?? sqlite.documents,
    traceStore: overrides.traceStore ?? sqlite.traces,
    database: sqlite.database,
  };
}

export async function createResearchService(
  config: SourcewiseConfig,
  overrides: ResearchServiceOverrides = {},
): Promise<ResearchService> {
  const { documentStore, traceStore, database } = await resolveStores(config, overrides);

  const generator = overrides.generator ?? createTextGenerator(config.llm);
  const vectorizer = overrides.vectorizer ?? createVectorizer(config);
  const searchProvider = resolveWebSearch(config, overrides.searchProvider);
  const extractor = overrides.extractor ?? createPageExtractor({ timeoutMs: config.extraction.timeoutMs });

  const indexer = new DocumentIndexer({ store: documentStore, vectorizer, chunking: config.chunking, now: overrides.now });
  const retriever = new Retriever(documentStore, vectorizer);
  const pipeline = new ResearchPipeline({
    planner: createPlanner(config.pipeline, generator),
    retriever,
    writer: new Writer(generator, { snippetLength: config.pipeline.snippetLength }),
    critic: config.pipeline.enableCritic ? new Critic(generator) : null,
    verifier: config.pipeline.enableVerifier
      ? new Verifier(createClaimJudge(config.pipeline.judge, generator), { maxClaims: config.pipeline.maxClaims })
      : null,
    traceStore,
    confidence: config.confidence,
    defaultMaxSources: config.retrieval.defaultMaxSources,
    maxSourcesLimit: config.retrieval.maxSourcesLimit,
    now: overrides.now,
  });

  logInfo('Research service ready', {
    generator: generator.id,
    vectorizer: vectorizer.id,
    search: searchProvider?.id ?? 'none',
  });

  async function searchWeb(query: string, options: SearchWebOptions = {}): Promise<WebSearchResponse> {
    if (query.trim().length === 0) {
      throw new ValidationError('query', 'a non-empty string', JSON.stringify(query));
    }
    const maxResults = options.maxResults ?? DEFAULT_MAX_SEARCH_RESULTS;
    if (!Number.isInteger(maxResults) || maxResults < 1 || maxResults > MAX_SEARCH_RESULTS_LIMIT) {
      throw new ValidationError('maxResults', `an integer between 1 and ${MAX_SEARCH_RESULTS_LIMIT}`, String(maxResults));
    }
    if (!searchProvider) {
      throw new ConfigurationError('search.provider', SEARCH_NOT_CONFIGURED);
    }

    const recorder = new TraceRecorder(newTraceId(), overrides.now);
    const hits = await searchProvider.search(query, maxResults);
    recorder.record('Retriever', 'search', { query, provider: searchProvider.id, result_count: hits.length });

    for (const [index, hit] of hits.entries()) {
      const extracted = await extractor(hit.url, { title: hit.title, publishedAt: hit.publishedAt });
      if (!extracted) continue;
      const document = await indexer.addWebDocument({
        url: extracted.url,
        title: extracted.title,
        text: extracted.text,
        publishedAt: extracted.publishedAt,
        metadata: { source_rank: index, query },
      });
      recorder.record('Retriever', 'retrieve', { url: extracted.url, document_id: document.id, status: document.status });
    }
    await traceStore.saveTrace(recorder.traceId, query, recorder.events());

    const evidence = await retriever.search(query, maxResults);
    return {
      traceId: recorder.traceId,
      results: evidence.map((chunk) => ({
        sourceId: chunk.sourceId,
        title: chunk.metadata.title,
        url: chunk.metadata.url,
        publishedAt: chunk.metadata.publishedAt,
        snippet: chunk.text.slice(0, config.pipeline.snippetLength),
      })),
    };
  }

  async function close(): Promise<void> {
    await documentStore.close();
    await traceStore.close();
    await database?.close();
  }

  return {
    config,
    runPipeline: (query, options) => pipeline.runPipeline(query, options),
    query: async (query, options) => toQueryResponse(await pipeline.runPipeline(query, options)),
    ingestDocument: (text, filename, metadata) => indexer.addDocument(text, filename, metadata),
    getDocument: (documentId) => indexer.getDocument(documentId),
    saveTrace: (traceId, query, events) => traceStore.saveTrace(traceId, query, events),
    getTrace: (traceId) => traceStore.getTrace(traceId),
    searchWeb,
    health: () => ({ status: 'ok', version: VERSION }),
    countChunks: () => documentStore.countChunks(),
    close,
  };
}
