/**
 * @fileoverview Domain types for documents, retrieval evidence and pipeline runs.
 *
 * Field names are camelCase in code; the persisted trace payload keeps the
 * same shapes so a stored run round-trips without translation.
 */

// ============================================================================
// DOCUMENTS & CHUNKS
// ============================================================================

export type DocumentStatus = 'indexed' | 'failed';

/** Free-form metadata attached at ingest. Recognized keys are listed on `KnownDocumentMetadata`. */
export type DocumentMetadata = Record<string, unknown>;

export interface KnownDocumentMetadata {
  document_id?: string;
  url?: string;
  title?: string;
  published_at?: string;
}

/** Source attribution copied onto every chunk when it is created. */
export interface ChunkMetadata {
  url: string;
  title: string;
  publishedAt: string;
}

export interface SparseVector {
  kind: 'sparse';
  weights: Record<string, number>;
}

export interface DenseVector {
  kind: 'dense';
  values: number[];
}

export type FeatureVector = SparseVector | DenseVector;

export interface Chunk {
  id: string;
  documentId: string;
  /** Position of the chunk within its document, 0-based. */
  index: number;
  text: string;
  /** Half-open range into the source text, in string indices. */
  start: number;
  end: number;
  vector: FeatureVector;
  vectorNorm: number;
  metadata: ChunkMetadata;
}

export interface Document {
  id: string;
  filename: string;
  uploadedAt: string;
  sizeBytes: number;
  status: DocumentStatus;
  metadata: DocumentMetadata;
  chunks: Chunk[];
}

// ============================================================================
// PIPELINE DATA
// ============================================================================

export interface PlanStep {
  question: string;
  searchQuery: string;
}

/** A chunk as seen by one pipeline run, scored against that run's query. */
export interface EvidenceChunk {
  sourceId: string;
  chunkId: string;
  text: string;
  score: number;
  metadata: ChunkMetadata;
  chunkStart: number;
  chunkEnd: number;
}

export interface Citation {
  citationId: string;
  sourceId: string;
  title: string;
  url: string;
  publishedAt: string;
  snippet: string;
  chunkStart: number;
  chunkEnd: number;
}

export type ClaimVerdict = 'supported' | 'unsupported';

export interface ClaimVerification {
  claimId: string;
  claimText: string;
  verdict: ClaimVerdict;
  evidenceChunkIds: string[];
  confidence: number;
  notes: string;
}

// ============================================================================
// TRACES
// ============================================================================

export type AgentName = 'Planner' | 'Retriever' | 'Writer' | 'Critic' | 'Verifier' | 'Orchestrator';

export type TraceEventType =
  | 'plan'
  | 'retrieve'
  | 'write'
  | 'critique'
  | 'verify'
  | 'finalize'
  | 'search'
  | 'error';

export interface TraceEvent {
  eventId: string;
  agent: AgentName;
  eventType: TraceEventType;
  /** ISO-8601 UTC timestamp. */
  timestamp: string;
  payload: Record<string, unknown>;
}

export interface TraceRecord {
  traceId: string;
  query: string;
  events: TraceEvent[];
}

// ============================================================================
// RESULTS
// ============================================================================

/** The complete record of one pipeline run. */
export interface PipelineResult {
  traceId: string;
  answerId: string;
  query: string;
  plan: readonly PlanStep[];
  evidence: readonly EvidenceChunk[];
  answer: string;
  citations: readonly Citation[];
  critique: string | null;
  claimVerifications: readonly ClaimVerification[];
  confidenceScore: number;
  refusal: boolean;
  traceEvents: readonly TraceEvent[];
}

/** What an HTTP layer would return for a query. */
export interface QueryResponse {
  answerId: string;
  query: string;
  answer: string;
  citations: Citation[];
  claimVerifications: ClaimVerification[];
  confidenceScore: number;
  refusal: boolean;
  traceId: string;
}

export interface SearchResult {
  sourceId: string;
  title: string;
  url: string;
  publishedAt: string;
  snippet: string;
}

export interface HealthStatus {
  status: 'ok';
  version: string;
}
