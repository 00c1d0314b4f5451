/**
 * @fileoverview Storage interfaces for sourcewise
 *
 * Two stores sit behind these contracts:
 * - SQLite (default, durable, one database file for both)
 * - In-memory (tests, ephemeral runs)
 *
 * Lookups of unknown ids resolve to null. Backend failures reject with
 * StorageError.
 */

import type { Chunk, Document, FeatureVector, TraceEvent, TraceRecord } from '../types.js';

// ============================================================================
// DOCUMENT STORE
// ============================================================================

export interface VectorSearchOptions {
  /** Restrict the scan to chunks of these documents. Empty or absent means all. */
  documentIds?: readonly string[];
}

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
  /** Zero-based index of the chunk in the store's scan order. */
  position: number;
}

export interface DocumentStore {
  /**
   * Insert or replace a document and all of its chunks atomically. A replaced
   * document's chunks rank after older chunks on ties, like a fresh insert.
   */
  upsertDocument(document: Document): Promise<void>;
  getDocument(documentId: string): Promise<Document | null>;
  /**
   * Full scan ranked by cosine similarity. Only scores above zero are
   * returned, highest first, ties in insertion order, at most `limit`.
   */
  vectorSearch(queryVector: FeatureVector, limit: number, options?: VectorSearchOptions): Promise<ScoredChunk[]>;
  countChunks(): Promise<number>;
  close(): Promise<void>;
}

// ============================================================================
// TRACE STORE
// ============================================================================

export interface TraceStore {
  /** Upsert: saving an existing trace id replaces its query and events. */
  saveTrace(traceId: string, query: string, events: readonly TraceEvent[]): Promise<void>;
  getTrace(traceId: string): Promise<TraceRecord | null>;
  close(): Promise<void>;
}
