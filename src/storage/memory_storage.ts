/**
 * @fileoverview In-memory document and trace stores.
 *
 * Values are deep-copied on the way in and out so callers can never mutate
 * stored state through a returned reference.
 */

import { rankChunks } from '../query/ranking.js';
import type { Chunk, Document, FeatureVector, TraceEvent, TraceRecord } from '../types.js';
import type { DocumentStore, ScoredChunk, TraceStore, VectorSearchOptions } from './types.js';

export class InMemoryDocumentStore implements DocumentStore {
  // Map iteration order is insertion order; upsert deletes first so a
  // replaced document moves to the end.
  private readonly documents = new Map<string, Document>();

  async upsertDocument(document: Document): Promise<void> {
    this.documents.delete(document.id);
    this.documents.set(document.id, structuredClone(document));
  }

  async getDocument(documentId: string): Promise<Document | null> {
    const document = this.documents.get(documentId);
    return document ? structuredClone(document) : null;
  }

  async vectorSearch(queryVector: FeatureVector, limit: number, options: VectorSearchOptions = {}): Promise<ScoredChunk[]> {
    const scope = options.documentIds && options.documentIds.length > 0 ? new Set(options.documentIds) : null;
    const ranked = rankChunks(queryVector, this.candidates(scope), limit);
    return ranked.map((scored) => ({ ...scored, chunk: structuredClone(scored.chunk) }));
  }

  async countChunks(): Promise<number> {
    let count = 0;
    for (const document of this.documents.values()) {
      count += document.chunks.length;
    }
    return count;
  }

  async close(): Promise<void> {
    this.documents.clear();
  }

  private *candidates(scope: Set<string> | null): Generator<Chunk> {
    for (const document of this.documents.values()) {
      if (scope && !scope.has(document.id)) continue;
      yield* document.chunks;
    }
  }
}

export class InMemoryTraceStore implements TraceStore {
  private readonly traces = new Map<string, TraceRecord>();

  async saveTrace(traceId: string, query: string, events: readonly TraceEvent[]): Promise<void> {
    this.traces.set(traceId, structuredClone({ traceId, query, events: [...events] }));
  }

  async getTrace(traceId: string): Promise<TraceRecord | null> {
    const trace = this.traces.get(traceId);
    return trace ? structuredClone(trace) : null;
  }

  async close(): Promise<void> {
    this.traces.clear();
  }
}
