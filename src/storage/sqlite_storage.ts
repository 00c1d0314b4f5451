/**
 * @fileoverview SQLite document and trace stores.
 *
 * Vectors are stored as JSON next to their precomputed norm; similarity is a
 * brute-force scan in rowid order, so ties fall back to insertion order.
 */

import { z } from 'zod';
import { StorageError } from '../core/errors.js';
import { isSearchable, rankChunks } from '../query/ranking.js';
import type { Chunk, Document, FeatureVector, TraceEvent, TraceRecord } from '../types.js';
import { parseJsonAs } from '../utils/safe_json.js';
import { SqliteDatabase } from './sqlite_database.js';
import type { DocumentStore, ScoredChunk, TraceStore, VectorSearchOptions } from './types.js';

// ============================================================================
// ROW SHAPES
// ============================================================================

interface DocumentRow {
  id: string;
  filename: string;
  uploaded_at: string;
  size_bytes: number;
  status: string;
  metadata: string;
}

interface ChunkRow {
  id: string;
  document_id: string;
  chunk_index: number;
  text: string;
  start_offset: number;
  end_offset: number;
  vector: string;
  vector_norm: number;
  url: string;
  title: string;
  published_at: string;
}

interface TraceRow {
  trace_id: string;
  query: string;
}

interface TraceEventRow {
  event_id: string;
  agent: string;
  event_type: string;
  timestamp: string;
  payload: string;
}

const FeatureVectorSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('sparse'), weights: z.record(z.number()) }),
  z.object({ kind: z.literal('dense'), values: z.array(z.number()) }),
]);

const MetadataSchema = z.record(z.unknown());
const DocumentStatusSchema = z.enum(['indexed', 'failed']);
const AgentSchema = z.enum(['Planner', 'Retriever', 'Writer', 'Critic', 'Verifier', 'Orchestrator']);
const EventTypeSchema = z.enum(['plan', 'retrieve', 'write', 'critique', 'verify', 'finalize', 'search', 'error']);

function decodeJson<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): T {
  const parsed = parseJsonAs(text, schema);
  if (!parsed.ok) {
    throw new StorageError('read', false, `corrupt ${what}: ${parsed.error.message}`);
  }
  return parsed.value;
}

function decodeEnum<T extends string>(value: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new StorageError('read', false, `unknown ${what} "${value}"`);
  }
  return parsed.data;
}

function rowToChunk(row: ChunkRow): Chunk {
  return {
    id: row.id,
    documentId: row.document_id,
    index: row.chunk_index,
    text: row.text,
    start: row.start_offset,
    end: row.end_offset,
    vector: decodeJson(row.vector, FeatureVectorSchema, `vector for chunk ${row.id}`),
    vectorNorm: row.vector_norm,
    metadata: { url: row.url, title: row.title, publishedAt: row.published_at },
  };
}

// ============================================================================
// DOCUMENT STORE
// ============================================================================

const CHUNK_COLUMNS =
  'id, document_id, chunk_index, text, start_offset, end_offset, vector, vector_norm, url, title, published_at';

export class SqliteDocumentStore implements DocumentStore {
  constructor(private readonly database: SqliteDatabase) {}

  async upsertDocument(document: Document): Promise<void> {
    this.database.use('write', (db) => {
      const deleteDocument = db.prepare('DELETE FROM documents WHERE id = ?');
      const insertDocument = db.prepare(
        'INSERT INTO documents (id, filename, uploaded_at, size_bytes, status, metadata) VALUES (?, ?, ?, ?, ?, ?)',
      );
      const insertChunk = db.prepare(`INSERT INTO chunks (${CHUNK_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`);
      const write = db.transaction((doc: Document) => {
        // Chunks go with the document through ON DELETE CASCADE.
        deleteDocument.run(doc.id);
        insertDocument.run(doc.id, doc.filename, doc.uploadedAt, doc.sizeBytes, doc.status, JSON.stringify(doc.metadata));
        for (const chunk of doc.chunks) {
          insertChunk.run(
            chunk.id,
            doc.id,
            chunk.index,
            chunk.text,
            chunk.start,
            chunk.end,
            JSON.stringify(chunk.vector),
            chunk.vectorNorm,
            chunk.metadata.url,
            chunk.metadata.title,
            chunk.metadata.publishedAt,
          );
        }
      });
      write(document);
    });
  }

  async getDocument(documentId: string): Promise<Document | null> {
    return this.database.use('read', (db) => {
      const row = db
        .prepare<[string], DocumentRow>('SELECT id, filename, uploaded_at, size_bytes, status, metadata FROM documents WHERE id = ?')
        .get(documentId);
      if (!row) return null;
      const chunks = db
        .prepare<[string], ChunkRow>(`SELECT ${CHUNK_COLUMNS} FROM chunks WHERE document_id = ? ORDER BY chunk_index`)
        .all(documentId)
        .map(rowToChunk);
      return {
        id: row.id,
        filename: row.filename,
        uploadedAt: row.uploaded_at,
        sizeBytes: row.size_bytes,
        status: decodeEnum(row.status, DocumentStatusSchema, 'document status'),
        metadata: decodeJson(row.metadata, MetadataSchema, `metadata for document ${row.id}`),
        chunks,
      };
    });
  }

  async vectorSearch(queryVector: FeatureVector, limit: number, options: VectorSearchOptions = {}): Promise<ScoredChunk[]> {
    if (!isSearchable(queryVector, limit)) return [];
    return this.database.use('query', (db) => {
      const scope = options.documentIds && options.documentIds.length > 0 ? new Set(options.documentIds) : null;
      // An open cursor keeps the connection busy, so it must be released even if ranking throws.
      const rows = db.prepare<[], ChunkRow>(`SELECT ${CHUNK_COLUMNS} FROM chunks ORDER BY rowid`).iterate();
      function* candidates(): Generator<Chunk> {
        for (const row of rows) {
          if (scope && !scope.has(row.document_id)) continue;
          yield rowToChunk(row);
        }
      }
      try {
        return rankChunks(queryVector, candidates(), limit);
      } finally {
        rows.return?.();
      }
    });
  }

  async countChunks(): Promise<number> {
    return this.database.use('read', (db) => {
      const row = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM chunks').get();
      return row?.count ?? 0;
    });
  }

  async close(): Promise<void> {
    await this.database.close();
  }
}

// ============================================================================
// TRACE STORE
// ============================================================================

export class SqliteTraceStore implements TraceStore {
  constructor(private readonly database: SqliteDatabase) {}

  async saveTrace(traceId: string, query: string, events: readonly TraceEvent[]): Promise<void> {
    this.database.use('write', (db) => {
      const upsertTrace = db.prepare(
        'INSERT INTO traces (trace_id, query, saved_at) VALUES (?, ?, ?) ON CONFLICT(trace_id) DO UPDATE SET query = excluded.query, saved_at = excluded.saved_at',
      );
      const clearEvents = db.prepare('DELETE FROM trace_events WHERE trace_id = ?');
      const insertEvent = db.prepare(
        'INSERT INTO trace_events (trace_id, seq, event_id, agent, event_type, timestamp, payload) VALUES (?, ?, ?, ?, ?, ?, ?)',
      );
      const write = db.transaction(() => {
        upsertTrace.run(traceId, query, new Date().toISOString());
        clearEvents.run(traceId);
        events.forEach((event, seq) => {
          insertEvent.run(traceId, seq, event.eventId, event.agent, event.eventType, event.timestamp, JSON.stringify(event.payload));
        });
      });
      write();
    });
  }

  async getTrace(traceId: string): Promise<TraceRecord | null> {
    return this.database.use('read', (db) => {
      const trace = db.prepare<[string], TraceRow>('SELECT trace_id, query FROM traces WHERE trace_id = ?').get(traceId);
      if (!trace) return null;
      const events = db
        .prepare<[string], TraceEventRow>(
          'SELECT event_id, agent, event_type, timestamp, payload FROM trace_events WHERE trace_id = ? ORDER BY seq',
        )
        .all(traceId)
        .map(
          (row): TraceEvent => ({
            eventId: row.event_id,
            agent: decodeEnum(row.agent, AgentSchema, 'agent'),
            eventType: decodeEnum(row.event_type, EventTypeSchema, 'event type'),
            timestamp: row.timestamp,
            payload: decodeJson(row.payload, MetadataSchema, `payload for event ${row.event_id}`),
          }),
        );
      return { traceId: trace.trace_id, query: trace.query, events };
    });
  }

  async close(): Promise<void> {
    await this.database.close();
  }
}

// ============================================================================
// FACTORY
// ============================================================================

export interface SqliteStores {
  database: SqliteDatabase;
  documents: SqliteDocumentStore;
  traces: SqliteTraceStore;
}

export async function openSqliteStores(dbPath: string): Promise<SqliteStores> {
  const database = await SqliteDatabase.open(dbPath);
  return {
    database,
    documents: new SqliteDocumentStore(database),
    traces: new SqliteTraceStore(database),
  };
}
