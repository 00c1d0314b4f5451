/**
 * @fileoverview Document indexing: chunk, vectorize, persist.
 *
 * Every chunk carries a copy of its document's source attribution (url,
 * title, published date) so retrieval never has to join back to the
 * document to build a citation.
 */

import { createHash, randomUUID } from 'node:crypto';
import type { ChunkingConfig } from '../config/index.js';
import { isFatalToRun } from '../core/errors.js';
import type { DocumentStore } from '../storage/types.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { Chunk, ChunkMetadata, Document, DocumentMetadata, FeatureVector } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import { chunkText, DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from './chunker.js';
import { vectorNorm, type Vectorizer } from './vectorizer.js';

export interface DocumentIndexerOptions {
  store: DocumentStore;
  vectorizer: Vectorizer;
  chunking?: ChunkingConfig;
  /** Injectable clock for deterministic timestamps. */
  now?: () => Date;
}

export interface WebDocumentInput {
  url: string;
  title: string;
  text: string;
  publishedAt?: string | null;
  metadata?: DocumentMetadata;
}

export function newDocumentId(): string {
  return `doc-${randomUUID().replace(/-/g, '').slice(0, 8)}`;
}

/** Stable per URL, so fetching the same page again replaces it. */
export function webDocumentId(url: string): string {
  return `web-${createHash('sha256').update(url).digest('hex').slice(0, 12)}`;
}

export function chunkId(documentId: string, index: number): string {
  return `${documentId}-chunk-${index}`;
}

function metadataString(metadata: DocumentMetadata, key: string): string | undefined {
  const value = metadata[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export class DocumentIndexer {
  private readonly store: DocumentStore;
  private readonly vectorizer: Vectorizer;
  private readonly chunkSize: number;
  private readonly overlap: number;
  private readonly now: () => Date;

  constructor(options: DocumentIndexerOptions) {
    this.store = options.store;
    this.vectorizer = options.vectorizer;
    this.chunkSize = options.chunking?.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.overlap = options.chunking?.overlap ?? DEFAULT_CHUNK_OVERLAP;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Index `text` as one document. `metadata.document_id` pins the id, and
   * re-adding an existing id replaces the document and all of its chunks.
   *
   * If vectorization fails the document is still stored, with status
   * `failed` and no chunks, so the failure is visible through getDocument.
   */
  async addDocument(text: string, filename: string, metadata: DocumentMetadata = {}): Promise<Document> {
    const documentId = metadataString(metadata, 'document_id') ?? newDocumentId();
    const uploadedAt = this.now().toISOString();
    const sourceMetadata: ChunkMetadata = {
      url: metadataString(metadata, 'url') ?? `local://${documentId}`,
      title: metadataString(metadata, 'title') ?? filename,
      publishedAt: metadataString(metadata, 'published_at') ?? uploadedAt,
    };

    const windows = chunkText(text, this.chunkSize, this.overlap);
    let vectors: FeatureVector[] | null = null;
    try {
      vectors = await this.vectorizer.vectorizeBatch(windows.map((window) => window.text));
    } catch (error) {
      if (isFatalToRun(error)) throw error;
      logWarning('Vectorization failed; storing document as failed', {
        documentId,
        vectorizer: this.vectorizer.id,
        error: getErrorMessage(error),
      });
    }

    const chunks: Chunk[] = [];
    if (vectors) {
      windows.forEach((window, index) => {
        const vector = vectors?.[index];
        if (!vector) return;
        chunks.push({
          id: chunkId(documentId, index),
          documentId,
          index,
          text: window.text,
          start: window.start,
          end: window.end,
          vector,
          vectorNorm: vectorNorm(vector),
          metadata: { ...sourceMetadata },
        });
      });
    }

    const document: Document = {
      id: documentId,
      filename,
      uploadedAt,
      sizeBytes: Buffer.byteLength(text, 'utf8'),
      status: vectors ? 'indexed' : 'failed',
      metadata: { ...metadata },
      chunks,
    };
    await this.store.upsertDocument(document);
    logDebug('Indexed document', { documentId, filename, chunks: chunks.length, status: document.status });
    return document;
  }

  /** Index an extracted web page under an id derived from its URL. */
  async addWebDocument(input: WebDocumentInput): Promise<Document> {
    const metadata: DocumentMetadata = {
      ...input.metadata,
      document_id: webDocumentId(input.url),
      url: input.url,
      title: input.title,
    };
    if (input.publishedAt) {
      metadata.published_at = input.publishedAt;
    }
    return this.addDocument(input.text, input.url, metadata);
  }

  async getDocument(documentId: string): Promise<Document | null> {
    return this.store.getDocument(documentId);
  }
}
