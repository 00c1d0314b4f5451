import { beforeEach, describe, expect, it } from 'vitest';
import { HeuristicClaimJudge } from '../../agents/claim_judge.js';
import { Critic, NO_CRITIQUE } from '../../agents/critic.js';
import { HeuristicPlanner } from '../../agents/planner.js';
import { Retriever } from '../../agents/retriever.js';
import { Verifier } from '../../agents/verifier.js';
import { Writer } from '../../agents/writer.js';
import { PipelineError, StorageError, ValidationError } from '../../core/errors.js';
import { DocumentIndexer } from '../../ingest/indexer.js';
import { SparseTokenVectorizer } from '../../ingest/vectorizer.js';
import { StubTextGenerator } from '../../providers/llm.js';
import { InMemoryDocumentStore, InMemoryTraceStore } from '../../storage/memory_storage.js';
import type { DocumentStore, TraceStore } from '../../storage/types.js';
import { ResearchPipeline, type ResearchPipelineDeps } from '../graph.js';

const FIXED_NOW = new Date('2024-06-01T08:00:00.000Z');

function buildPipeline(
  documents: DocumentStore,
  traces: TraceStore,
  overrides: Partial<ResearchPipelineDeps> = {},
): ResearchPipeline {
  const generator = new StubTextGenerator();
  return new ResearchPipeline({
    planner: new HeuristicPlanner(),
    retriever: new Retriever(documents, new SparseTokenVectorizer()),
    writer: new Writer(generator),
    critic: new Critic(generator),
    verifier: new Verifier(new HeuristicClaimJudge(generator)),
    traceStore: traces,
    now: () => FIXED_NOW,
    ...overrides,
  });
}

const failingDocumentStore: DocumentStore = {
  upsertDocument: async () => undefined,
  getDocument: async () => null,
  vectorSearch: async () => {
    throw new StorageError('query', false, 'disk gone');
  },
  countChunks: async () => 0,
  close: async () => undefined,
};

describe('ResearchPipeline', () => {
  let documents: InMemoryDocumentStore;
  let traces: InMemoryTraceStore;

  beforeEach(async () => {
    documents = new InMemoryDocumentStore();
    traces = new InMemoryTraceStore();
    const indexer = new DocumentIndexer({ store: documents, vectorizer: new SparseTokenVectorizer() });
    await indexer.addDocument('The sky is blue. Water is wet.', 'a.txt', { document_id: 'doc-a' });
  });

  it('runs every stage with the offline generator', async () => {
    const result = await buildPipeline(documents, traces).runPipeline('sky', { traceId: 'trace-fixed' });

    expect(result.traceId).toBe('trace-fixed');
    expect(result.answerId).toMatch(/^ans-[0-9a-f]{8}$/);
    expect(result.plan).toEqual([{ question: 'Key points for: sky', searchQuery: 'sky evidence' }]);
    expect(result.evidence.map((chunk) => chunk.chunkId)).toEqual(['doc-a-chunk-0']);
    expect(result.answer).toBe('According to the retrieved sources, The sky is blue. Water is wet.');
    expect(result.citations).toHaveLength(1);
    expect(result.critique).toBe(NO_CRITIQUE);
    expect(result.claimVerifications.map((claim) => [claim.claimText, claim.verdict])).toEqual([
      ['According to the retrieved sources, The sky is blue.', 'supported'],
      ['Water is wet.', 'supported'],
    ]);
    expect(result.confidenceScore).toBe(1);
    expect(result.refusal).toBe(false);
  });

  it('records one event per stage, in order, and persists them', async () => {
    const result = await buildPipeline(documents, traces).runPipeline('sky', { traceId: 'trace-fixed' });

    expect(result.traceEvents.map((event) => [event.eventId, event.agent])).toEqual([
      ['trace-fixed/evt-plan-001', 'Planner'],
      ['trace-fixed/evt-retrieve-002', 'Retriever'],
      ['trace-fixed/evt-write-003', 'Writer'],
      ['trace-fixed/evt-critique-004', 'Critic'],
      ['trace-fixed/evt-verify-005', 'Verifier'],
      ['trace-fixed/evt-finalize-006', 'Orchestrator'],
    ]);
    expect(result.traceEvents[1]?.payload).toEqual({
      queries: ['sky evidence'],
      result_count: 1,
      chunk_ids: ['doc-a-chunk-0'],
    });
    expect(result.traceEvents[5]?.payload).toEqual({ confidence_score: 1, refusal: false });
    expect(result.traceEvents.every((event) => event.timestamp === '2024-06-01T08:00:00.000Z')).toBe(true);

    const stored = await traces.getTrace('trace-fixed');
    expect(stored).toEqual({ traceId: 'trace-fixed', query: 'sky', events: [...result.traceEvents] });
  });

  it('refuses with zero confidence when nothing matches', async () => {
    const result = await buildPipeline(documents, traces).runPipeline('volcano');

    expect(result.evidence).toEqual([]);
    expect(result.answer).toBe('No indexed sources matched the query: volcano');
    expect(result.citations).toEqual([]);
    expect(result.claimVerifications).toEqual([]);
    expect(result.confidenceScore).toBe(0);
    expect(result.refusal).toBe(true);
  });

  it('skips disabled stages and scores 0.2 without claims', async () => {
    const pipeline = buildPipeline(documents, traces, { critic: null, verifier: null });

    const result = await pipeline.runPipeline('sky');

    expect(result.critique).toBeNull();
    expect(result.traceEvents.map((event) => event.eventType)).toEqual(['plan', 'retrieve', 'write', 'finalize']);
    expect(result.confidenceScore).toBe(0.2);
    expect(result.refusal).toBe(true);
  });

  it('generates trace ids when none are given', async () => {
    const pipeline = buildPipeline(documents, traces);

    const first = await pipeline.runPipeline('sky');
    const second = await pipeline.runPipeline('sky');

    expect(first.traceId).toMatch(/^trace-[0-9a-f]{12}$/);
    expect(first.traceId).not.toBe(second.traceId);
  });

  it('returns a frozen result', async () => {
    const result = await buildPipeline(documents, traces).runPipeline('sky');

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.citations)).toBe(true);
  });

  it('limits evidence to documents in scope', async () => {
    const result = await buildPipeline(documents, traces).runPipeline('sky', { documentIds: ['doc-other'] });

    expect(result.evidence).toEqual([]);
  });

  it.each([
    ['zero', 0],
    ['above the limit', 26],
    ['fractional', 1.5],
  ])('rejects a maxSources that is %s', async (_label, maxSources) => {
    await expect(buildPipeline(documents, traces).runPipeline('sky', { maxSources })).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects an empty query', async () => {
    await expect(buildPipeline(documents, traces).runPipeline('   ')).rejects.toThrow('Validation failed for query');
  });

  it('saves a partial trace and raises PipelineError when a store fails', async () => {
    const pipeline = buildPipeline(failingDocumentStore, traces);

    let caught: unknown;
    try {
      await pipeline.runPipeline('sky', { traceId: 'trace-broken' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(PipelineError);
    expect(caught).toMatchObject({ stage: 'retrieve', correlationId: 'trace-broken' });
    const stored = await traces.getTrace('trace-broken');
    expect(stored?.events.map((event) => event.eventId)).toEqual(['trace-broken/evt-plan-001', 'trace-broken/evt-error-002']);
    expect(stored?.events[1]?.payload).toEqual({ stage: 'retrieve', error: 'Storage query failed: disk gone' });
  });

  it('raises PipelineError at persist when the trace cannot be saved', async () => {
    const brokenTraces: TraceStore = {
      saveTrace: async () => {
        throw new StorageError('write', true, 'read-only');
      },
      getTrace: async () => null,
      close: async () => undefined,
    };

    await expect(buildPipeline(documents, brokenTraces).runPipeline('sky')).rejects.toMatchObject({
      stage: 'persist',
      retryable: true,
    });
  });
});
