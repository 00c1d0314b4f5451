import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createConfig } from '../../config/index.js';
import { ConfigurationError, ValidationError } from '../../core/errors.js';
import { webDocumentId } from '../../ingest/indexer.js';
import type { ExtractedPage, PageExtractor, TextGenerator, WebSearchHit, WebSearchProvider } from '../../providers/types.js';
import { InMemoryDocumentStore, InMemoryTraceStore } from '../../storage/memory_storage.js';
import { VERSION } from '../../version.js';
import { SEARCH_NOT_CONFIGURED, createPlanner, createResearchService, type ResearchService } from '../service.js';

const FIXED_NOW = new Date('2024-07-01T00:00:00.000Z');

const hits: WebSearchHit[] = [
  { title: 'Lagoons', url: 'https://a.test/lagoon', snippet: 'Tidal lagoons', publishedAt: '2024-01-01' },
  { title: 'Broken', url: 'https://b.test/broken', snippet: 'Unreachable', publishedAt: null },
];

class FakeSearchProvider implements WebSearchProvider {
  readonly id = 'fake-search';
  readonly queries: Array<[string, number]> = [];

  async search(query: string, maxResults: number): Promise<WebSearchHit[]> {
    this.queries.push([query, maxResults]);
    return hits.slice(0, maxResults);
  }
}

const fakeExtractor: PageExtractor = async (url, hints) => {
  if (url !== 'https://a.test/lagoon') return null;
  const page: ExtractedPage = {
    url,
    title: hints?.title ?? url,
    text: 'Tidal lagoons store water behind a wall.',
    publishedAt: hints?.publishedAt ?? null,
  };
  return page;
};

describe('createResearchService', () => {
  let service: ResearchService;
  let searchProvider: FakeSearchProvider;

  beforeEach(async () => {
    searchProvider = new FakeSearchProvider();
    service = await createResearchService(createConfig(), {
      documentStore: new InMemoryDocumentStore(),
      traceStore: new InMemoryTraceStore(),
      searchProvider,
      extractor: fakeExtractor,
      now: () => FIXED_NOW,
    });
  });

  afterEach(async () => {
    await service.close();
  });

  it('reports health with the package version', () => {
    expect(service.health()).toEqual({ status: 'ok', version: VERSION });
  });

  it('counts indexed chunks', async () => {
    expect(await service.countChunks()).toBe(0);

    const document = await service.ingestDocument('The sky is blue. Water is wet.', 'a.txt');

    expect(document.chunks.length).toBeGreaterThan(0);
    expect(await service.countChunks()).toBe(document.chunks.length);
  });

  it('ingests, answers and keeps the trace retrievable', async () => {
    const document = await service.ingestDocument('The sky is blue. Water is wet.', 'a.txt');

    const response = await service.query('sky');

    expect(response.citations.map((citation) => citation.sourceId)).toEqual([document.id]);
    expect(response.refusal).toBe(false);
    const trace = await service.getTrace(response.traceId);
    expect(trace?.events.map((event) => event.eventType)).toEqual(['plan', 'retrieve', 'write', 'critique', 'verify', 'finalize']);
    expect(await service.getDocument(document.id)).toEqual(document);
  });

  it('saves traces supplied by the caller', async () => {
    await service.saveTrace('trace-ext', 'q', []);

    expect(await service.getTrace('trace-ext')).toEqual({ traceId: 'trace-ext', query: 'q', events: [] });
  });

  it('fetches, indexes and ranks web search results', async () => {
    const response = await service.searchWeb('tidal lagoons', { maxResults: 2 });

    expect(searchProvider.queries).toEqual([['tidal lagoons', 2]]);
    expect(response.results).toEqual([
      {
        sourceId: webDocumentId('https://a.test/lagoon'),
        title: 'Lagoons',
        url: 'https://a.test/lagoon',
        publishedAt: '2024-01-01',
        snippet: 'Tidal lagoons store water behind a wall.',
      },
    ]);

    const trace = await service.getTrace(response.traceId);
    expect(trace?.events.map((event) => [event.eventType, event.payload])).toEqual([
      ['search', { query: 'tidal lagoons', provider: 'fake-search', result_count: 2 }],
      ['retrieve', { url: 'https://a.test/lagoon', document_id: webDocumentId('https://a.test/lagoon'), status: 'indexed' }],
    ]);

    const stored = await service.getDocument(webDocumentId('https://a.test/lagoon'));
    expect(stored?.metadata).toMatchObject({ source_rank: 0, query: 'tidal lagoons' });
  });

  it('validates web search arguments', async () => {
    await expect(service.searchWeb('  ')).rejects.toBeInstanceOf(ValidationError);
    await expect(service.searchWeb('q', { maxResults: 51 })).rejects.toThrow('Validation failed for maxResults');
  });

  it('exposes its config', () => {
    expect(service.config.pipeline.enableCritic).toBe(true);
  });
});

describe('createResearchService without a search provider', () => {
  it('reports search as not configured', async () => {
    const service = await createResearchService(createConfig(), {
      documentStore: new InMemoryDocumentStore(),
      traceStore: new InMemoryTraceStore(),
      searchProvider: null,
    });
    try {
      const search = service.searchWeb('tides');
      await expect(search).rejects.toBeInstanceOf(ConfigurationError);
      await expect(search).rejects.toThrow(SEARCH_NOT_CONFIGURED);
    } finally {
      await service.close();
    }
  });

  it('treats provider none as not configured even with keys', async () => {
    const config = createConfig({ search: { provider: 'none', bingApiKey: 'test-secret' } });
    const service = await createResearchService(config, { databasePath: ':memory:' });
    try {
      await expect(service.searchWeb('tides')).rejects.toThrow(SEARCH_NOT_CONFIGURED);
    } finally {
      await service.close();
    }
  });
});

describe('createResearchService on SQLite', () => {
  it('persists through an in-memory database', async () => {
    const service = await createResearchService(createConfig(), { databasePath: ':memory:' });
    try {
      const document = await service.ingestDocument('Tides rise twice a day.', 'tides.txt');
      const result = await service.runPipeline('tides');

      expect(result.evidence.map((chunk) => chunk.sourceId)).toEqual([document.id]);
      expect((await service.getTrace(result.traceId))?.events).toHaveLength(6);
    } finally {
      await service.close();
    }
  });

  it('keeps accepting writes after a web search whose query has no tokens', async () => {
    const service = await createResearchService(createConfig(), {
      databasePath: ':memory:',
      searchProvider: new FakeSearchProvider(),
      extractor: fakeExtractor,
    });
    try {
      const response = await service.searchWeb('日本語', { maxResults: 2 });
      expect(response.results).toEqual([]);

      const document = await service.ingestDocument('Tides rise twice a day.', 'tides.txt');

      expect(await service.getDocument(document.id)).toEqual(document);
      expect(await service.countChunks()).toBe(1 + document.chunks.length);
    } finally {
      await service.close();
    }
  });
});

describe('createPlanner', () => {
  const stub: TextGenerator = { id: 'stub', generate: async () => '' };
  const remote: TextGenerator = { id: 'openai', generate: async () => '' };
  const pipeline = createConfig().pipeline;

  it('picks the generative planner only with a real generator in auto mode', () => {
    expect(createPlanner(pipeline, stub).id).toBe('heuristic');
    expect(createPlanner(pipeline, remote).id).toBe('generative');
  });

  it('honors an explicit planner', () => {
    expect(createPlanner({ ...pipeline, planner: 'heuristic' }, remote).id).toBe('heuristic');
    expect(createPlanner({ ...pipeline, planner: 'generative' }, stub).id).toBe('generative');
  });
});
