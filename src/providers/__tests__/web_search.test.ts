import { afterEach, describe, expect, it, vi } from 'vitest';
import { createConfig } from '../../config/index.js';
import { BingSearchProvider, SerpApiSearchProvider, resolveSearchProvider } from '../web_search.js';

function stubFetch(body: unknown) {
  const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => new Response(JSON.stringify(body), { status: 200 }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('BingSearchProvider', () => {
  it('maps web pages to hits and sends the subscription key', async () => {
    const fetchMock = stubFetch({
      webPages: {
        value: [
          { name: 'Tides', url: 'https://a.test', snippet: 'About tides', datePublished: '2024-01-02' },
          { name: 'Moon', url: 'https://b.test', snippet: 'About the moon', dateLastCrawled: '2024-02-03' },
          { name: 'Extra', url: 'https://c.test', snippet: '' },
        ],
      },
    });

    const hits = await new BingSearchProvider({ apiKey: 'test-secret', timeoutMs: 1000, freshness: 'week' }).search('tides', 2);

    expect(hits).toEqual([
      { title: 'Tides', url: 'https://a.test', snippet: 'About tides', publishedAt: '2024-01-02' },
      { title: 'Moon', url: 'https://b.test', snippet: 'About the moon', publishedAt: '2024-02-03' },
    ]);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    const requested = new URL(String(url));
    expect(requested.origin + requested.pathname).toBe('https://api.bing.microsoft.com/v7.0/search');
    expect(requested.searchParams.get('q')).toBe('tides');
    expect(requested.searchParams.get('count')).toBe('2');
    expect(requested.searchParams.get('freshness')).toBe('Week');
    expect(init?.headers).toMatchObject({ 'Ocp-Apim-Subscription-Key': 'test-secret' });
  });

  it('returns no hits when the response has no web pages', async () => {
    stubFetch({ _type: 'SearchResponse' });

    expect(await new BingSearchProvider({ apiKey: 'test-secret', timeoutMs: 1000 }).search('tides', 5)).toEqual([]);
  });
});

describe('SerpApiSearchProvider', () => {
  it('maps organic results to hits', async () => {
    const fetchMock = stubFetch({
      organic_results: [{ title: 'Tides', link: 'https://a.test', snippet: 'About tides', date: 'Jan 2, 2024' }, { title: 'No date', link: 'https://b.test' }],
    });

    const hits = await new SerpApiSearchProvider({ apiKey: 'test-secret', timeoutMs: 1000 }).search('tides', 5);

    expect(hits).toEqual([
      { title: 'Tides', url: 'https://a.test', snippet: 'About tides', publishedAt: 'Jan 2, 2024' },
      { title: 'No date', url: 'https://b.test', snippet: '', publishedAt: null },
    ]);
    const requested = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(requested.searchParams.get('engine')).toBe('google');
    expect(requested.searchParams.get('num')).toBe('5');
    expect(requested.searchParams.get('api_key')).toBe('test-secret');
  });
});

describe('resolveSearchProvider', () => {
  it('returns null without keys', () => {
    expect(resolveSearchProvider(createConfig().search)).toBeNull();
  });

  it('prefers bing in auto mode', () => {
    const config = createConfig({ search: { bingApiKey: 'test-secret', serpApiKey: 'test-secret' } });
    expect(resolveSearchProvider(config.search)?.id).toBe('bing');
  });

  it('falls back to serpapi in auto mode', () => {
    expect(resolveSearchProvider(createConfig({ search: { serpApiKey: 'test-secret' } }).search)?.id).toBe('serpapi');
  });

  it('honors an explicit provider', () => {
    const config = createConfig({ search: { provider: 'serpapi', bingApiKey: 'test-secret' } });
    expect(resolveSearchProvider(config.search)).toBeNull();
    expect(resolveSearchProvider(createConfig({ search: { provider: 'none', bingApiKey: 'test-secret' } }).search)).toBeNull();
  });
});
