/**
 * @fileoverview Web search providers (Bing Web Search, SerpAPI).
 */

import type { SearchConfig } from '../config/index.js';
import { requestJson } from './http.js';
import type { WebSearchHit, WebSearchProvider } from './types.js';

type Freshness = SearchConfig['freshness'];

const BING_ENDPOINT = 'https://api.bing.microsoft.com/v7.0/search';
const SERPAPI_ENDPOINT = 'https://serpapi.com/search.json';

const BING_FRESHNESS: Record<Freshness, string> = {
  day: 'Day',
  week: 'Week',
  month: 'Month',
};

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function asOptionalString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export interface SearchProviderOptions {
  apiKey: string;
  timeoutMs: number;
  freshness?: Freshness;
}

export class BingSearchProvider implements WebSearchProvider {
  readonly id = 'bing';

  constructor(private readonly options: SearchProviderOptions) {}

  async search(query: string, maxResults: number): Promise<WebSearchHit[]> {
    const params = new URLSearchParams({
      q: query,
      count: String(maxResults),
      textDecorations: 'false',
      textFormat: 'Raw',
    });
    if (this.options.freshness) {
      params.set('freshness', BING_FRESHNESS[this.options.freshness]);
    }
    const payload = await requestJson({
      provider: this.id,
      kind: 'search',
      url: `${BING_ENDPOINT}?${params.toString()}`,
      headers: { 'Ocp-Apim-Subscription-Key': this.options.apiKey },
      timeoutMs: this.options.timeoutMs,
    });

    const webPages = asRecord(asRecord(payload).webPages);
    return asArray(webPages.value).slice(0, maxResults).map((raw) => {
      const item = asRecord(raw);
      return {
        title: asString(item.name),
        url: asString(item.url),
        snippet: asString(item.snippet),
        publishedAt: asOptionalString(item.datePublished) ?? asOptionalString(item.dateLastCrawled),
      };
    });
  }
}

export class SerpApiSearchProvider implements WebSearchProvider {
  readonly id = 'serpapi';

  constructor(private readonly options: SearchProviderOptions) {}

  async search(query: string, maxResults: number): Promise<WebSearchHit[]> {
    const params = new URLSearchParams({
      q: query,
      engine: 'google',
      num: String(maxResults),
      api_key: this.options.apiKey,
    });
    const payload = await requestJson({
      provider: this.id,
      kind: 'search',
      url: `${SERPAPI_ENDPOINT}?${params.toString()}`,
      timeoutMs: this.options.timeoutMs,
    });

    return asArray(asRecord(payload).organic_results).slice(0, maxResults).map((raw) => {
      const item = asRecord(raw);
      return {
        title: asString(item.title),
        url: asString(item.link),
        snippet: asString(item.snippet),
        publishedAt: asOptionalString(item.date),
      };
    });
  }
}

/**
 * Resolve the configured provider. `auto` prefers Bing, then SerpAPI, based on
 * which key is present; null means web search is not configured.
 */
export function resolveSearchProvider(config: SearchConfig): WebSearchProvider | null {
  const wantsBing = config.provider === 'bing' || config.provider === 'auto';
  const wantsSerp = config.provider === 'serpapi' || config.provider === 'auto';
  if (wantsBing && config.bingApiKey) {
    return new BingSearchProvider({ apiKey: config.bingApiKey, timeoutMs: config.timeoutMs, freshness: config.freshness });
  }
  if (wantsSerp && config.serpApiKey) {
    return new SerpApiSearchProvider({ apiKey: config.serpApiKey, timeoutMs: config.timeoutMs });
  }
  return null;
}
