/**
 * @fileoverview Provider Module Exports
 *
 * Text generation, embeddings, web search and page extraction. Every provider
 * is optional: with none configured, sourcewise runs offline on sparse vectors
 * and the stub generator.
 *
 * @packageDocumentation
 */

export type {
  TextGenerator,
  EmbeddingProvider,
  WebSearchHit,
  WebSearchProvider,
  ExtractedPage,
  ExtractionHints,
  PageExtractor,
} from './types.js';

export { requestJson, type JsonRequest } from './http.js';
export { StubTextGenerator, OpenAITextGenerator, createTextGenerator, type OpenAITextGeneratorOptions } from './llm.js';
export { OpenAIEmbeddingProvider, createEmbeddingProvider, type OpenAIEmbeddingProviderOptions } from './embeddings.js';
export { BingSearchProvider, SerpApiSearchProvider, resolveSearchProvider, type SearchProviderOptions } from './web_search.js';
export {
  fetchAndExtract,
  createPageExtractor,
  extractMainText,
  extractTitle,
  extractPublishedAt,
  parseHtml,
  blockText,
  DEFAULT_EXTRACTION_TIMEOUT_MS,
  type FetchAndExtractOptions,
} from './extraction.js';
