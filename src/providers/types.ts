/**
 * @fileoverview External capability contracts
 *
 * The pipeline only ever talks to these interfaces. Concrete providers are
 * chosen once, at service construction, from configuration.
 *
 * @packageDocumentation
 */

// ============================================================================
// TEXT GENERATION
// ============================================================================

/**
 * A language model (or deterministic stand-in) that turns a system prompt and
 * user content into text. Returns an empty string when it has nothing to say;
 * transport failures surface as ProviderError.
 */
export interface TextGenerator {
  readonly id: string;
  generate(systemPrompt: string, userContent: string): Promise<string>;
}

// ============================================================================
// EMBEDDINGS
// ============================================================================

export interface EmbeddingProvider {
  readonly id: string;
  readonly modelId: string;
  /** One vector per input, in input order. */
  embed(texts: readonly string[]): Promise<number[][]>;
}

// ============================================================================
// WEB SEARCH & PAGE EXTRACTION
// ============================================================================

export interface WebSearchHit {
  title: string;
  url: string;
  snippet: string;
  publishedAt: string | null;
}

export interface WebSearchProvider {
  readonly id: string;
  search(query: string, maxResults: number): Promise<WebSearchHit[]>;
}

export interface ExtractedPage {
  url: string;
  title: string;
  text: string;
  publishedAt: string | null;
}

/** Hints from the search hit, used when the page itself does not say. */
export interface ExtractionHints {
  title?: string;
  publishedAt?: string | null;
}

/**
 * Fetches a URL and extracts readable text. Resolves to null when the page
 * cannot be fetched or has no extractable text; never rejects.
 */
export type PageExtractor = (url: string, hints?: ExtractionHints) => Promise<ExtractedPage | null>;
