/**
 * @fileoverview Fetch a web page and extract its readable main text.
 *
 * The page is parsed with jsdom and reduced to its main content by Mozilla's
 * Readability. Block elements in the extracted content become line breaks;
 * whitespace inside a line is collapsed.
 */

import { Readability } from '@mozilla/readability';
import { JSDOM, VirtualConsole } from 'jsdom';
import { getErrorMessage } from '../utils/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { ExtractedPage, ExtractionHints, PageExtractor } from './types.js';

export const DEFAULT_EXTRACTION_TIMEOUT_MS = 20_000;

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

const BLOCK_ELEMENTS = new Set([
  'ADDRESS', 'ARTICLE', 'ASIDE', 'BLOCKQUOTE', 'BR', 'DD', 'DIV', 'DL', 'DT', 'FIGCAPTION', 'FIGURE',
  'FOOTER', 'H1', 'H2', 'H3', 'H4', 'H5', 'H6', 'HEADER', 'HR', 'LI', 'MAIN', 'OL', 'P', 'PRE',
  'SECTION', 'TABLE', 'TD', 'TH', 'TR', 'UL',
]);

const PUBLISHED_AT_SELECTORS = [
  'meta[property="article:published_time"]',
  'meta[itemprop="datePublished"]',
  'meta[name="datePublished"]',
  'meta[name="date"]',
];

// ============================================================================
// PARSING
// ============================================================================

/** Parse HTML into a detached document. Scripts never run; parser warnings are dropped. */
export function parseHtml(html: string, url?: string): Document {
  const dom = new JSDOM(html, { virtualConsole: new VirtualConsole(), ...(url ? { url } : {}) });
  return dom.window.document;
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function collectText(node: Node, parts: string[]): void {
  node.childNodes.forEach((child) => {
    if (child.nodeType === TEXT_NODE) {
      parts.push(child.textContent ?? '');
      return;
    }
    if (!isElement(child)) return;
    const block = BLOCK_ELEMENTS.has(child.tagName);
    if (block) parts.push('\n');
    collectText(child, parts);
    if (block) parts.push('\n');
  });
}

/** Text of a node with one line per block element and blank lines removed. */
export function blockText(node: Node): string {
  const parts: string[] = [];
  collectText(node, parts);
  return parts
    .join('')
    .split('\n')
    .map((line) => line.replace(/[ \t\f\v\r\u00a0]+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

// ============================================================================
// EXTRACTION
// ============================================================================

export function extractTitle(document: Document): string | null {
  const title = document.title.trim();
  return title.length > 0 ? title : null;
}

export function extractPublishedAt(document: Document): string | null {
  for (const selector of PUBLISHED_AT_SELECTORS) {
    const content = document.querySelector(selector)?.getAttribute('content')?.trim();
    if (content) return content;
  }
  return document.querySelector('time[datetime]')?.getAttribute('datetime')?.trim() || null;
}

/**
 * Main content as plain text, or '' when Readability finds none. Readability
 * rewrites the document it is given, so read metadata first.
 */
export function extractMainText(document: Document): string {
  const article = new Readability(document).parse();
  if (!article?.content) return '';
  return blockText(JSDOM.fragment(article.content));
}

export interface FetchAndExtractOptions {
  timeoutMs?: number;
}

export async function fetchAndExtract(
  url: string,
  hints: ExtractionHints = {},
  options: FetchAndExtractOptions = {},
): Promise<ExtractedPage | null> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_EXTRACTION_TIMEOUT_MS;
  let html: string;
  try {
    const response = await fetch(url, {
      redirect: 'follow',
      headers: { Accept: 'text/html,application/xhtml+xml' },
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      logWarning('Page fetch failed', { url, status: response.status });
      return null;
    }
    html = await response.text();
  } catch (error) {
    logWarning('Page fetch failed', { url, error: getErrorMessage(error) });
    return null;
  }

  let title: string | null;
  let publishedAt: string | null;
  let text: string;
  try {
    const document = parseHtml(html, url);
    title = extractTitle(document);
    publishedAt = extractPublishedAt(document);
    text = extractMainText(document);
  } catch (error) {
    logWarning('Page extraction failed', { url, error: getErrorMessage(error) });
    return null;
  }
  if (text.length === 0) {
    logDebug('No extractable text', { url });
    return null;
  }
  return {
    url,
    title: hints.title || title || url,
    text,
    publishedAt: hints.publishedAt ?? publishedAt,
  };
}

export function createPageExtractor(options: FetchAndExtractOptions = {}): PageExtractor {
  return (url, hints) => fetchAndExtract(url, hints, options);
}
