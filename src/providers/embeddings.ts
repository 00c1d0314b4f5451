/**
 * @fileoverview Dense embedding provider over an OpenAI-compatible
 * `/embeddings` endpoint.
 */

import { z } from 'zod';
import { ConfigurationError, EmbeddingError, isProviderError } from '../core/errors.js';
import type { EmbeddingConfig } from '../config/index.js';
import { getErrorMessage } from '../utils/errors.js';
import { requestJson } from './http.js';
import type { EmbeddingProvider } from './types.js';

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    }),
  ),
});

export interface OpenAIEmbeddingProviderOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly id = 'openai';
  readonly modelId: string;

  constructor(private readonly options: OpenAIEmbeddingProviderOptions) {
    this.modelId = options.model;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    let payload: unknown;
    try {
      payload = await requestJson({
        provider: this.id,
        kind: 'embedding',
        url: `${this.options.baseUrl.replace(/\/$/, '')}/embeddings`,
        headers: { Authorization: `Bearer ${this.options.apiKey}` },
        body: { model: this.options.model, input: texts },
        timeoutMs: this.options.timeoutMs,
      });
    } catch (error) {
      const retryable = isProviderError(error) ? error.retryable : true;
      throw new EmbeddingError(this.modelId, retryable, getErrorMessage(error), texts.length);
    }

    const parsed = EmbeddingResponseSchema.safeParse(payload);
    if (!parsed.success || parsed.data.data.length !== texts.length) {
      throw new EmbeddingError(this.modelId, false, 'unexpected embeddings response shape', texts.length);
    }
    // The API may return items out of order; `index` is authoritative.
    return [...parsed.data.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}

/**
 * Returns null for the sparse (local) vectorizer, which needs no provider.
 */
export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider | null {
  if (config.provider === 'sparse') return null;
  if (!config.apiKey) {
    throw new ConfigurationError('embedding.apiKey', 'required when embedding.provider is openai');
  }
  return new OpenAIEmbeddingProvider({
    apiKey: config.apiKey,
    model: config.model,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
  });
}
