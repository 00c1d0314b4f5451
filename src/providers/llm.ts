/**
 * @fileoverview Text generation providers
 *
 * - StubTextGenerator: deterministic, offline, always returns ''. Every stage
 *   then takes its documented fallback, which keeps local runs reproducible.
 * - OpenAITextGenerator: chat completions against any OpenAI-compatible API.
 */

import { z } from 'zod';
import { ProviderError } from '../core/errors.js';
import type { LlmConfig } from '../config/index.js';
import { requestJson } from './http.js';
import type { TextGenerator } from './types.js';

export class StubTextGenerator implements TextGenerator {
  readonly id = 'stub';

  async generate(_systemPrompt: string, _userContent: string): Promise<string> {
    return '';
  }
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
});

export interface OpenAITextGeneratorOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  temperature: number;
  timeoutMs: number;
}

export class OpenAITextGenerator implements TextGenerator {
  readonly id = 'openai';

  constructor(private readonly options: OpenAITextGeneratorOptions) {}

  async generate(systemPrompt: string, userContent: string): Promise<string> {
    if (systemPrompt.trim() === '' && userContent.trim() === '') return '';

    const payload = await requestJson({
      provider: this.id,
      kind: 'llm',
      url: `${this.options.baseUrl.replace(/\/$/, '')}/chat/completions`,
      headers: { Authorization: `Bearer ${this.options.apiKey}` },
      body: {
        model: this.options.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userContent },
        ],
        temperature: this.options.temperature,
      },
      timeoutMs: this.options.timeoutMs,
    });

    const parsed = ChatCompletionSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderError(this.id, 'llm', 'invalid_response', false, 'unexpected chat completion shape');
    }
    return (parsed.data.choices[0]?.message.content ?? '').trim();
  }
}

/**
 * Pick the generator for a config. `openai` without an API key falls back to
 * the stub, matching how the service behaves with no credentials.
 */
export function createTextGenerator(config: LlmConfig): TextGenerator {
  if (config.provider === 'openai' && config.apiKey) {
    return new OpenAITextGenerator({
      apiKey: config.apiKey,
      model: config.model,
      baseUrl: config.baseUrl,
      temperature: config.temperature,
      timeoutMs: config.timeoutMs,
    });
  }
  return new StubTextGenerator();
}
