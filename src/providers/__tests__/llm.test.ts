import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError, EmbeddingError, ProviderError } from '../../core/errors.js';
import { createConfig } from '../../config/index.js';
import { OpenAIEmbeddingProvider, createEmbeddingProvider } from '../embeddings.js';
import { OpenAITextGenerator, StubTextGenerator, createTextGenerator } from '../llm.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('StubTextGenerator', () => {
  it('always returns an empty string', async () => {
    expect(await new StubTextGenerator().generate('system', 'user')).toBe('');
  });
});

describe('OpenAITextGenerator', () => {
  const options = {
    apiKey: 'test-secret',
    model: 'test-model',
    baseUrl: 'https://llm.test/v1/',
    temperature: 0.2,
    timeoutMs: 1000,
  };

  it('sends a chat completion request and returns the trimmed content', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({ choices: [{ message: { content: '  An answer. ' } }] }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const output = await new OpenAITextGenerator(options).generate('Be brief.', 'Question?');

    expect(output).toBe('An answer.');
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Question?' },
      ],
      temperature: 0.2,
    });
  });

  it('treats null content as empty', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ choices: [{ message: { content: null } }] })));

    expect(await new OpenAITextGenerator(options).generate('s', 'u')).toBe('');
  });

  it('rejects an unexpected response shape', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ choices: [] })));

    await expect(new OpenAITextGenerator(options).generate('s', 'u')).rejects.toBeInstanceOf(ProviderError);
  });

  it('skips the request when both prompts are blank', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    expect(await new OpenAITextGenerator(options).generate(' ', '')).toBe('');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('createTextGenerator', () => {
  it('uses the stub unless openai has a key', () => {
    expect(createTextGenerator(createConfig().llm).id).toBe('stub');
    expect(createTextGenerator(createConfig({ llm: { provider: 'openai' } }).llm).id).toBe('stub');
    expect(createTextGenerator(createConfig({ llm: { provider: 'openai', apiKey: 'test-secret' } }).llm).id).toBe('openai');
  });
});

describe('OpenAIEmbeddingProvider', () => {
  const options = { apiKey: 'test-secret', model: 'embed-test', baseUrl: 'https://llm.test/v1', timeoutMs: 1000 };

  it('orders embeddings by index', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () =>
        jsonResponse({
          data: [
            { index: 1, embedding: [0, 1] },
            { index: 0, embedding: [1, 0] },
          ],
        }),
      ),
    );

    expect(await new OpenAIEmbeddingProvider(options).embed(['a', 'b'])).toEqual([
      [1, 0],
      [0, 1],
    ]);
  });

  it('returns nothing for no input without a request', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    expect(await new OpenAIEmbeddingProvider(options).embed([])).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('wraps transport failures in EmbeddingError, keeping retryability', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({}, 429)));

    const embedding = new OpenAIEmbeddingProvider(options).embed(['a']);
    await expect(embedding).rejects.toBeInstanceOf(EmbeddingError);
    await expect(embedding).rejects.toMatchObject({ retryable: true, inputCount: 1 });
  });

  it('rejects a response with the wrong number of vectors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ data: [{ index: 0, embedding: [1] }] })));

    await expect(new OpenAIEmbeddingProvider(options).embed(['a', 'b'])).rejects.toThrow('unexpected embeddings response shape');
  });
});

describe('createEmbeddingProvider', () => {
  it('returns null for sparse vectors', () => {
    expect(createEmbeddingProvider(createConfig().embedding)).toBeNull();
  });

  it('requires an API key for openai', () => {
    expect(() => createEmbeddingProvider(createConfig({ embedding: { provider: 'openai' } }).embedding)).toThrow(ConfigurationError);
  });

  it('builds the openai provider with its model id', () => {
    const provider = createEmbeddingProvider(createConfig({ embedding: { provider: 'openai', apiKey: 'test-secret' } }).embedding);
    expect(provider?.modelId).toBe('text-embedding-3-small');
  });
});
