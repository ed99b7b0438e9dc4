import { describe, expect, it, vi } from 'vitest';
import { parseConfig } from '../src/config/index.js';
import { LLMConnectionError, LLMModelError, LLMResponseError } from '../src/lib/llm/errors.js';
import { createCompletionProvider } from '../src/lib/llm/provider.js';
import { OllamaProvider } from '../src/lib/llm/providers/ollama.js';
import { OpenAICompletionProvider } from '../src/lib/llm/providers/openai.js';
import type { CompletionInput } from '../src/lib/llm/types.js';

const input: CompletionInput = {
  prompt: 'Title: Hello\n\nTitle:',
  maxTokens: 256,
  temperature: 0.9,
  model: 'test-model',
};

const respondWith = (body: string, status = 200) =>
  vi.fn<typeof fetch>(async () => new Response(body, { status }));

const readJsonBody = (init: RequestInit | undefined): unknown => JSON.parse(String(init?.body));

describe('OllamaProvider', () => {
  it('sends a raw generate request and returns the response text', async () => {
    const fetchImpl = respondWith(JSON.stringify({ response: ' A summary.', done: true }));
    const provider = new OllamaProvider({ baseUrl: 'http://localhost:11434', fetchImpl });

    await expect(provider.complete(input)).resolves.toEqual({ text: ' A summary.' });

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/generate');
    expect(init?.method).toBe('POST');
    expect(readJsonBody(init)).toEqual({
      model: 'test-model',
      prompt: input.prompt,
      raw: true,
      stream: false,
      options: { temperature: 0.9, num_predict: 256 },
    });
  });

  it('falls back to the last line of an NDJSON body', async () => {
    const fetchImpl = respondWith('{"response":"partial"}\n{"response":"final","done":true}');
    const provider = new OllamaProvider({ baseUrl: 'http://localhost:11434', fetchImpl });

    await expect(provider.complete(input)).resolves.toEqual({ text: 'final' });
  });

  it('maps a 404 to LLMModelError', async () => {
    const provider = new OllamaProvider({
      baseUrl: 'http://localhost:11434',
      fetchImpl: respondWith('model not found', 404),
    });

    await expect(provider.complete(input)).rejects.toBeInstanceOf(LLMModelError);
  });

  it('maps other failures to LLMResponseError with the status', async () => {
    const provider = new OllamaProvider({
      baseUrl: 'http://localhost:11434',
      fetchImpl: respondWith('internal error', 500),
    });

    await expect(provider.complete(input)).rejects.toMatchObject({
      code: 'llm.response_error',
      status: 500,
      snippet: 'internal error',
    });
  });

  it('rejects payloads without text', async () => {
    const provider = new OllamaProvider({
      baseUrl: 'http://localhost:11434',
      fetchImpl: respondWith(JSON.stringify({ done: true })),
    });

    await expect(provider.complete(input)).rejects.toBeInstanceOf(LLMResponseError);
  });

  it('wraps network failures in LLMConnectionError', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });
    const provider = new OllamaProvider({ baseUrl: 'http://localhost:11434', fetchImpl });

    await expect(provider.complete(input)).rejects.toBeInstanceOf(LLMConnectionError);
  });
});

describe('OpenAICompletionProvider', () => {
  it('calls the completions endpoint with credentials and returns the first choice', async () => {
    const fetchImpl = respondWith(JSON.stringify({ choices: [{ text: ' Summary text', index: 0 }] }));
    const provider = new OpenAICompletionProvider({
      baseUrl: 'https://api.openai.com',
      apiKey: 'test-key',
      organization: 'test-org',
      fetchImpl,
    });

    await expect(provider.complete(input)).resolves.toEqual({ text: ' Summary text' });

    const [url, init] = fetchImpl.mock.calls[0];
    const headers = new Headers(init?.headers);
    expect(url).toBe('https://api.openai.com/v1/completions');
    expect(headers.get('Authorization')).toBe('Bearer test-key');
    expect(headers.get('OpenAI-Organization')).toBe('test-org');
    expect(readJsonBody(init)).toEqual({
      model: 'test-model',
      prompt: input.prompt,
      temperature: 0.9,
      max_tokens: 256,
    });
  });

  it('omits the organization header when none is configured', async () => {
    const fetchImpl = respondWith(JSON.stringify({ choices: [{ text: 'ok' }] }));
    const provider = new OpenAICompletionProvider({ baseUrl: 'https://api.openai.com', apiKey: 'test-key', fetchImpl });

    await provider.complete(input);

    const [, init] = fetchImpl.mock.calls[0];
    expect(new Headers(init?.headers).has('OpenAI-Organization')).toBe(false);
  });

  it('rejects responses without choices', async () => {
    const provider = new OpenAICompletionProvider({
      baseUrl: 'https://api.openai.com',
      apiKey: 'test-key',
      fetchImpl: respondWith(JSON.stringify({ choices: [] })),
    });

    await expect(provider.complete(input)).rejects.toBeInstanceOf(LLMResponseError);
  });
});

describe('createCompletionProvider', () => {
  it('selects the provider named in configuration', () => {
    expect(createCompletionProvider(parseConfig({}))).toBeInstanceOf(OllamaProvider);
    expect(
      createCompletionProvider(parseConfig({ LLM_PROVIDER: 'openai', OPENAI_API_KEY: 'test-key' }))
    ).toBeInstanceOf(OpenAICompletionProvider);
  });
});
