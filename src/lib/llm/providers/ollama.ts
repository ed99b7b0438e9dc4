import { LLMResponseError } from '../errors.js';
import type { CompletionProvider } from '../provider.js';
import type { CompletionInput, CompletionOutput } from '../types.js';
import { DEFAULT_TIMEOUT_MS, isRecord, postCompletion } from './http.js';

type OllamaProviderOptions = {
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

export class OllamaProvider implements CompletionProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OllamaProviderOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  public async complete(input: CompletionInput): Promise<CompletionOutput> {
    const { status, snippet, payload } = await postCompletion({
      baseUrl: this.baseUrl,
      path: '/api/generate',
      model: input.model,
      // raw mode sends the prompt verbatim, without the model's chat template
      body: {
        model: input.model,
        prompt: input.prompt,
        raw: true,
        stream: false,
        options: {
          temperature: input.temperature,
          num_predict: input.maxTokens,
        },
      },
      timeoutMs: this.timeoutMs,
      fetchImpl: this.fetchImpl,
    });

    const text = this.extractText(payload);

    if (text === undefined) {
      throw new LLMResponseError(status, snippet);
    }

    return { text };
  }

  private extractText(payload: unknown): string | undefined {
    if (!isRecord(payload)) {
      return undefined;
    }

    // /api/generate: { response: "...", done: true, ... }
    if (typeof payload.response === 'string') {
      return payload.response;
    }

    // /api/chat shape, should a proxy rewrite the request
    const message = payload.message;
    if (isRecord(message) && typeof message.content === 'string') {
      return message.content;
    }

    return undefined;
  }
}
