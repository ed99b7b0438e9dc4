import { LLMResponseError } from '../errors.js';
import type { CompletionProvider } from '../provider.js';
import type { CompletionInput, CompletionOutput } from '../types.js';
import { DEFAULT_TIMEOUT_MS, isRecord, postCompletion } from './http.js';

type OpenAICompletionProviderOptions = {
  baseUrl: string;
  apiKey: string;
  organization?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

/** Legacy text completions endpoint (`/v1/completions`), prompt in, text out. */
export class OpenAICompletionProvider implements CompletionProvider {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAICompletionProviderOptions) {
    this.baseUrl = options.baseUrl;
    this.headers = { Authorization: `Bearer ${options.apiKey}` };
    if (options.organization) {
      this.headers['OpenAI-Organization'] = options.organization;
    }
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  public async complete(input: CompletionInput): Promise<CompletionOutput> {
    const { status, snippet, payload } = await postCompletion({
      baseUrl: this.baseUrl,
      path: '/v1/completions',
      model: input.model,
      headers: this.headers,
      body: {
        model: input.model,
        prompt: input.prompt,
        temperature: input.temperature,
        max_tokens: input.maxTokens,
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
    if (!isRecord(payload) || !Array.isArray(payload.choices)) {
      return undefined;
    }

    const [first] = payload.choices;
    if (isRecord(first) && typeof first.text === 'string') {
      return first.text;
    }

    return undefined;
  }
}
