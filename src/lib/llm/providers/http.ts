import { LLMConnectionError, LLMModelError, LLMResponseError } from '../errors.js';

export const DEFAULT_TIMEOUT_MS = 120_000;

export type PostCompletionOptions = {
  baseUrl: string;
  path: string;
  model: string;
  body: Record<string, unknown>;
  headers?: Record<string, string>;
  timeoutMs: number;
  fetchImpl: typeof fetch;
};

export type CompletionResponse = {
  status: number;
  snippet: string;
  payload: unknown;
};

export const createSnippet = (value: string): string => {
  const cleaned = value.replace(/\s+/g, ' ').trim();
  if (!cleaned) return '<empty response>';
  return cleaned.length <= 200 ? cleaned : `${cleaned.slice(0, 197)}...`;
};

/**
 * Non-streaming providers should answer with a single JSON object.
 * If NDJSON slips through anyway, the last non-empty line is used.
 */
export const safeParseJson = (raw: string, status: number, snippet: string): unknown => {
  const trimmed = raw.trim();
  if (!trimmed) {
    return undefined;
  }

  try {
    return JSON.parse(trimmed);
  } catch (error) {
    const lines = trimmed
      .split(/\r?\n/)
      .map((l) => l.trim())
      .filter(Boolean);

    if (lines.length > 1) {
      try {
        return JSON.parse(lines[lines.length - 1]);
      } catch {
        // reported below with the original parse error
      }
    }

    throw new LLMResponseError(status, snippet, error instanceof Error ? error : undefined);
  }
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const postCompletion = async (options: PostCompletionOptions): Promise<CompletionResponse> => {
  const endpoint = new URL(options.path, options.baseUrl);
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await options.fetchImpl(endpoint.toString(), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...options.headers },
      body: JSON.stringify(options.body),
      signal: controller.signal,
    });

    const rawResponse = await response.text();
    const snippet = createSnippet(rawResponse);

    if (!response.ok) {
      // 404 is either an unknown model or a wrong base URL
      if (response.status === 404) {
        throw new LLMModelError(response.status, options.model, snippet);
      }
      throw new LLMResponseError(response.status, snippet);
    }

    return {
      status: response.status,
      snippet,
      payload: safeParseJson(rawResponse, response.status, snippet),
    };
  } catch (error) {
    if (error instanceof LLMModelError || error instanceof LLMResponseError) {
      throw error;
    }

    throw new LLMConnectionError(options.baseUrl, error instanceof Error ? error : undefined);
  } finally {
    clearTimeout(timeoutId);
  }
};
