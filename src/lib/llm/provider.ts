import { OllamaProvider } from './providers/ollama.js';
import { OpenAICompletionProvider } from './providers/openai.js';
import type { CompletionInput, CompletionOutput } from './types.js';
import type { Config } from '../../config/schema.js';

export interface CompletionProvider {
  complete(input: CompletionInput): Promise<CompletionOutput>;
}

export const createCompletionProvider = (config: Config): CompletionProvider => {
  if (config.LLM_PROVIDER === 'ollama') {
    return new OllamaProvider({ baseUrl: config.OLLAMA_BASE_URL });
  }

  if (config.LLM_PROVIDER === 'openai' && config.OPENAI_API_KEY) {
    return new OpenAICompletionProvider({
      baseUrl: config.OPENAI_BASE_URL,
      apiKey: config.OPENAI_API_KEY,
      organization: config.OPENAI_ORG_ID,
    });
  }

  throw new Error(`Unsupported LLM provider: ${config.LLM_PROVIDER}`);
};
