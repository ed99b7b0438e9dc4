import { z } from 'zod';

export const configKeys = {
  PORT: 'PORT',
  LOG_LEVEL: 'LOG_LEVEL',
  LLM_PROVIDER: 'LLM_PROVIDER',
  OLLAMA_BASE_URL: 'OLLAMA_BASE_URL',
  OPENAI_BASE_URL: 'OPENAI_BASE_URL',
  OPENAI_API_KEY: 'OPENAI_API_KEY',
  OPENAI_ORG_ID: 'OPENAI_ORG_ID',
  LLM_MODEL: 'LLM_MODEL',
  LLM_TEMPERATURE: 'LLM_TEMPERATURE',
  QUERY_TEXT: 'QUERY_TEXT',
  CHUNK_TOKEN_LENGTH: 'CHUNK_TOKEN_LENGTH',
  NUMBER_OF_SUMMARIES: 'NUMBER_OF_SUMMARIES',
  MAX_TOKEN_LENGTH: 'MAX_TOKEN_LENGTH',
  OUTPUT_DIR: 'OUTPUT_DIR',
  FETCH_TIMEOUT_MS: 'FETCH_TIMEOUT_MS',
  REDDIT_USER_AGENT: 'REDDIT_USER_AGENT'
} as const;

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
const llmProviders = ['ollama', 'openai'] as const;

export const DEFAULT_QUERY_TEXT =
  'Edit the article to include relevant information from the comments, revise and enhance the content, ' +
  'and make it engaging and easy to understand. Avoid including code or commands, and present facts ' +
  'objectively and clearly.';

const trimToUndefined = (value: unknown) => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const positiveInt = () => z.coerce.number().int().positive('must be a positive integer');

export const configSchema = z
  .object({
    [configKeys.PORT]: z
      .coerce.number()
      .int()
      .min(1, 'must be between 1 and 65535')
      .max(65535, 'must be between 1 and 65535')
      .default(3000),
    [configKeys.LOG_LEVEL]: z.enum(logLevels).default('info'),
    [configKeys.LLM_PROVIDER]: z
      .preprocess(
        (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
        z.enum(llmProviders)
      )
      .default('ollama'),
    [configKeys.OLLAMA_BASE_URL]: z.string().trim().url().default('http://localhost:11434'),
    [configKeys.OPENAI_BASE_URL]: z.string().trim().url().default('https://api.openai.com'),
    [configKeys.OPENAI_API_KEY]: z
      .preprocess(trimToUndefined, z.string().trim().min(1))
      .optional(),
    [configKeys.OPENAI_ORG_ID]: z
      .preprocess(trimToUndefined, z.string().trim().min(1))
      .optional(),
    [configKeys.LLM_MODEL]: z.string().trim().min(1).default('llama3.1:8b'),
    [configKeys.LLM_TEMPERATURE]: z
      .coerce.number()
      .min(0, 'must be between 0 and 2')
      .max(2, 'must be between 0 and 2')
      .default(0.9),
    [configKeys.QUERY_TEXT]: z.string().trim().min(1).default(DEFAULT_QUERY_TEXT),
    [configKeys.CHUNK_TOKEN_LENGTH]: positiveInt().default(2500),
    [configKeys.NUMBER_OF_SUMMARIES]: positiveInt().max(10, 'must be at most 10').default(1),
    [configKeys.MAX_TOKEN_LENGTH]: positiveInt().default(4000),
    [configKeys.OUTPUT_DIR]: z.string().trim().min(1).default('outputs'),
    [configKeys.FETCH_TIMEOUT_MS]: positiveInt().default(10_000),
    [configKeys.REDDIT_USER_AGENT]: z.string().trim().min(1).default('Mozilla/5.0')
  })
  .superRefine((value, ctx) => {
    if (value.LLM_PROVIDER === 'openai' && !value.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [configKeys.OPENAI_API_KEY],
        message: 'is required when LLM_PROVIDER is openai'
      });
    }
  });

export type Config = z.infer<typeof configSchema>;
