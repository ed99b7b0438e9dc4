import type { FastifyBaseLogger } from 'fastify';
import type { Config } from '../../config/schema.js';
import { chunkComments } from '../budget/chunking.js';
import { countTokens, estimateWordCount } from '../budget/tokenEstimate.js';
import type { CompletionProvider } from '../llm/provider.js';
import type { ThreadClient } from '../reddit/client.js';
import { collectComments } from '../reddit/flatten.js';
import { extractMetadata } from '../reddit/metadata.js';
import { summarizeChunks } from './driver.js';
import type { ChunkGroup, SummaryResult, SummarySettings } from './types.js';

export type RunLogger = Pick<FastifyBaseLogger, 'info' | 'debug'>;

export type RunSummaryParams = {
  config: Config;
  threadClient: ThreadClient;
  llmProvider: CompletionProvider;
  /** Thread JSON URL, already converted from the permalink. */
  url: string;
  settings?: Partial<SummarySettings>;
  logger?: RunLogger;
};

export const resolveSettings = (config: Config, overrides: Partial<SummarySettings> = {}): SummarySettings => ({
  queryText: overrides.queryText ?? config.QUERY_TEXT,
  chunkTokenLength: overrides.chunkTokenLength ?? config.CHUNK_TOKEN_LENGTH,
  numberOfSummaries: overrides.numberOfSummaries ?? config.NUMBER_OF_SUMMARIES,
  maxTokenLength: overrides.maxTokenLength ?? config.MAX_TOKEN_LENGTH,
  model: overrides.model ?? config.LLM_MODEL
});

export const runSummary = async (params: RunSummaryParams): Promise<SummaryResult> => {
  const { config, threadClient, llmProvider, url, logger } = params;
  const settings = resolveSettings(config, params.settings);

  const payload = await threadClient.fetchThread(url, {
    userAgent: config.REDDIT_USER_AGENT,
    timeoutMs: config.FETCH_TIMEOUT_MS
  });
  logger?.debug({ url }, 'Fetched thread JSON');

  const { title, selftext } = extractMetadata(payload);
  const comments = collectComments(payload);
  const chunks = chunkComments(comments, settings.chunkTokenLength);

  const groups: ChunkGroup[] = chunks.map((text, index) => ({
    index,
    tokens: countTokens(text),
    text
  }));
  const totalTokens = groups.reduce((sum, group) => sum + group.tokens, 0);

  logger?.info(
    {
      title,
      commentCount: comments.length,
      chunkCount: chunks.length,
      totalTokens,
      estimatedWords: estimateWordCount(totalTokens)
    },
    'Thread chunked'
  );

  const { transcript, passes } = await summarizeChunks({
    title,
    selftext,
    chunks,
    instruction: settings.queryText,
    maxNumberOfPasses: settings.numberOfSummaries,
    maxTotalTokens: settings.maxTokenLength,
    temperature: config.LLM_TEMPERATURE,
    model: settings.model,
    provider: llmProvider,
    onPass: (pass) => {
      logger?.info(
        {
          pass: pass.index,
          promptTokens: pass.promptTokens,
          maxCompletionTokens: pass.maxCompletionTokens
        },
        'Summary pass complete'
      );
    }
  });

  return {
    title,
    selftext,
    commentCount: comments.length,
    groups,
    passes,
    output: transcript
  };
};
