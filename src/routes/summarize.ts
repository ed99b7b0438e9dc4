import type { FastifyPluginAsync } from 'fastify';
import type { Config } from '../config/schema.js';
import { PromptTooLargeError } from '../lib/budget/errors.js';
import {
  LLMConnectionError,
  LLMModelError,
  LLMResponseError
} from '../lib/llm/errors.js';
import type { CompletionProvider } from '../lib/llm/provider.js';
import { saveOutput } from '../lib/output/writer.js';
import { isValidRedditUrl, toThreadJsonUrl, type ThreadClient } from '../lib/reddit/client.js';
import { FetchError, MissingFieldError } from '../lib/reddit/errors.js';
import { sendError } from '../lib/routes/errorHelpers.js';
import { mapSummaryErrorToResponse } from '../lib/routes/summaryErrorMap.js';
import { runSummary } from '../lib/summarize/runner.js';
import type { SummaryResult, SummarySettings } from '../lib/summarize/types.js';

const summarizeSchema = {
  body: {
    type: 'object',
    properties: {
      url: { type: 'string', minLength: 1 },
      queryText: { type: 'string', minLength: 1 },
      chunkTokenLength: { type: 'integer', minimum: 1 },
      numberOfSummaries: { type: 'integer', minimum: 1, maximum: 10 },
      maxTokenLength: { type: 'integer', minimum: 1 },
      model: { type: 'string', minLength: 1 }
    },
    required: ['url'],
    additionalProperties: false
  },
  querystring: {
    type: 'object',
    properties: {
      format: { type: 'string', enum: ['json', 'text'] }
    },
    additionalProperties: false
  }
};

type SummarizeRouteOptions = {
  config: Config;
  threadClient: ThreadClient;
  llmProviderFactory: (config: Config) => CompletionProvider;
};

type SummarizeRequestBody = Partial<SummarySettings> & {
  url: string;
};

type SummarizeQuery = {
  format?: 'json' | 'text';
};

const summarizeRoute: FastifyPluginAsync<SummarizeRouteOptions> = async (fastify, options) => {
  fastify.post<{ Body: SummarizeRequestBody; Querystring: SummarizeQuery }>(
    '/summarize',
    { schema: summarizeSchema },
    async (request, reply) => {
      const { url, ...settings } = request.body;
      const { format } = request.query;
      const trimmedUrl = url.trim();
      const rawAccept = request.headers.accept;
      const wantsText =
        format === 'text' || (typeof rawAccept === 'string' && rawAccept.toLowerCase().includes('text/plain'));

      if (!isValidRedditUrl(trimmedUrl)) {
        return sendError(reply, {
          status: 400,
          code: 'INVALID_URL',
          message: 'Invalid URL, expected a Reddit thread link (/r/<sub>/comments/<id>)'
        });
      }

      const threadUrl = toThreadJsonUrl(trimmedUrl);
      const llmProvider = options.llmProviderFactory(options.config);
      const startTime = Date.now();

      let result: SummaryResult;

      try {
        result = await runSummary({
          config: options.config,
          threadClient: options.threadClient,
          llmProvider,
          url: threadUrl,
          settings,
          logger: request.log
        });
      } catch (error) {
        if (error instanceof FetchError) {
          request.log.warn({ error, url: threadUrl }, 'Unable to fetch thread JSON');
        } else if (error instanceof MissingFieldError) {
          request.log.warn({ error, url: threadUrl }, 'Thread JSON missing expected fields');
        } else if (error instanceof PromptTooLargeError) {
          request.log.warn({ error, url: threadUrl }, 'Prompt exceeds the token ceiling');
        } else if (error instanceof LLMConnectionError || error instanceof LLMModelError) {
          request.log.error({ error, url: threadUrl }, 'LLM provider unavailable');
        } else if (error instanceof LLMResponseError) {
          request.log.warn({ error, url: threadUrl }, 'LLM provider returned an invalid response');
        } else {
          request.log.error({ error, url: threadUrl }, 'Unexpected error during summarization');
        }

        return sendError(reply, mapSummaryErrorToResponse(error));
      }

      let outputPath: string | null = null;

      if (result.output) {
        try {
          outputPath = await saveOutput(result.title, result.output, { outputDir: options.config.OUTPUT_DIR });
        } catch (error) {
          request.log.error({ error, url: threadUrl }, 'Failed to save summary transcript');
          return sendError(reply, {
            status: 500,
            code: 'OUTPUT_WRITE_FAILED',
            message: 'Unable to save the summary transcript'
          });
        }
      }

      request.log.info(
        {
          url: threadUrl,
          chunkCount: result.groups.length,
          passCount: result.passes.length,
          outputPath,
          durationMs: Date.now() - startTime
        },
        'Thread summary complete'
      );

      if (wantsText) {
        reply.type('text/plain; charset=utf-8').send(result.output);
        return reply;
      }

      return reply.send({
        title: result.title,
        selftext: result.selftext,
        commentCount: result.commentCount,
        groups: result.groups,
        passes: result.passes.map((pass) => ({
          index: pass.index,
          promptTokens: pass.promptTokens,
          prompt: pass.prompt,
          completion: pass.completion
        })),
        output: result.output,
        outputPath
      });
    }
  );
};

export default summarizeRoute;
