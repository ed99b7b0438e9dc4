import Fastify, { type FastifyInstance } from 'fastify';
import type { Config } from './config/schema.js';
import { createCompletionProvider, type CompletionProvider } from './lib/llm/provider.js';
import { defaultThreadClient, type ThreadClient } from './lib/reddit/client.js';
import healthRoute from './routes/health.js';
import summarizeRoute from './routes/summarize.js';

type ServerDependencies = {
  threadClient?: ThreadClient;
  llmProviderFactory?: (config: Config) => CompletionProvider;
};

export const buildServer = (config: Config, dependencies: ServerDependencies = {}): FastifyInstance => {
  const fastify = Fastify({
    logger: {
      level: config.LOG_LEVEL
    }
  });

  fastify.addHook('onRequest', (request, reply, done) => {
    const requestId = request.id ? String(request.id) : undefined;
    if (requestId) {
      reply.header('x-request-id', requestId);
      request.log = request.log.child({ requestId });
    }
    done();
  });

  const threadClient = dependencies.threadClient ?? defaultThreadClient;
  const llmProviderFactory = dependencies.llmProviderFactory ?? createCompletionProvider;

  fastify.log.info(
    { provider: config.LLM_PROVIDER, model: config.LLM_MODEL, outputDir: config.OUTPUT_DIR },
    'Summarizer configured'
  );

  fastify.register(healthRoute, { config });
  fastify.register(summarizeRoute, {
    config,
    threadClient,
    llmProviderFactory
  });

  return fastify;
};

export default buildServer;
