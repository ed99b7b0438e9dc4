import { config } from './config/index.js';
import buildServer from './server.js';

const server = buildServer(config);

const listenOn = async (host: string): Promise<void> => {
  await server.listen({ port: config.PORT, host });
  server.log.info({ host, port: config.PORT }, 'Summarizer listening');
};

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  server.log.info({ signal }, 'Shutting down');
  await server.close();
  process.exit(0);
};

const start = async () => {
  try {
    await listenOn('0.0.0.0');
  } catch (error) {
    const err = error instanceof Error ? error : new Error('Unknown error');

    if (!('code' in err) || err.code !== 'EPERM') {
      server.log.error(err, 'Failed to start server');
      process.exit(1);
    }

    server.log.warn({ err }, 'Unable to bind to 0.0.0.0, falling back to localhost');

    try {
      await listenOn('127.0.0.1');
    } catch (fallbackError) {
      server.log.error({ err: fallbackError }, 'Failed to start server');
      process.exit(1);
    }
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void shutdown(signal);
    });
  }
};

void start();
