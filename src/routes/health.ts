import type { FastifyPluginAsync } from 'fastify';
import type { Config } from '../config/schema.js';

type HealthRouteOptions = {
  config: Config;
};

const healthRoute: FastifyPluginAsync<HealthRouteOptions> = async (server, options) => {
  server.get('/health', async () => ({
    ok: true,
    uptimeSeconds: Math.floor(process.uptime()),
    provider: options.config.LLM_PROVIDER,
    model: options.config.LLM_MODEL
  }));
};

export default healthRoute;
