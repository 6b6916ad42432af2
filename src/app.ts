import Fastify, { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { SERVICE_NAME } from './logger';
import authPlugin from './plugins/auth';
import { runsRoutes } from './routes/runs';
import type { RunStore } from './run-store';
import type { CleanupRunner } from './runner';

export interface AppDeps {
  logger: Logger;
  runner: CleanupRunner;
  store: RunStore;
  /** The /runs routes are only registered when an API key is configured. */
  apiKey: string | null;
}

export async function buildApp({ logger, runner, store, apiKey }: AppDeps): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = logger;
  const server = Fastify({ loggerInstance });

  // Health check: unauthenticated
  server.get('/health', async (_request, reply) => {
    return reply.status(200).send({ status: 'ok', service: SERVICE_NAME, running: runner.running });
  });

  if (apiKey) {
    await server.register(authPlugin, { apiKey });
    await server.register(runsRoutes, { prefix: '/runs', runner, store });
  } else {
    server.log.info('API_KEY not set; on-demand /runs routes are disabled');
  }

  return server;
}
