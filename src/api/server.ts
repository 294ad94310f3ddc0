import Fastify from 'fastify';
import { config } from '../config.js';
import type { DigestStore } from '../storage/index.js';
import { healthRoutes } from './routes/health.js';
import { digestsRoutes } from './routes/digests.js';

export interface ServerOptions {
  store: DigestStore;
  /** Request logging; tests turn it off */
  logger?: boolean;
}

export async function createServer({ store, logger = true }: ServerOptions) {
  const app = Fastify({
    logger: logger
      ? {
          level: config.LOG_LEVEL,
          ...(config.NODE_ENV === 'development'
            ? { transport: { target: 'pino-pretty', options: { colorize: true } } }
            : {}),
        }
      : false,
  });

  await app.register(healthRoutes, { store });
  await app.register(digestsRoutes, { prefix: '/digests', store });

  return app;
}
