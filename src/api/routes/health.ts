import type { FastifyPluginAsync } from 'fastify';
import type { DigestStore } from '../../storage/index.js';

export const healthRoutes: FastifyPluginAsync<{ store: DigestStore }> = async (app, opts) => {
  app.get('/health', async () => {
    const storeUp = await opts.store.ping().catch(() => false);
    return {
      status: storeUp ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      services: {
        store: storeUp ? 'up' : 'down',
      },
    };
  });
};
