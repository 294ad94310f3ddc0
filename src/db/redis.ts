import { Redis } from 'ioredis';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';

function createRedis(): Redis {
  if (config.REDIS_URL) {
    // Hosted Redis: the URL carries auth and TLS
    return new Redis(config.REDIS_URL, {
      maxRetriesPerRequest: null,
      lazyConnect: true,
    });
  }

  return new Redis({
    host: config.REDIS_HOST,
    port: config.REDIS_PORT,
    maxRetriesPerRequest: null,
    lazyConnect: true,
  });
}

export const redis = createRedis();

redis.connect().catch((err: unknown) => {
  // ioredis keeps retrying in the background
  logger.warn({ err }, 'Initial Redis connection failed');
});
