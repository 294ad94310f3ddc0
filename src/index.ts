import { createServer } from './api/server.js';
import { startScheduler } from './scheduler/index.js';
import { watchQueue } from './scheduler/queues.js';
import { createWatchWorker } from './workers/watch-worker.js';
import { StatsApiClient } from './feed/statsapi-client.js';
import { GameWatcher } from './watcher/game-watcher.js';
import { RedisFireRegistry } from './notifications/fire-registry.js';
import { createNotifier } from './notifications/notifier.js';
import { digestOptionsFromConfig, runDigest } from './pipeline/digest.js';
import { createDigestStore } from './storage/index.js';
import { redis } from './db/redis.js';
import { config } from './config.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  logger.info({ teams: config.TEAM_IDS, outputMode: config.OUTPUT_MODE }, 'Starting game-digest...');

  const store = await createDigestStore(config);
  const notifier = createNotifier(config);
  const feed = new StatsApiClient();
  const options = digestOptionsFromConfig(config);

  const watcher = new GameWatcher({
    feed,
    registry: new RedisFireRegistry(redis),
    notifier,
    onFinal: async (liveFeed, target) => {
      await runDigest(liveFeed, target.teamId, { feed, store, notifier, options });
    },
  });

  // Start scheduler (registers cron jobs)
  await startScheduler();

  const watchWorker = createWatchWorker({ watcher, feed, queue: watchQueue, notifier });
  logger.info('Worker started: watch-worker');

  // Start API server
  const server = await createServer({ store });
  await server.listen({ port: config.PORT, host: '0.0.0.0' });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await server.close();
    await watchWorker.close();
    await watchQueue.close();
    await redis.quit();
    await store.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
  logger.fatal(err, 'Failed to start');
  process.exit(1);
});
