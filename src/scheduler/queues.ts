import { Queue } from 'bullmq';
import { config } from '../config.js';
import { QUEUE_NAMES, type WatchJobData } from './constants.js';

const connection = { host: config.REDIS_HOST, port: config.REDIS_PORT };

export const watchQueue = new Queue<WatchJobData>(QUEUE_NAMES.WATCH, {
  connection,
  defaultJobOptions: {
    attempts: 3,
    backoff: { type: 'exponential', delay: 5000 },
    removeOnComplete: { count: 1000 },
    removeOnFail: { count: 5000 },
  },
});
