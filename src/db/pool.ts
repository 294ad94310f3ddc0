import postgres from 'postgres';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';

export const sql = postgres(config.DATABASE_URL, {
  max: 5,
  idle_timeout: 20,
  connect_timeout: 10,
  onnotice: (notice) => logger.debug({ notice: notice.message }, 'Postgres notice'),
});
