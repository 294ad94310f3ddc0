import { sql } from '../src/db/pool.js';
import { runMigrations } from '../migrations/runner.js';
import { logger } from '../src/utils/logger.js';

logger.info('Running migrations...');
try {
  await runMigrations(sql);
} finally {
  await sql.end();
}
