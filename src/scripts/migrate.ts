import { pool } from '../db.js';
import { logger } from '../logger.js';
import { runMigrations } from '../migrations.js';

async function main() {
  await runMigrations();
}

main()
  .then(() => {
    logger.info('Migration run finished');
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, 'Migration run failed');
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
