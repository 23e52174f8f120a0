import { createApp } from './app.js';
import { config, usesPostgres } from './config.js';
import { verifyDbConnection } from './db.js';
import { logger } from './logger.js';
import { runMigrations } from './migrations.js';
import { createRouteProcessor } from './routeProcessor.js';
import { getStationRepository } from './stations/repository.js';

const PORT = config.port;

// Initialize database schema (when a Postgres driver is configured) and start server
async function start() {
  try {
    if (usesPostgres()) {
      await verifyDbConnection();
      logger.info('Database connected');
      await runMigrations();
    }

    const stations = getStationRepository();
    const app = createApp({ processor: createRouteProcessor(), stations });

    // Reload the station catalogue without a restart
    process.on('SIGHUP', () => {
      stations.invalidate();
    });

    app.listen(PORT, () => {
      logger.info(
        { port: PORT, stations: config.stations.source, cache: config.cache.driver },
        `Server running on http://localhost:${PORT}`,
      );
    });
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

void start();
