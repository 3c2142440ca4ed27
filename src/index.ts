import { loadEnv } from './config/env.js';
import { createLogger } from './lib/logger.js';
import { createDb, closeDb } from './db/connection.js';
import { dbUserSource } from './db/user-repository.js';
import { createTelegramClient } from './api/telegram-client.js';
import { createMarketplaceClient } from './api/marketplace-client.js';
import { createGeocoder } from './api/geocoder.js';
import { CatalogProductChecker } from './classify/product-checker.js';
import { startHealthServer, stopHealthServer } from './health/server.js';
import { createScheduler } from './scheduler/index.js';

async function main() {
  // 1. Load and validate environment
  const env = loadEnv();

  // 2. Initialize logger
  const logger = createLogger();
  logger.info({ marketplace: env.MARKETPLACE_BASE_URL }, 'Marketplace watch worker starting');

  // 3. Initialize database connection
  createDb();
  logger.info('Database connection initialized');

  // 4. Wire collaborators and the monitor scheduler
  const scheduler = createScheduler({
    users: dbUserSource,
    messenger: createTelegramClient(),
    source: createMarketplaceClient(),
    geocoder: createGeocoder(),
    checker: new CatalogProductChecker(),
    debugDumpDir: env.DEBUG_DUMP_DIR,
  });

  // 5. Start health check server
  await startHealthServer(env.WORKER_HEALTH_PORT, scheduler);
  logger.info({ port: env.WORKER_HEALTH_PORT }, 'Health check server started');

  // 6. Start monitoring
  await scheduler.start();
  logger.info('Monitor scheduler started');

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutdown signal received');

    try {
      await scheduler.stop();
      logger.info('Scheduler stopped');

      await stopHealthServer();
      logger.info('Health server stopped');

      await closeDb();
      logger.info('Database connections closed');

      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });

  process.on('uncaughtException', (err) => {
    logger.fatal({ err }, 'Uncaught exception, shutting down');
    void shutdown('uncaughtException');
  });
}

main().catch((err) => {
  console.error('Fatal startup error:', err);
  process.exit(1);
});
