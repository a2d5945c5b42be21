import { config } from './config.js';
import { createApp } from './app.js';
import { logger } from './middleware/requestLogger.js';
import { closeDatabase, initializeDatabase } from './services/database.js';
import { PgStore } from './services/pgStore.js';
import { seedOwner } from './services/seedOwner.js';

/** Connects to the database, seeds the owner account and starts listening */
async function startServer(): Promise<void> {
  const pool = await initializeDatabase();
  logger.info('Database connected and schema ensured');

  const store = new PgStore(pool);
  await seedOwner(store);

  const app = createApp(store);
  const server = app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port} in ${config.nodeEnv} mode`);
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      closeDatabase()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ error }, 'Failed to close database pool');
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer().catch((error) => {
  logger.fatal({ error }, 'Fatal error during server startup');
  process.exit(1);
});
