import App from './app';
import { config } from './config';
import { bootstrapEngine } from './engine';
import { PgStore } from './models/pg.store';
import { createDemoStore } from './models/seed';
import { EngineStore } from './models/store';
import { logger } from './utils/logger';

async function createStore(): Promise<EngineStore> {
  if (config.database.url) {
    logger.info('Using PostgreSQL store');
    return PgStore.connect(config.database.url);
  }
  logger.warn('DATABASE_URL not set - using the in-process store with demo data');
  return createDemoStore();
}

async function main(): Promise<void> {
  const store = await createStore();
  const engine = await bootstrapEngine(store);
  logger.info({ engineConfig: engine.config }, 'Engine configuration resolved');

  const app = new App(engine);
  app.listen();

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    Promise.resolve(store.close?.())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Failed to close store');
        process.exit(1);
      });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Failed to start server');
  process.exit(1);
});
