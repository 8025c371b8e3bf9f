import { CampusSystem, loadSeedDataset, seedDataset } from './application/index.js';
import { createCampusStore, createLogger, loadConfig } from './infrastructure/index.js';
import { buildApp } from './app.js';

/**
 * Bootstrap.
 *
 * Order:
 * 1) Config + logger
 * 2) Store (backend chosen by config) and the one CampusSystem
 * 3) Optional seed
 * 4) Fastify app, shutdown hooks, listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger(config.logLevel);

  const store = await createCampusStore(config.store, log);
  const system = new CampusSystem({ store, log });

  if (config.seedOnStart) {
    const inserted = await seedDataset(system, loadSeedDataset());
    log.info({ inserted }, 'Seed dataset loaded');
  }

  const fastify = await buildApp({ system, logger: log });

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
