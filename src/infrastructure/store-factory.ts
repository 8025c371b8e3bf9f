import type { BaseLogger } from 'pino';
import type { CampusStore } from '../application/campus-store.js';
import type { StoreConfig } from './config.js';
import { createDbClient, ensureSchema, PostgresCampusStore } from './db/index.js';
import { InMemoryCampusStore } from './store/index.js';

/**
 * Builds the store named by configuration.
 *
 * For Postgres the tables are created before the store is returned.
 */
export async function createCampusStore(config: StoreConfig, log: BaseLogger): Promise<CampusStore> {
  if (config.backend === 'postgres') {
    const client = createDbClient(config.databaseUrl, log);
    await ensureSchema(client.sql, log);
    log.info('Postgres campus store ready');
    return new PostgresCampusStore(client);
  }

  log.info('In-memory campus store ready');
  return new InMemoryCampusStore();
}
