export { default as campusPlugin } from './campus-plugin.js';
export type { CampusPluginOptions } from './campus-plugin.js';
export { loadConfig, ConfigError } from './config.js';
export type { AppConfig, StoreConfig, LogLevel } from './config.js';
export { createLogger } from './logger.js';
export { createCampusStore } from './store-factory.js';
export { InMemoryCampusStore } from './store/index.js';
export { PostgresCampusStore, createDbClient, ensureSchema } from './db/index.js';
export type { Database } from './db/index.js';
