import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from './config.js';

/**
 * Root pino logger, shared by Fastify (as its logger instance) and
 * the campus system.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({
    name: 'campus-events',
    level,
  });
}
