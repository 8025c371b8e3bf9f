import Fastify from 'fastify';
import type { FastifyInstance, FastifyBaseLogger } from 'fastify';
import type { CampusSystem } from './application/index.js';
import { campusPlugin } from './infrastructure/index.js';
import {
  errorHandler,
  eventRoutes,
  studentRoutes,
  requestRoutes,
  systemRoutes,
} from './interfaces/http/index.js';

export interface BuildAppOptions {
  system: CampusSystem;
  /** Shared with the campus system; any pino logger fits. */
  logger: FastifyBaseLogger;
}

/**
 * Assembles the Fastify app around an already-built campus system.
 *
 * Order:
 * 1) Error handler
 * 2) Campus plugin (decorates `fastify.campus`)
 * 3) HTTP routes
 *
 * Does not listen; `index.ts` does that, tests use `inject()`.
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    loggerInstance: options.logger,
  });

  await fastify.register(errorHandler);
  await fastify.register(campusPlugin, { system: options.system });

  await fastify.register(eventRoutes);
  await fastify.register(studentRoutes);
  await fastify.register(requestRoutes);
  await fastify.register(systemRoutes);

  return fastify;
}
