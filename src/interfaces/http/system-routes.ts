import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { loadSeedDataset, seedDataset } from '../../application/index.js';

/**
 * Operational routes.
 *
 * GET  /api/v1/health     - liveness and active store backend
 * POST /api/v1/mock/seed  - load the bundled sample dataset (idempotent)
 */
async function systemRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({ status: 'ok', store: fastify.campus.backend });
    },
  );

  /**
   * Seeds, then returns what was inserted alongside the resulting
   * reports so the outcome can be checked in one call.
   */
  fastify.post(
    '/api/v1/mock/seed',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const inserted = await seedDataset(fastify.campus, loadSeedDataset());
      fastify.log.info({ inserted }, 'Seed dataset loaded');

      const [events, conflicts, requests] = await Promise.all([
        fastify.campus.allEventSummaries(),
        fastify.campus.conflictReport(),
        fastify.campus.serviceRequestReport(),
      ]);

      return reply.status(200).send({ inserted, events, conflicts, requests });
    },
  );
}

export default fp(systemRoutes, {
  name: 'system-routes',
  dependencies: ['campus'],
  fastify: '5.x',
});
