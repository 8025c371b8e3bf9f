import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { eventInputSchema } from '../../application/index.js';

/**
 * Event registry routes.
 *
 * GET  /api/v1/events                    - all events, insertion order
 * POST /api/v1/events                    - add event (conflicts decided here)
 * GET  /api/v1/events/summary            - summaries for every event
 * GET  /api/v1/events/:event_id/summary  - one event with live seat counts
 * GET  /api/v1/conflicts                 - invalid events and their violations
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/events',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const events = await fastify.campus.listEvents();
      return reply.status(200).send(events);
    },
  );

  /**
   * Validates, then inserts. An overlapping event is still stored (201),
   * marked invalid with its violations.
   */
  fastify.post(
    '/api/v1/events',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = eventInputSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event = await fastify.campus.addEvent(parsed.data);
      return reply.status(201).send(event);
    },
  );

  fastify.get(
    '/api/v1/events/summary',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const summaries = await fastify.campus.allEventSummaries();
      return reply.status(200).send(summaries);
    },
  );

  fastify.get(
    '/api/v1/events/:event_id/summary',
    async (
      request: FastifyRequest<{ Params: { event_id: string } }>,
      reply: FastifyReply,
    ) => {
      const summary = await fastify.campus.eventSummary(request.params.event_id);
      return reply.status(200).send(summary);
    },
  );

  fastify.get(
    '/api/v1/conflicts',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const report = await fastify.campus.conflictReport();
      return reply.status(200).send(report);
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['campus'],
  fastify: '5.x',
});
