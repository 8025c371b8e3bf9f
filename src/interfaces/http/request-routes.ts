import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { serviceRequestInputSchema, requestStatusUpdateSchema } from '../../application/index.js';

/**
 * Service request routes.
 *
 * GET   /api/v1/requests              - all requests, oldest first
 * POST  /api/v1/requests              - raise a request (Open unless status given)
 * PATCH /api/v1/requests/:request_id  - advance status
 * GET   /api/v1/requests/report       - counts and examples per status
 */
async function requestRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/requests',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const requests = await fastify.campus.listServiceRequests();
      return reply.status(200).send(requests);
    },
  );

  fastify.post(
    '/api/v1/requests',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = serviceRequestInputSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const created = await fastify.campus.raiseRequest(parsed.data);
      return reply.status(201).send(created);
    },
  );

  fastify.patch(
    '/api/v1/requests/:request_id',
    async (
      request: FastifyRequest<{ Params: { request_id: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = requestStatusUpdateSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const updated = await fastify.campus.updateRequestStatus(request.params.request_id, parsed.data.status);
      return reply.status(200).send(updated);
    },
  );

  fastify.get(
    '/api/v1/requests/report',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const report = await fastify.campus.serviceRequestReport();
      return reply.status(200).send(report);
    },
  );
}

export default fp(requestRoutes, {
  name: 'request-routes',
  dependencies: ['campus'],
  fastify: '5.x',
});
