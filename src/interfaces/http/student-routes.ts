import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { studentInputSchema, registrationInputSchema, registrationQuerySchema } from '../../application/index.js';

/**
 * Student and registration routes.
 *
 * GET  /api/v1/students       - all students
 * POST /api/v1/students       - add student
 * GET  /api/v1/registrations  - registrations, optionally ?event_id=
 * POST /api/v1/registrations  - register a student; returns the allocated status
 */
async function studentRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/students',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const students = await fastify.campus.listStudents();
      return reply.status(200).send(students);
    },
  );

  fastify.post(
    '/api/v1/students',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = studentInputSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const student = await fastify.campus.addStudent(parsed.data);
      return reply.status(201).send(student);
    },
  );

  fastify.get(
    '/api/v1/registrations',
    async (request: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) => {
      const parsed = registrationQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const registrations = await fastify.campus.listRegistrations(parsed.data.event_id);
      return reply.status(200).send(registrations);
    },
  );

  fastify.post(
    '/api/v1/registrations',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = registrationInputSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const registration = await fastify.campus.register(parsed.data.student_id, parsed.data.event_id);
      return reply.status(201).send(registration);
    },
  );
}

export default fp(studentRoutes, {
  name: 'student-routes',
  dependencies: ['campus'],
  fastify: '5.x',
});
