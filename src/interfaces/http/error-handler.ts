import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { CampusErrorCode } from '../../domain/index.js';
import { CampusError } from '../../domain/index.js';

const STATUS_BY_CODE: Record<CampusErrorCode, number> = {
  DUPLICATE_ID: 409,
  NOT_FOUND: 404,
  INVALID_TRANSITION: 400,
  PARSE_ERROR: 400,
};

export function statusForCampusError(err: CampusError): number {
  return STATUS_BY_CODE[err.code];
}

function clientStatusCode(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode >= 400 && err.statusCode < 500 ? err.statusCode : undefined;
  }
  return undefined;
}

/**
 * Maps thrown errors to HTTP responses.
 *
 * Campus errors keep their code in the body. Fastify's own 4xx errors
 * (malformed JSON, oversized body) pass through with their status.
 * Anything else is logged and answered with 500.
 */
async function errorHandler(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((err, request, reply) => {
    if (err instanceof CampusError) {
      request.log.info({ code: err.code, message: err.message }, 'Request rejected');
      return reply.status(statusForCampusError(err)).send({ error: err.code, message: err.message });
    }

    const status = clientStatusCode(err);
    if (status !== undefined) {
      const message = err instanceof Error ? err.message : 'Bad request';
      return reply.status(status).send({ error: 'Bad request', message });
    }

    request.log.error({ err }, 'Unhandled error');
    return reply.status(500).send({ error: 'Internal Server Error' });
  });
}

export default fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});
