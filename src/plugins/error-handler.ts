import type { FastifyError, FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { hasZodFastifySchemaValidationErrors } from 'fastify-type-provider-zod';
import { AnalyticsError, InsufficientDataError } from '../services/errors.js';

async function errorHandlerPlugin(fastify: FastifyInstance) {
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (hasZodFastifySchemaValidationErrors(error)) {
      return reply.code(400).send({
        error: 'Validation failed',
        details: error.validation.map((v) => ({ path: v.instancePath, message: v.message })),
      });
    }

    if (error instanceof InsufficientDataError) {
      return reply.code(error.statusCode).send({
        error: error.message,
        details: { required: error.required, received: error.received },
      });
    }

    if (error instanceof AnalyticsError) {
      return reply.code(error.statusCode).send({ error: error.message });
    }

    // Fastify's own client errors (malformed JSON, unsupported media type)
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.message });
    }

    request.log.error({ err: error }, 'Unhandled request error');
    return reply.code(500).send({ error: 'Internal server error' });
  });
}

export default fp(errorHandlerPlugin, { name: 'error-handler' });
