import { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { HealthResponseSchema, ServiceInfoResponseSchema } from '../models/api-schemas.js';

export const SERVICE_NAME = 'smart-city-analytics';

export interface HealthRoutesOpts {
  version: string;
}

export async function healthRoutes(fastify: FastifyInstance, opts: HealthRoutesOpts) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.get('/', {
    schema: {
      tags: ['Health'],
      summary: 'Service name and version',
      response: { 200: ServiceInfoResponseSchema },
    },
  }, async () => ({
    service: SERVICE_NAME,
    version: opts.version,
    status: 'running',
  }));

  // Liveness probe
  app.get('/health', {
    schema: {
      tags: ['Health'],
      summary: 'Liveness check',
      response: { 200: HealthResponseSchema },
    },
  }, async () => ({
    status: 'healthy',
    service: SERVICE_NAME,
    timestamp: new Date().toISOString(),
  }));
}
