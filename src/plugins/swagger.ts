import { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

export interface SwaggerPluginOptions {
  serverUrl?: string;
}

async function swaggerPlugin(fastify: FastifyInstance, opts: SwaggerPluginOptions) {
  // Zod type provider compilers
  fastify.setValidatorCompiler(validatorCompiler);
  fastify.setSerializerCompiler(serializerCompiler);

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: 'Smart City Analytics API',
        description:
          'Air quality indexing, route optimisation and trend-based predictions ' +
          'over city telemetry (energy, water, transport, air quality).',
        version: '1.0.0',
      },
      servers: [{ url: opts.serverUrl ?? 'http://localhost:3060' }],
      tags: [
        { name: 'Health', description: 'Liveness probe and service info' },
        { name: 'Air Quality', description: 'AQI calculation, alerts and daily trends' },
        { name: 'Transport', description: 'Nearest-neighbour route optimisation' },
        { name: 'Predictions', description: 'Energy, air quality, transport and leak-risk forecasts' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
    },
  });
}

export default fp(swaggerPlugin, { name: 'swagger' });
