import { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { optimizeRoute } from '../services/route-optimizer.js';
import { OptimizeRouteBodySchema } from '../models/api-schemas.js';

export async function transportRoutes(fastify: FastifyInstance) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.post('/api/v1/optimize/route', {
    schema: {
      tags: ['Transport'],
      summary: 'Order waypoints into a greedy nearest-neighbour tour starting at the first one',
      body: OptimizeRouteBodySchema,
    },
  }, async (request) => {
    const { route, totalDistanceKm } = optimizeRoute(request.body);
    return {
      optimized_route: route,
      total_distance_km: Math.round(totalDistanceKm * 100) / 100,
      waypoint_count: route.length,
    };
  });
}
