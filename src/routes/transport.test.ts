import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { transportRoutes } from './transport.js';
import { createTestApp, closeTestApp } from '../test/test-app.js';

describe('Transport Routes', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await createTestApp();
    await app.register(transportRoutes);
    await app.ready();
  });

  afterEach(async () => {
    await closeTestApp(app);
  });

  it('orders waypoints greedily and keeps their extra fields', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/optimize/route',
      payload: [
        { latitude: 0, longitude: 0, id: 'depot' },
        { latitude: 0, longitude: 2, id: 'far' },
        { latitude: 0, longitude: 1, id: 'near', name: 'Corner stop' },
      ],
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      optimized_route: [
        { latitude: 0, longitude: 0, id: 'depot' },
        { latitude: 0, longitude: 1, id: 'near', name: 'Corner stop' },
        { latitude: 0, longitude: 2, id: 'far' },
      ],
      // two 1° hops along the equator, 111.195 km each
      total_distance_km: 222.39,
      waypoint_count: 3,
    });
  });

  it('returns an empty route for no waypoints', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/v1/optimize/route', payload: [] });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ optimized_route: [], total_distance_km: 0, waypoint_count: 0 });
  });

  it('rejects a latitude outside [-90, 90]', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/optimize/route',
      payload: [{ latitude: 95, longitude: 0 }],
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('Validation failed');
  });

  it('rejects a body that is not a list', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/optimize/route',
      payload: { latitude: 0, longitude: 0 },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('Validation failed');
  });
});
