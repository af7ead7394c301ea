import { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import type { AirQualityService } from '../services/air-quality-service.js';
import {
  AqiRequestSchema,
  AqiResponseSchema,
  ErrorResponseSchema,
  ErrorWithDetailsSchema,
  TrendsRequestSchema,
  TrendsResponseSchema,
} from '../models/api-schemas.js';

export interface AirQualityRoutesOpts {
  airQualityService: AirQualityService;
}

export async function airQualityRoutes(fastify: FastifyInstance, opts: AirQualityRoutesOpts) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const { airQualityService } = opts;

  app.post('/api/v1/air-quality/aqi', {
    schema: {
      tags: ['Air Quality'],
      summary: 'Calculate the AQI of a station reading and raise an alert when it is poor',
      body: AqiRequestSchema,
      response: { 200: AqiResponseSchema, 400: ErrorWithDetailsSchema },
    },
  }, async (request) => {
    const { station_id, ...reading } = request.body;
    return airQualityService.assessReading(station_id, reading);
  });

  app.post('/api/v1/air-quality/trends', {
    schema: {
      tags: ['Air Quality'],
      summary: 'Daily averages over a batch of station readings, newest day first',
      body: TrendsRequestSchema,
      response: { 200: TrendsResponseSchema, 400: ErrorWithDetailsSchema, 500: ErrorResponseSchema },
    },
  }, async (request) => {
    const { station_id, days, readings } = request.body;
    const startedAt = Date.now();
    const data = airQualityService.summarizeTrends(readings, days);
    request.log.info({
      stationId: station_id,
      readingCount: readings.length,
      dayCount: data.length,
      durationMs: Date.now() - startedAt,
    }, 'Computed air quality trends');
    return { station_id: station_id ?? null, period_days: days, data };
  });
}
