import { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import type { PredictionService } from '../services/prediction-service.js';
import { LeakPredictionRequestSchema, SeriesPredictionRequestSchema } from '../models/api-schemas.js';

export interface PredictionRoutesOpts {
  predictionService: PredictionService;
}

export async function predictionRoutes(fastify: FastifyInstance, opts: PredictionRoutesOpts) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();
  const { predictionService } = opts;

  app.post('/api/v1/predict/energy', {
    schema: {
      tags: ['Predictions'],
      summary: 'Forecast energy consumption from a meter series',
      body: SeriesPredictionRequestSchema,
    },
  }, async (request) => {
    const { entity_id, readings } = request.body;
    return predictionService.predictEnergyConsumption(entity_id, readings);
  });

  app.post('/api/v1/predict/airquality', {
    schema: {
      tags: ['Predictions'],
      summary: 'Forecast the AQI of a station from its AQI history',
      body: SeriesPredictionRequestSchema,
    },
  }, async (request) => {
    const { entity_id, readings } = request.body;
    return predictionService.predictAirQuality(entity_id, readings);
  });

  app.post('/api/v1/predict/transport', {
    schema: {
      tags: ['Predictions'],
      summary: 'Forecast passenger demand for a stop or vehicle',
      body: SeriesPredictionRequestSchema,
    },
  }, async (request) => {
    const { entity_id, readings } = request.body;
    return predictionService.predictTransportDemand(entity_id, readings);
  });

  app.post('/api/v1/predict/water', {
    schema: {
      tags: ['Predictions'],
      summary: 'Estimate the leak risk of a water meter from flow and pressure history',
      body: LeakPredictionRequestSchema,
    },
  }, async (request) => {
    const { entity_id, readings } = request.body;
    const startedAt = Date.now();
    const prediction = await predictionService.predictLeakRisk(entity_id, readings);
    request.log.info({
      entityId: entity_id,
      readingCount: readings.length,
      riskLevel: prediction.risk_level,
      durationMs: Date.now() - startedAt,
    }, 'Computed leak risk');
    return prediction;
  });
}
