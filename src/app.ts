import Fastify from 'fastify';
import { randomUUID } from 'node:crypto';
import { getConfig, type EnvConfig } from './config/index.js';
import { createChildLogger, getLoggerOptions } from './utils/logger.js';
import errorHandlerPlugin from './plugins/error-handler.js';
import swaggerPlugin from './plugins/swagger.js';
import { healthRoutes } from './routes/health.js';
import { airQualityRoutes } from './routes/air-quality.js';
import { transportRoutes } from './routes/transport.js';
import { predictionRoutes } from './routes/predictions.js';
import { EventBus } from './services/event-bus.js';
import { AirQualityService } from './services/air-quality-service.js';
import { PredictionService } from './services/prediction-service.js';
import type { RegressionStrategyFactory } from './services/regression-strategy.js';

const APP_VERSION = process.env.npm_package_version ?? '1.0.0';

const eventLog = createChildLogger('events');

export interface AppDeps {
  eventBus?: EventBus;
  leakModelFactory?: RegressionStrategyFactory;
  now?: () => Date;
}

export function buildPredictionService(config: EnvConfig, eventBus: EventBus, deps: AppDeps = {}): PredictionService {
  return new PredictionService({
    eventBus,
    leakModelFactory: deps.leakModelFactory,
    now: deps.now,
    options: {
      minForecastSamples: config.FORECAST_MIN_SAMPLES,
      minLeakSamples: config.LEAK_MIN_SAMPLES,
      horizonHours: config.FORECAST_HORIZON_HOURS,
      statusScale: config.AQI_STATUS_SCALE,
      leakAlertProbability: config.LEAK_ALERT_PROBABILITY,
    },
  });
}

export function buildAirQualityService(config: EnvConfig, eventBus: EventBus, deps: AppDeps = {}): AirQualityService {
  return new AirQualityService(
    eventBus,
    { alertAqi: config.AQI_ALERT_THRESHOLD, criticalAqi: config.AQI_CRITICAL_THRESHOLD },
    deps.now,
  );
}

export async function buildApp(deps: AppDeps = {}) {
  const config = getConfig();
  const app = Fastify({
    logger: getLoggerOptions(config.LOG_LEVEL),
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
  });

  // Every published event is logged; a broker bridge would subscribe here too.
  const eventBus = deps.eventBus ?? new EventBus();
  eventBus.onAny((event) => {
    eventLog.info({ eventType: event.type, data: event.data }, 'Event published');
  });

  await app.register(errorHandlerPlugin);
  await app.register(swaggerPlugin, { serverUrl: `http://localhost:${config.PORT}` });

  await app.register(healthRoutes, { version: APP_VERSION });
  await app.register(airQualityRoutes, {
    airQualityService: buildAirQualityService(config, eventBus, deps),
  });
  await app.register(transportRoutes);
  await app.register(predictionRoutes, {
    predictionService: buildPredictionService(config, eventBus, deps),
  });

  return app;
}
