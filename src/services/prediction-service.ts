import type { EventBus } from './event-bus.js';
import type { ServiceType } from '../models/events.js';
import { createChildLogger } from '../utils/logger.js';
import { aqiStatusFor, type AqiStatus, type AqiStatusScale } from './aqi-classifier.js';
import { InsufficientDataError } from './errors.js';
import {
  LeastSquaresRegression,
  type FeatureRow,
  type RegressionStrategyFactory,
} from './regression-strategy.js';
import {
  forecastTrend,
  toEpochMs,
  toTimeSeries,
  type TimestampedReading,
  type TrendForecast,
} from './trend-forecaster.js';

const log = createChildLogger('prediction-service');

export interface LeakReading {
  timestamp: string | Date;
  flow_rate?: number | null;
  pressure?: number | null;
  leak_detected: boolean;
}

export interface PredictionResult {
  service_type: ServiceType;
  entity_id: string;
  prediction_type: string;
  predicted_value: number;
  confidence_score: number;
  timestamp: string;
}

export type DemandLevel = 'high' | 'medium' | 'low';
export type RiskLevel = 'high' | 'medium' | 'low';

export type EnergyPrediction = PredictionResult & { unit: 'kWh' };
export type AirQualityPrediction = PredictionResult & { quality_level: AqiStatus };
export type TransportPrediction = PredictionResult & { demand_level: DemandLevel };
export type LeakRiskPrediction = PredictionResult & { risk_level: RiskLevel };

export interface PredictionServiceOptions {
  /** Minimum readings for the trend forecasts (energy, air quality, transport). */
  minForecastSamples: number;
  minLeakSamples: number;
  /** How far past the latest reading the trend forecasts project. */
  horizonHours: number;
  statusScale: AqiStatusScale;
  /** Leak probability above which ml.prediction.alert is raised. */
  leakAlertProbability: number;
}

export interface PredictionServiceDeps {
  eventBus: EventBus;
  options: PredictionServiceOptions;
  /** Model used for leak risk; a fresh instance is fitted per request. */
  leakModelFactory?: RegressionStrategyFactory;
  now?: () => Date;
}

export function classifyDemand(passengers: number): DemandLevel {
  if (passengers > 30) return 'high';
  if (passengers > 15) return 'medium';
  return 'low';
}

export function classifyLeakRisk(probability: number): RiskLevel {
  if (probability > 0.7) return 'high';
  if (probability > 0.3) return 'medium';
  return 'low';
}

/**
 * Prediction call sites. Each one feeds a different telemetry series through
 * the shared trend forecaster (or the injected leak model) and publishes the
 * result on the event bus.
 */
export class PredictionService {
  private readonly eventBus: EventBus;
  private readonly options: PredictionServiceOptions;
  private readonly leakModelFactory: RegressionStrategyFactory;
  private readonly now: () => Date;

  constructor(deps: PredictionServiceDeps) {
    this.eventBus = deps.eventBus;
    this.options = deps.options;
    this.leakModelFactory = deps.leakModelFactory ?? (() => new LeastSquaresRegression());
    this.now = deps.now ?? (() => new Date());
  }

  async predictEnergyConsumption(entityId: string, readings: readonly TimestampedReading[]): Promise<EnergyPrediction> {
    const forecast = this.forecastSeries(readings);
    const result: EnergyPrediction = {
      ...this.baseResult('energy', entityId, `consumption_${this.options.horizonHours}h`, forecast),
      unit: 'kWh',
    };
    await this.publish(result);
    return result;
  }

  async predictAirQuality(entityId: string, readings: readonly TimestampedReading[]): Promise<AirQualityPrediction> {
    const forecast = this.forecastSeries(readings);
    const result: AirQualityPrediction = {
      ...this.baseResult('air_quality', entityId, `aqi_${this.options.horizonHours}h`, forecast),
      quality_level: aqiStatusFor(Math.trunc(forecast.predictedValue), this.options.statusScale),
    };
    await this.publish(result);
    return result;
  }

  async predictTransportDemand(entityId: string, readings: readonly TimestampedReading[]): Promise<TransportPrediction> {
    const forecast = this.forecastSeries(readings);
    const result: TransportPrediction = {
      ...this.baseResult('transport', entityId, 'passenger_demand', forecast),
      demand_level: classifyDemand(forecast.predictedValue),
    };
    await this.publish(result);
    return result;
  }

  async predictLeakRisk(entityId: string, readings: readonly LeakReading[]): Promise<LeakRiskPrediction> {
    const required = this.options.minLeakSamples;
    if (readings.length < required) {
      throw new InsufficientDataError(required, readings.length);
    }

    const ordered = readings
      .map((r) => ({ ms: toEpochMs(r.timestamp), reading: r }))
      .sort((a, b) => a.ms - b.ms)
      .map(({ reading }) => reading);

    const features: FeatureRow[] = ordered.map((r) => [r.flow_rate ?? 0, r.pressure ?? 0]);
    const labels = ordered.map((r) => (r.leak_detected ? 1 : 0));

    const model = this.leakModelFactory();
    model.fit(features, labels);
    const latest = features[features.length - 1];
    const probability = Math.min(1, Math.max(0, model.predict(latest)));
    const confidence = model.score(features, labels);

    const result: LeakRiskPrediction = {
      service_type: 'water',
      entity_id: entityId,
      prediction_type: 'leak_probability',
      predicted_value: probability,
      confidence_score: confidence,
      timestamp: this.now().toISOString(),
      risk_level: classifyLeakRisk(probability),
    };

    log.info({ entityId, probability, samples: readings.length }, 'Leak risk predicted');

    if (probability > this.options.leakAlertProbability) {
      await this.eventBus.emit({
        type: 'ml.prediction.alert',
        data: {
          service_type: 'water',
          entity_id: entityId,
          prediction_type: 'leak_risk_high',
          probability,
          timestamp: result.timestamp,
        },
      });
    }
    return result;
  }

  private forecastSeries(readings: readonly TimestampedReading[]): TrendForecast {
    const required = this.options.minForecastSamples;
    if (readings.length < required) {
      throw new InsufficientDataError(required, readings.length);
    }
    const samples = toTimeSeries(readings);
    const latest = samples[samples.length - 1].elapsedHours;
    const forecast = forecastTrend(samples, latest + this.options.horizonHours);
    log.debug(
      { samples: samples.length, slope: forecast.slope, rSquared: forecast.confidenceScore },
      'Trend fitted',
    );
    return forecast;
  }

  private baseResult(
    serviceType: ServiceType,
    entityId: string,
    predictionType: string,
    forecast: TrendForecast,
  ): PredictionResult {
    return {
      service_type: serviceType,
      entity_id: entityId,
      prediction_type: predictionType,
      predicted_value: forecast.predictedValue,
      confidence_score: forecast.confidenceScore,
      timestamp: this.now().toISOString(),
    };
  }

  private async publish(result: PredictionResult): Promise<void> {
    log.info(
      { serviceType: result.service_type, entityId: result.entity_id, predictedValue: result.predicted_value },
      'Prediction computed',
    );
    await this.eventBus.emit({
      type: 'ml.prediction',
      data: {
        service_type: result.service_type,
        entity_id: result.entity_id,
        prediction_type: result.prediction_type,
        predicted_value: result.predicted_value,
        timestamp: result.timestamp,
      },
    });
  }
}
