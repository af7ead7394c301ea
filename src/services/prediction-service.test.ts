import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: () => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { EventBus } from './event-bus.js';
import { InsufficientDataError, InvalidInputError } from './errors.js';
import {
  classifyDemand,
  classifyLeakRisk,
  PredictionService,
  type LeakReading,
  type PredictionServiceOptions,
} from './prediction-service.js';
import type { FeatureRow, RegressionStrategy } from './regression-strategy.js';
import type { AnalyticsEvent } from '../models/events.js';

const NOW = new Date('2024-06-01T12:00:00.000Z');
const START = Date.parse('2024-06-01T00:00:00.000Z');

const defaultOptions: PredictionServiceOptions = {
  minForecastSamples: 10,
  minLeakSamples: 20,
  horizonHours: 24,
  statusScale: 'six-band',
  leakAlertProbability: 0.7,
};

function hourly(values: number[]) {
  return values.map((value, hour) => ({
    timestamp: new Date(START + hour * 3_600_000).toISOString(),
    value,
  }));
}

function leakReadings(count: number, overrides: Partial<LeakReading> = {}): LeakReading[] {
  return Array.from({ length: count }, (_, i) => ({
    timestamp: new Date(START + i * 3_600_000).toISOString(),
    flow_rate: 10 + i,
    pressure: 50 + (i % 3),
    leak_detected: false,
    ...overrides,
  }));
}

class StubModel implements RegressionStrategy {
  fitted: { features: readonly FeatureRow[]; labels: readonly number[] } | null = null;
  predictedFor: FeatureRow | null = null;

  constructor(
    private readonly prediction: number,
    private readonly fitScore: number,
  ) {}

  fit(features: readonly FeatureRow[], labels: readonly number[]): void {
    this.fitted = { features, labels };
  }

  predict(features: FeatureRow): number {
    this.predictedFor = features;
    return this.prediction;
  }

  score(): number {
    return this.fitScore;
  }
}

describe('PredictionService', () => {
  let eventBus: EventBus;
  let events: AnalyticsEvent[];

  const build = (overrides: Partial<PredictionServiceOptions> = {}, model?: StubModel) =>
    new PredictionService({
      eventBus,
      options: { ...defaultOptions, ...overrides },
      leakModelFactory: model ? () => model : undefined,
      now: () => NOW,
    });

  beforeEach(() => {
    eventBus = new EventBus();
    events = [];
    eventBus.onAny((event) => {
      events.push(event);
    });
  });

  describe('predictEnergyConsumption', () => {
    it('projects the trend 24 hours past the latest reading', async () => {
      // 100 + 5h over 12 hours; target hour 11 + 24 = 35
      const readings = hourly(Array.from({ length: 12 }, (_, h) => 100 + 5 * h));
      const result = await build().predictEnergyConsumption('meter-7', readings);

      expect(result.service_type).toBe('energy');
      expect(result.entity_id).toBe('meter-7');
      expect(result.prediction_type).toBe('consumption_24h');
      expect(result.unit).toBe('kWh');
      expect(result.timestamp).toBe('2024-06-01T12:00:00.000Z');
      expect(result.predicted_value).toBeCloseTo(275, 9);
      expect(result.confidence_score).toBeCloseTo(1, 9);
    });

    it('publishes ml.prediction', async () => {
      const readings = hourly(Array.from({ length: 10 }, () => 80));
      await build().predictEnergyConsumption('meter-7', readings);

      expect(events).toEqual([
        {
          type: 'ml.prediction',
          data: {
            service_type: 'energy',
            entity_id: 'meter-7',
            prediction_type: 'consumption_24h',
            predicted_value: 80,
            timestamp: '2024-06-01T12:00:00.000Z',
          },
        },
      ]);
    });

    it('names the prediction after the configured horizon', async () => {
      const readings = hourly(Array.from({ length: 10 }, (_, h) => h));
      const result = await build({ horizonHours: 6 }).predictEnergyConsumption('meter-7', readings);
      expect(result.prediction_type).toBe('consumption_6h');
      expect(result.predicted_value).toBeCloseTo(15, 9);
    });

    it('requires the minimum number of readings', async () => {
      const readings = hourly([1, 2, 3, 4, 5, 6, 7, 8, 9]);
      await expect(build().predictEnergyConsumption('meter-7', readings)).rejects.toBeInstanceOf(
        InsufficientDataError,
      );
      expect(events).toHaveLength(0);
    });

    it('surfaces degenerate series as invalid input', async () => {
      const readings = Array.from({ length: 10 }, (_, i) => ({
        timestamp: '2024-06-01T00:00:00.000Z',
        value: i,
      }));
      await expect(build().predictEnergyConsumption('meter-7', readings)).rejects.toBeInstanceOf(
        InvalidInputError,
      );
    });
  });

  describe('predictAirQuality', () => {
    // 40 + 10h over 10 hours; target hour 9 + 24 = 33 -> 370
    const rising = hourly(Array.from({ length: 10 }, (_, h) => 40 + 10 * h));

    it('classifies the forecast with the six-band table by default', async () => {
      const result = await build().predictAirQuality('station-3', rising);
      expect(result.prediction_type).toBe('aqi_24h');
      expect(result.service_type).toBe('air_quality');
      expect(result.predicted_value).toBeCloseTo(370, 9);
      expect(result.quality_level).toBe('hazardous');
    });

    it('can use the five-band table', async () => {
      const result = await build({ statusScale: 'five-band' }).predictAirQuality('station-3', rising);
      expect(result.quality_level).toBe('very_unhealthy');
    });

    it('reports good air for a flat clean series', async () => {
      const result = await build().predictAirQuality('station-3', hourly(Array.from({ length: 10 }, () => 30)));
      expect(result.predicted_value).toBe(30);
      expect(result.confidence_score).toBe(1);
      expect(result.quality_level).toBe('good');
    });
  });

  describe('predictTransportDemand', () => {
    it('labels a flat series of 20 passengers as medium demand', async () => {
      const result = await build().predictTransportDemand('bus-12', hourly(Array.from({ length: 10 }, () => 20)));
      expect(result.prediction_type).toBe('passenger_demand');
      expect(result.predicted_value).toBe(20);
      expect(result.demand_level).toBe('medium');
    });

    it('labels a rising series as high demand', async () => {
      // 10 + h; target hour 33 -> 43
      const result = await build().predictTransportDemand('bus-12', hourly(Array.from({ length: 10 }, (_, h) => 10 + h)));
      expect(result.predicted_value).toBeCloseTo(43, 9);
      expect(result.demand_level).toBe('high');
      expect(events.map((e) => e.type)).toEqual(['ml.prediction']);
    });
  });

  describe('predictLeakRisk', () => {
    it('fits the injected model and predicts for the latest reading', async () => {
      const model = new StubModel(0.5, 0.62);
      const readings = leakReadings(20).reverse();
      const result = await build({}, model).predictLeakRisk('sensor-4', readings);

      expect(model.fitted?.features).toHaveLength(20);
      expect(model.fitted?.features[0]).toEqual([10, 50]);
      expect(model.predictedFor).toEqual([29, 51]);
      expect(result).toEqual({
        service_type: 'water',
        entity_id: 'sensor-4',
        prediction_type: 'leak_probability',
        predicted_value: 0.5,
        confidence_score: 0.62,
        timestamp: '2024-06-01T12:00:00.000Z',
        risk_level: 'medium',
      });
      expect(events).toHaveLength(0);
    });

    it('treats missing flow and pressure as zero and encodes labels as 0/1', async () => {
      const model = new StubModel(0.1, 0.3);
      const readings = leakReadings(20);
      readings[0] = { timestamp: readings[0].timestamp, leak_detected: true };
      await build({}, model).predictLeakRisk('sensor-4', readings);

      expect(model.fitted?.features[0]).toEqual([0, 0]);
      expect(model.fitted?.labels[0]).toBe(1);
      expect(model.fitted?.labels[1]).toBe(0);
    });

    it('raises an alert above the configured probability', async () => {
      const model = new StubModel(0.85, 0.9);
      const result = await build({}, model).predictLeakRisk('sensor-4', leakReadings(20));

      expect(result.risk_level).toBe('high');
      expect(events).toEqual([
        {
          type: 'ml.prediction.alert',
          data: {
            service_type: 'water',
            entity_id: 'sensor-4',
            prediction_type: 'leak_risk_high',
            probability: 0.85,
            timestamp: '2024-06-01T12:00:00.000Z',
          },
        },
      ]);
    });

    it('clamps the model output to a probability', async () => {
      const high = await build({}, new StubModel(1.4, 0.5)).predictLeakRisk('sensor-4', leakReadings(20));
      expect(high.predicted_value).toBe(1);
      const low = await build({}, new StubModel(-0.2, 0.5)).predictLeakRisk('sensor-4', leakReadings(20));
      expect(low.predicted_value).toBe(0);
      expect(low.risk_level).toBe('low');
    });

    it('uses least squares by default', async () => {
      const result = await build().predictLeakRisk('sensor-4', leakReadings(25));
      expect(result.predicted_value).toBe(0);
      expect(result.confidence_score).toBe(1);
      expect(result.risk_level).toBe('low');
    });

    it('requires the minimum number of readings', async () => {
      await expect(build().predictLeakRisk('sensor-4', leakReadings(19))).rejects.toThrow(
        'Insufficient historical data for prediction',
      );
    });
  });

  describe('classifiers', () => {
    it('bins passenger demand', () => {
      expect(classifyDemand(31)).toBe('high');
      expect(classifyDemand(30)).toBe('medium');
      expect(classifyDemand(16)).toBe('medium');
      expect(classifyDemand(15)).toBe('low');
    });

    it('bins leak probability', () => {
      expect(classifyLeakRisk(0.71)).toBe('high');
      expect(classifyLeakRisk(0.7)).toBe('medium');
      expect(classifyLeakRisk(0.31)).toBe('medium');
      expect(classifyLeakRisk(0.3)).toBe('low');
    });
  });
});
