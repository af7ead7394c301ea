import { InvalidInputError } from './errors.js';
import {
  assertFiniteSeries,
  coefficientOfDetermination,
  type FeatureRow,
  type RegressionStrategy,
} from './regression-strategy.js';

const MS_PER_HOUR = 60 * 60 * 1000;

export interface TimestampedReading {
  timestamp: string | Date;
  value: number;
}

export interface TimeSeriesSample {
  /** Hours since the earliest reading in the series. */
  elapsedHours: number;
  value: number;
}

export interface LinearTrendFit {
  slope: number;
  intercept: number;
  /** In-sample coefficient of determination; can be negative. */
  rSquared: number;
  sampleCount: number;
}

export interface TrendForecast {
  predictedValue: number;
  /** In-sample R² of the fit the forecast came from. */
  confidenceScore: number;
  slope: number;
  intercept: number;
}

export function toEpochMs(timestamp: string | Date): number {
  const ms = timestamp instanceof Date ? timestamp.getTime() : Date.parse(timestamp);
  if (Number.isNaN(ms)) {
    throw new InvalidInputError(`Invalid timestamp: ${String(timestamp)}`);
  }
  return ms;
}

/**
 * Convert timestamped readings into (elapsed hours, value) samples measured
 * from the earliest timestamp, ordered by elapsed time.
 */
export function toTimeSeries(readings: readonly TimestampedReading[]): TimeSeriesSample[] {
  if (readings.length === 0) return [];

  const stamped = readings.map((r) => ({ ms: toEpochMs(r.timestamp), value: r.value }));
  const baseTime = stamped.reduce((min, r) => Math.min(min, r.ms), Infinity);

  return stamped
    .map((r) => ({ elapsedHours: (r.ms - baseTime) / MS_PER_HOUR, value: r.value }))
    .sort((a, b) => a.elapsedHours - b.elapsedHours);
}

/**
 * Simple linear regression: value = slope * elapsedHours + intercept.
 * R² is computed against the training samples themselves.
 */
export function fitLinearTrend(samples: readonly TimeSeriesSample[]): LinearTrendFit {
  const n = samples.length;
  if (n < 2) {
    throw new InvalidInputError('At least 2 samples are required to fit a trend');
  }

  const xs = samples.map((s) => s.elapsedHours);
  const ys = samples.map((s) => s.value);
  assertFiniteSeries(xs, 'Elapsed hours');
  assertFiniteSeries(ys, 'Values');

  if (xs.every((x) => x === xs[0])) {
    throw new InvalidInputError('All samples share the same time; slope is undefined');
  }

  // A flat series fits exactly with a zero slope.
  if (ys.every((y) => y === ys[0])) {
    return { slope: 0, intercept: ys[0], rSquared: 1, sampleCount: n };
  }

  let sumX = 0;
  let sumY = 0;
  for (let i = 0; i < n; i++) {
    sumX += xs[i];
    sumY += ys[i];
  }
  const meanX = sumX / n;
  const meanY = sumY / n;

  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - meanX;
    sxx += dx * dx;
    sxy += dx * (ys[i] - meanY);
  }

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;
  const rSquared = coefficientOfDetermination(ys, xs.map((x) => slope * x + intercept));

  return { slope, intercept, rSquared, sampleCount: n };
}

export function forecastAt(fit: Pick<LinearTrendFit, 'slope' | 'intercept'>, elapsedHours: number): number {
  return fit.slope * elapsedHours + fit.intercept;
}

/** Fit the series and extrapolate to targetElapsedHours (same origin as the samples). */
export function forecastTrend(
  samples: readonly TimeSeriesSample[],
  targetElapsedHours: number,
): TrendForecast {
  if (!Number.isFinite(targetElapsedHours)) {
    throw new InvalidInputError('Forecast target must be a finite number of hours');
  }
  const fit = fitLinearTrend(samples);
  return {
    predictedValue: forecastAt(fit, targetElapsedHours),
    confidenceScore: fit.rSquared,
    slope: fit.slope,
    intercept: fit.intercept,
  };
}

/** The trend fit behind the RegressionStrategy interface; uses the first feature column. */
export class LinearTrendRegression implements RegressionStrategy {
  private trend: LinearTrendFit | null = null;

  fit(features: readonly FeatureRow[], labels: readonly number[]): void {
    if (features.length !== labels.length) {
      throw new InvalidInputError('Feature rows and labels must have the same length');
    }
    this.trend = fitLinearTrend(
      features.map((row, i) => ({ elapsedHours: firstFeature(row), value: labels[i] })),
    );
  }

  predict(features: FeatureRow): number {
    if (!this.trend) {
      throw new InvalidInputError('Regression has not been fitted');
    }
    return forecastAt(this.trend, firstFeature(features));
  }

  score(features: readonly FeatureRow[], labels: readonly number[]): number {
    return coefficientOfDetermination(labels, features.map((row) => this.predict(row)));
  }
}

function firstFeature(row: FeatureRow): number {
  if (row.length === 0) {
    throw new InvalidInputError('Feature row is empty');
  }
  return row[0];
}
