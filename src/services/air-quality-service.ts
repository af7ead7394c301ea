import type { EventBus } from './event-bus.js';
import type { AirQualityAlertEventData } from '../models/events.js';
import { createChildLogger } from '../utils/logger.js';
import { aqiStatus, calculateAqi, type AqiStatus, type PollutantReading } from './aqi-classifier.js';
import { toEpochMs } from './trend-forecaster.js';

const log = createChildLogger('air-quality-service');

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface AirQualityThresholds {
  /** AQI above which a reading raises an alert. */
  alertAqi: number;
  /** AQI above which the alert is critical rather than a warning. */
  criticalAqi: number;
}

export type AirQualityAlert = Pick<AirQualityAlertEventData, 'alert_type' | 'severity' | 'message'>;

export interface AirQualityAssessment {
  station_id: string;
  aqi: number;
  status: AqiStatus;
  alert?: AirQualityAlert;
}

export interface StationReading extends PollutantReading {
  timestamp: string | Date;
  /** Precomputed index; derived from PM2.5/PM10 when absent. */
  aqi?: number | null;
}

export interface DailyAirQuality {
  date: string;
  avg_pm25: number;
  avg_pm10: number;
  avg_aqi: number;
  max_aqi: number;
  status: AqiStatus;
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export class AirQualityService {
  constructor(
    private readonly eventBus: EventBus,
    private readonly thresholds: AirQualityThresholds,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Index a station reading and raise airquality.alert when it crosses the alert threshold. */
  async assessReading(stationId: string, reading: PollutantReading): Promise<AirQualityAssessment> {
    const aqi = calculateAqi(reading);
    const status = aqiStatus(aqi);
    const assessment: AirQualityAssessment = { station_id: stationId, aqi, status };

    if (aqi > this.thresholds.alertAqi) {
      const alert: AirQualityAlert = {
        alert_type: 'poor_air_quality',
        severity: aqi > this.thresholds.criticalAqi ? 'critical' : 'warning',
        message: `Poor air quality detected (AQI: ${aqi}) at station ${stationId}`,
      };
      assessment.alert = alert;

      log.warn({ stationId, aqi, severity: alert.severity }, 'Air quality alert');
      await this.eventBus.emit({
        type: 'airquality.alert',
        data: { station_id: stationId, aqi, status, timestamp: this.now().toISOString(), ...alert },
      });
    }

    return assessment;
  }

  /**
   * Per-day averages over a batch of readings, newest day first. Days are UTC
   * calendar dates; a missing pollutant counts as absent, not zero. With
   * periodDays, readings older than that many days before now are skipped.
   */
  summarizeTrends(readings: readonly StationReading[], periodDays?: number): DailyAirQuality[] {
    const byDate = new Map<string, { pm25: number[]; pm10: number[]; aqi: number[] }>();
    const since = periodDays === undefined ? -Infinity : this.now().getTime() - periodDays * MS_PER_DAY;

    for (const reading of readings) {
      const ms = toEpochMs(reading.timestamp);
      if (ms < since) continue;
      const date = new Date(ms).toISOString().slice(0, 10);
      let bucket = byDate.get(date);
      if (!bucket) {
        bucket = { pm25: [], pm10: [], aqi: [] };
        byDate.set(date, bucket);
      }
      if (reading.pm25 != null) bucket.pm25.push(reading.pm25);
      if (reading.pm10 != null) bucket.pm10.push(reading.pm10);
      bucket.aqi.push(reading.aqi ?? calculateAqi(reading));
    }

    return [...byDate.entries()]
      .sort(([a], [b]) => (a < b ? 1 : a > b ? -1 : 0))
      .map(([date, bucket]) => {
        const avgAqi = Math.floor(average(bucket.aqi));
        return {
          date,
          avg_pm25: average(bucket.pm25),
          avg_pm10: average(bucket.pm10),
          avg_aqi: avgAqi,
          max_aqi: Math.floor(bucket.aqi.reduce((max, v) => Math.max(max, v), -Infinity)),
          status: aqiStatus(avgAqi),
        };
      });
  }
}
