import type { AqiStatus } from '../services/aqi-classifier.js';

export type ServiceType = 'energy' | 'water' | 'transport' | 'air_quality';

/** Payload of airquality.alert, raised when a station reading crosses the alert threshold. */
export type AirQualityAlertEventData = {
  station_id: string;
  alert_type: 'poor_air_quality';
  severity: 'critical' | 'warning';
  aqi: number;
  status: AqiStatus;
  message: string;
  timestamp: string;
};

export type PredictionEventData = {
  service_type: ServiceType;
  entity_id: string;
  prediction_type: string;
  predicted_value: number;
  timestamp: string;
};

export type PredictionAlertEventData = {
  service_type: ServiceType;
  entity_id: string;
  prediction_type: 'leak_risk_high';
  probability: number;
  timestamp: string;
};

/**
 * Every event the analytics services publish. Topic names match the ones the
 * surrounding platform routes to its broker.
 */
export type AnalyticsEvent =
  | { type: 'airquality.alert'; data: AirQualityAlertEventData }
  | { type: 'ml.prediction'; data: PredictionEventData }
  | { type: 'ml.prediction.alert'; data: PredictionAlertEventData };

export type AnalyticsEventType = AnalyticsEvent['type'];

export type EventOfType<T extends AnalyticsEventType> = Extract<AnalyticsEvent, { type: T }>;

export type EventHandler<T extends AnalyticsEventType> = (event: EventOfType<T>) => void | Promise<void>;
