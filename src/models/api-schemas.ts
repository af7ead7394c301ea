import { z } from 'zod';
import { AQI_STATUSES } from '../services/aqi-classifier.js';

// ─── Standard error response ────────────────────────────────────────
export const ErrorResponseSchema = z.object({
  error: z.string(),
});

export const ErrorWithDetailsSchema = ErrorResponseSchema.extend({
  details: z.unknown().optional(),
  message: z.string().optional(),
});

// ─── Health schemas ─────────────────────────────────────────────────
export const HealthResponseSchema = z.object({
  status: z.string(),
  service: z.string(),
  timestamp: z.string(),
});

export const ServiceInfoResponseSchema = z.object({
  service: z.string(),
  version: z.string(),
  status: z.string(),
});

// ─── Shared fields ──────────────────────────────────────────────────
const concentration = z.number().nonnegative().nullable().optional();

// ISO-8601 strings; unparseable values are rejected by the services with a 400.
const timestamp = z.string().min(1);

export const PollutantReadingSchema = z.object({
  pm25: concentration,
  pm10: concentration,
  co: concentration,
  no2: concentration,
  o3: concentration,
});

export const AqiStatusSchema = z.enum(AQI_STATUSES);

// ─── Air quality ────────────────────────────────────────────────────
export const AqiRequestSchema = PollutantReadingSchema.extend({
  station_id: z.string().min(1),
});

export const AqiResponseSchema = z.object({
  station_id: z.string(),
  aqi: z.number(),
  status: AqiStatusSchema,
  alert: z
    .object({
      alert_type: z.literal('poor_air_quality'),
      severity: z.enum(['warning', 'critical']),
      message: z.string(),
    })
    .optional(),
});

export const StationReadingSchema = PollutantReadingSchema.extend({
  timestamp,
  aqi: z.number().nonnegative().nullable().optional(),
});

export const TrendsRequestSchema = z.object({
  station_id: z.string().min(1).optional(),
  days: z.number().int().positive().max(365).default(7),
  readings: z.array(StationReadingSchema),
});

export const DailyAirQualitySchema = z.object({
  date: z.string(),
  avg_pm25: z.number(),
  avg_pm10: z.number(),
  avg_aqi: z.number(),
  max_aqi: z.number(),
  status: AqiStatusSchema,
});

export const TrendsResponseSchema = z.object({
  station_id: z.string().nullable(),
  period_days: z.number(),
  data: z.array(DailyAirQualitySchema),
});

// ─── Route optimisation ─────────────────────────────────────────────
// Extra waypoint fields (ids, names) ride along untouched.
export const WaypointSchema = z.looseObject({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export const OptimizeRouteBodySchema = z.array(WaypointSchema);

// ─── Predictions ────────────────────────────────────────────────────
export const SeriesReadingSchema = z.object({
  timestamp,
  value: z.number(),
});

export const SeriesPredictionRequestSchema = z.object({
  entity_id: z.string().min(1),
  readings: z.array(SeriesReadingSchema),
});

export const LeakReadingSchema = z.object({
  timestamp,
  flow_rate: z.number().nullable().optional(),
  pressure: z.number().nullable().optional(),
  leak_detected: z.boolean(),
});

export const LeakPredictionRequestSchema = z.object({
  entity_id: z.string().min(1),
  readings: z.array(LeakReadingSchema),
});
