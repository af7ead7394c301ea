import { z } from 'zod';

export const envSchema = z.object({
  // Server
  PORT: z.coerce.number().int().min(1).max(65535).default(3060),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // Trend forecasting
  FORECAST_HORIZON_HOURS: z.coerce.number().positive().max(24 * 30).default(24),
  FORECAST_MIN_SAMPLES: z.coerce.number().int().min(2).default(10),

  // Water leak risk
  LEAK_MIN_SAMPLES: z.coerce.number().int().min(2).default(20),
  LEAK_ALERT_PROBABILITY: z.coerce.number().min(0).max(1).default(0.7),

  // Air quality
  AQI_ALERT_THRESHOLD: z.coerce.number().int().min(0).default(150),
  AQI_CRITICAL_THRESHOLD: z.coerce.number().int().min(0).default(200),
  // The prediction endpoint historically used a five-band table; readings use six bands.
  AQI_STATUS_SCALE: z.enum(['six-band', 'five-band']).default('six-band'),
});

export type EnvConfig = z.infer<typeof envSchema>;
