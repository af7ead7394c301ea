import { envSchema, type EnvConfig } from './env.schema.js';

let config: EnvConfig | null = null;

function validateAqiThresholds(data: EnvConfig): void {
  if (data.AQI_CRITICAL_THRESHOLD < data.AQI_ALERT_THRESHOLD) {
    throw new Error(
      'Invalid environment configuration:\n  AQI_CRITICAL_THRESHOLD: must not be lower than AQI_ALERT_THRESHOLD',
    );
  }
}

export function getConfig(): EnvConfig {
  if (!config) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      const errors = result.error.issues
        .map((i) => `  ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new Error(`Invalid environment configuration:\n${errors}`);
    }
    validateAqiThresholds(result.data);
    config = result.data;
  }
  return config;
}

/** Drop the cached config so the next getConfig() re-reads process.env. */
export function resetConfig(): void {
  config = null;
}

/**
 * Override specific config values for a test. Call resetConfig() in afterEach.
 * Throws if called outside the test environment.
 */
export function setConfigForTest(partial: Partial<EnvConfig>): void {
  if (process.env.NODE_ENV !== 'test') {
    throw new Error('setConfigForTest can only be called in the test environment');
  }
  config = { ...getConfig(), ...partial };
}

export type { EnvConfig };
