import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

/** Shared pino options so the Fastify request logger and module loggers print alike. */
export function getLoggerOptions(level: string = process.env.LOG_LEVEL || 'info'): pino.LoggerOptions {
  // pino-pretty runs in a worker thread; keep it out of production and test runs.
  if (isProduction || isTest) {
    return { level };
  }
  return {
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  };
}

export const logger = pino(getLoggerOptions());

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
