import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';

export const createLogger = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

// The static generation modes run without fastify and log through pino directly.
export const createStandaloneLogger = (level: string): Logger => pino(createLogger(level));
