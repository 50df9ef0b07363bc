import { pino, type Logger } from 'pino';

export type { Logger };

export const LOGGER_NAME = 'media-authenticity-sdk';

// Library default is quiet; callers raise it through the env var or pass their own logger.
export function createLogger(level: string = process.env.AUTHENTICITY_LOG_LEVEL ?? 'warn'): Logger {
  return pino({ name: LOGGER_NAME, level });
}
