import pino from 'pino';
import { config } from '../config/env';

export function loggerOptions() {
  return {
    level: config.LOG_LEVEL,
    transport: config.NODE_ENV === 'development' ? { target: 'pino-pretty' } : undefined,
    redact: ['req.headers.authorization']
  };
}

/** Process-wide logger for work done outside a request. */
export const logger = pino(loggerOptions());
