import type { LoggerOptions } from 'pino';
import { stdTimeFunctions } from 'pino';

export const createLogger = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    paths: ['req.headers.authorization', 'req.headers["x-signature"]'],
    censor: '[REDACTED]'
  }
});
