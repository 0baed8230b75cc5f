import { pino } from 'pino';
import type { LogLevel } from '../config';
import type { Logger } from '../types';

/**
 * Default logger for the authenticator
 *
 * Credentials are redacted in case a caller logs a request object through it.
 */
export function createLogger(level: LogLevel): Logger {
  return pino({
    name: 'shared-key-auth',
    level,
    redact: {
      paths: ['authorization', 'headers.authorization', 'req.headers.authorization', 'secret', 'signature'],
      remove: true,
    },
  });
}
