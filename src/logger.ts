import { pino, type Logger } from 'pino';

/**
 * Default logger for clients constructed without one.
 * The level comes from `QUERY_LOG_LEVEL`, `info` when unset.
 */
export function createLogger(level: string = process.env.QUERY_LOG_LEVEL ?? 'info'): Logger {
  return pino({
    name: 'scpsl-query',
    level,
    redact: ['password', '*.password'],
  });
}
