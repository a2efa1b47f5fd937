import { pino, type Logger } from 'pino';

export type { Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Named pino logger. Without an explicit level, `AGENTLINK_LOG_LEVEL` decides,
 * falling back to `info`.
 */
export function createLogger(name: string, level?: LogLevel): Logger {
  const fromEnv = process.env.AGENTLINK_LOG_LEVEL;
  return pino({ name, level: level ?? (isLogLevel(fromEnv) ? fromEnv : 'info') });
}
