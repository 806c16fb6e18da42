import pino from 'pino';

const LEVELS = ['debug', 'info', 'warn', 'error'] as const;
type LogLevel = (typeof LEVELS)[number];

function resolveLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  return LEVELS.find((level) => level === value) ?? 'info';
}

/**
 * Process-wide structured logger.
 *
 * Reads LOG_LEVEL directly so it is usable before configuration has been
 * parsed (config errors are themselves logged through it).
 */
export const logger = pino({
  name: 'channel-relay',
  level: process.env.VITEST ? 'silent' : resolveLevel(process.env.LOG_LEVEL),
  base: { pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type { Logger } from 'pino';
