import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Library logger using Pino
 *
 * Structured JSON outside development, pretty printed in development.
 * Every module logs through a child created by `createLogger`, bound to
 * the component (and correction source, when there is one) it belongs to.
 */

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogContext {
  component: string;
  /** Name of the correction source the messages concern */
  source?: string;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const env = process.env.NODE_ENV || 'development';
const isDevelopment = env === 'development';

// An invalid LOG_LEVEL is reported by loadConfig; until then fall back
const initialLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL)
  ? process.env.LOG_LEVEL
  : env === 'test' ? 'silent' : 'info';

export const logger = pino({
  level: initialLevel,

  transport: isDevelopment ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
    },
  } : undefined,

  base: {
    env,
  },
});

export type { Logger };

/**
 * Child logger bound to a component. It takes the root level at creation,
 * so loggers created after `setLogLevel` log at the configured level.
 */
export function createLogger(context: LogContext): Logger {
  return logger.child(context);
}

/** Sets the root level, which later `createLogger` children start from */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
