/**
 * Minimal structured logger.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, error?: Error): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const PREFIX = '[constraint-metadata]';

function format(level: string, message: string, context?: LogContext): string {
  const line = `${PREFIX} ${level.toUpperCase()} ${message}`;
  if (!context || Object.keys(context).length === 0) {
    return line;
  }
  return `${line} ${JSON.stringify(context)}`;
}

/**
 * Create a console-backed logger that drops messages below `level`.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;

  return {
    debug(message, context) {
      if (enabled('debug')) console.debug(format('debug', message, context));
    },
    info(message, context) {
      if (enabled('info')) console.info(format('info', message, context));
    },
    warn(message, context) {
      if (enabled('warn')) console.warn(format('warn', message, context));
    },
    error(message, context, error) {
      if (!enabled('error')) return;
      console.error(format('error', message, context));
      if (error?.stack) console.error(error.stack);
    },
  };
}

export const silentLogger: Logger = createLogger('silent');
