/**
 * Console logger with a [context] prefix, filtered by LOG_LEVEL (debug | info | warn | error)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function getLogLevel(): LogLevel {
  const level = (process.env.LOG_LEVEL || 'info').toLowerCase();
  if (isLogLevel(level)) {
    return level;
  }
  return 'info';
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(context: string): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[getLogLevel()];
  const prefix = `[${context}]`;

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.log(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
  };
}
