/**
 * Structured Logger
 *
 * JSON-formatted logging with levels: debug, info, warn, error
 *
 * - Debug logs only emit when LOG_LEVEL=debug or NODE_ENV !== 'production'
 * - LOG_LEVEL=silent mutes everything (used by the test setup)
 * - child() returns a logger that stamps fixed fields onto every entry
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type Threshold = LogLevel | 'silent';
type LogContext = Record<string, unknown>;

const LEVEL_PRIORITY: Record<Threshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isThreshold(value: string | undefined): value is Threshold {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function getMinLevel(): Threshold {
  const envLevel = process.env.LOG_LEVEL;
  if (isThreshold(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getMinLevel()];
}

function formatEntry(level: LogLevel, message: string, context?: LogContext) {
  const entry: LogContext = {
    level,
    msg: message,
    ts: new Date().toISOString(),
  };
  if (context) {
    Object.assign(entry, context);
  }
  return JSON.stringify(entry);
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

export const logger: Logger = {
  debug(message, context) {
    if (!shouldLog('debug')) return;
    console.debug(formatEntry('debug', message, context));
  },

  info(message, context) {
    if (!shouldLog('info')) return;
    console.info(formatEntry('info', message, context));
  },

  warn(message, context) {
    if (!shouldLog('warn')) return;
    console.warn(formatEntry('warn', message, context));
  },

  error(message, context) {
    if (!shouldLog('error')) return;
    console.error(formatEntry('error', message, context));
  },

  // Delegates through the root object at call time so spies on `logger` see child output
  child(bindings) {
    return {
      debug: (message, context) => logger.debug(message, { ...bindings, ...context }),
      info: (message, context) => logger.info(message, { ...bindings, ...context }),
      warn: (message, context) => logger.warn(message, { ...bindings, ...context }),
      error: (message, context) => logger.error(message, { ...bindings, ...context }),
      child: (more) => logger.child({ ...bindings, ...more }),
    };
  },
};
