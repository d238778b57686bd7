/**
 * Tracker Relay — Logger
 *
 * Simple structured logging utility.
 * JSON lines in production or with LOG_FORMAT=json, readable lines otherwise.
 */

import type { LogFormat, LogLevel } from '../types';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /**
   * Create a child logger with default context.
   */
  child(defaultContext: LogContext): Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Where formatted lines go; defaults to the console */
  sink?: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

function formatEntry(entry: LogEntry, format: LogFormat): string {
  if (format === 'json') {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;

  let output = `${time} ${levelStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    output += ` ${JSON.stringify(context)}`;
  }

  return output;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

/**
 * Build a logger from explicit options.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS[options.level ?? 'info'];
  const format = options.format ?? 'text';
  const sink = options.sink ?? consoleSink;

  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LOG_LEVELS[level] < threshold) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
    };

    sink(level, formatEntry(entry, format));
  };

  const bind = (defaultContext: LogContext): Logger => ({
    debug: (message, context) => log('debug', message, { ...defaultContext, ...context }),
    info: (message, context) => log('info', message, { ...defaultContext, ...context }),
    warn: (message, context) => log('warn', message, { ...defaultContext, ...context }),
    error: (message, context) => log('error', message, { ...defaultContext, ...context }),
    child: (childContext) => bind({ ...defaultContext, ...childContext }),
  });

  return bind({});
}

/**
 * A logger that drops everything. Handy in tests.
 */
export const silentLogger: Logger = createLogger({ sink: () => undefined });

// Default instance for callers that do not pass one
const envLevel = process.env.LOG_LEVEL;
export const logger: Logger = createLogger({
  level: isLogLevel(envLevel) ? envLevel : 'info',
  format:
    process.env.LOG_FORMAT === 'json' || process.env.NODE_ENV === 'production'
      ? 'json'
      : 'text',
});

/**
 * Performance timing utility.
 */
export async function timeOperation<T>(
  name: string,
  operation: () => Promise<T>,
  log: Logger = logger
): Promise<T> {
  const start = performance.now();

  try {
    return await operation();
  } finally {
    log.debug(`${name} completed`, { durationMs: Math.round(performance.now() - start) });
  }
}
