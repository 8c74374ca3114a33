import os from 'node:os';
import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv, type LogLevel } from './env.schema.js';

// Validate environment variables (reads NODE_ENV directly from process.env)
const env = validateLoggerEnv(process.env);

export type Logger = pino.Logger;

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

// Cache for loggers
const loggerCache = new Map<string, Logger>();

// Root logger instance
let rootLogger: Logger | undefined;

let currentLevel: LogLevel = env.LOGGER_LOG_LEVEL;

function isTestEnvironment(): boolean {
  // vitest may set NODE_ENV after this module was first evaluated
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

/**
 * Creates and configures the root logger instance.
 *
 * Logs go to stderr so that `--json` output on stdout stays parseable.
 */
function createRootLogger(): Logger {
  const options: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: currentLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isTestEnvironment() || !env.LOGGER_CONSOLE_ENABLED) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino(options, noopStream);
  }

  if (env.NODE_ENV === 'development') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        destination: 2,
        ignore: 'pid,hostname,category,categoryLabel,service,environment',
        messageFormat: '[{categoryLabel}]: {msg}',
        translateTime: 'yyyy-mm-dd HH:MM:ss.l',
      },
    };
    return pino(options);
  }

  return pino(options, pino.destination(2));
}

/**
 * Returns a logger for the specified logging category.
 * Creates a child logger from the root logger with category-specific context.
 */
export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) {
    return cached;
  }

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 20),
  });

  loggerCache.set(category, categoryLogger);

  return categoryLogger;
}

/**
 * Change the level of the root logger and of every logger handed out so far.
 * Child loggers copy the level at creation, so each cached one is updated too.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
  if (rootLogger) {
    rootLogger.level = level;
  }
  for (const logger of loggerCache.values()) {
    logger.level = level;
  }
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}
