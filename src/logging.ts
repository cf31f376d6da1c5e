/**
 * Structured Logging
 *
 * Factory for the pino-based logger every formwire component warns through.
 * Supports JSON and pretty output via FORMWIRE_LOG_FORMAT env var.
 */

import pino from 'pino';
import { loadConfigFromEnv, type LogFormat, type LogLevel } from './config.js';

export type { LogFormat, LogLevel } from './config.js';

export interface LoggerOptions {
  format?: LogFormat;
  level?: LogLevel;
  name?: string;
  /** Write records to this destination instead of stdout (json format only) */
  destination?: pino.DestinationStream;
}

/**
 * Create a pino logger instance.
 *
 * Options not given fall back to the environment:
 *   FORMWIRE_LOG_FORMAT = json | pretty (default: pretty)
 *   FORMWIRE_LOG_LEVEL  = info | debug | warn | error | silent (default: info)
 */
export function createLogger(options?: LoggerOptions): pino.Logger {
  const needsEnv = options?.format === undefined || options.level === undefined;
  const config = needsEnv ? loadConfigFromEnv() : undefined;
  const format = options?.format ?? config?.logFormat ?? 'pretty';
  const level = options?.level ?? config?.logLevel ?? 'info';

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options?.name ?? 'formwire',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };

  if (options?.destination) {
    return pino(pinoOptions, options.destination);
  }

  if (format === 'pretty') {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(pinoOptions);
}

/** Singleton logger for the library */
let _logger: pino.Logger | undefined;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

/** Replace the global logger (useful for testing) */
export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}

/** Create a child logger with additional bindings */
export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return getLogger().child(bindings);
}

export type Logger = pino.Logger;
