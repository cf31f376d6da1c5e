/**
 * Environment Configuration Loader
 *
 * Reads formwire's environment variables and validates them with zod.
 *
 * Env vars:
 * - `FORMWIRE_LOG_FORMAT`: 'json' | 'pretty' (default: 'pretty')
 * - `FORMWIRE_LOG_LEVEL`: pino level or 'silent' (default: 'info')
 */

import { z } from 'zod';
import { ConfigurationError } from './core/errors.js';

export const LogFormatSchema = z.enum(['json', 'pretty']);
export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export type LogFormat = z.infer<typeof LogFormatSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface FormwireConfig {
  logFormat: LogFormat;
  logLevel: LogLevel;
}

function readEnum<T extends string>(
  env: NodeJS.ProcessEnv,
  variable: string,
  schema: z.ZodType<T>,
  fallback: T
): T {
  const raw = env[variable];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const result = schema.safeParse(raw.trim().toLowerCase());
  if (!result.success) {
    throw new ConfigurationError(variable, `unsupported value '${raw}'`);
  }
  return result.data;
}

/**
 * Load configuration from environment variables.
 *
 * @throws {ConfigurationError} If a variable holds an unsupported value
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): FormwireConfig {
  return {
    logFormat: readEnum(env, 'FORMWIRE_LOG_FORMAT', LogFormatSchema, 'pretty'),
    logLevel: readEnum(env, 'FORMWIRE_LOG_LEVEL', LogLevelSchema, 'info'),
  };
}
