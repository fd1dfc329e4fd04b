import { pino, type Logger, type LoggerOptions } from 'pino';
import { z } from 'zod';

export type { Logger };

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Level for the package's default logger. Unknown values fall back to `info`;
 * `loadRuntimeConfig` is where a bad LOG_LEVEL is reported.
 */
export function defaultLogLevel(value: string | undefined = process.env.LOG_LEVEL): LogLevel {
  const parsed = logLevelSchema.safeParse(value);
  return parsed.success ? parsed.data : 'info';
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: 'runway-client',
    level: defaultLogLevel(),
    ...options
  });
}

export const logger = createLogger();
