import { config as loadEnv } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { logLevelSchema, logger } from './logger.js';

export const DEFAULT_BASE_URL = 'https://api.runwayml.com/v1';

// Project root first, then the package directory
function defaultEnvPaths(): string[] {
  return [
    resolve(process.cwd(), '../.env'),
    resolve(process.cwd(), '../../.env'),
    resolve(process.cwd(), '.env')
  ];
}

/**
 * Loads the first `.env` file found. Values in the file win over shell exports.
 * Returns the path that was loaded, or null when none was found.
 */
export function loadDotenv(envPaths: string[] = defaultEnvPaths()): string | null {
  for (const envPath of envPaths) {
    const result = loadEnv({ path: envPath, override: true });
    if (!result.error) {
      logger.debug({ envPath }, 'Loaded .env');
      return envPath;
    }
  }

  logger.debug({ envPaths }, 'Could not load .env');
  return null;
}

const schema = z.object({
  RUNWAYML_API_SECRET: z.preprocess(
    (val) => (typeof val === 'string' && val.trim().length === 0 ? undefined : val),
    z.string().optional()
  ),
  RUNWAYML_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  RUNWAYML_POLL_INTERVAL_SECONDS: z.coerce.number().positive().default(5),
  RUNWAYML_TIMEOUT_SECONDS: z.coerce.number().positive().default(300),
  LOG_LEVEL: logLevelSchema.default('info')
});

export type RuntimeConfig = z.infer<typeof schema>;

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  try {
    return schema.parse({
      RUNWAYML_API_SECRET: env.RUNWAYML_API_SECRET,
      RUNWAYML_BASE_URL: env.RUNWAYML_BASE_URL || undefined,
      RUNWAYML_POLL_INTERVAL_SECONDS: env.RUNWAYML_POLL_INTERVAL_SECONDS || undefined,
      RUNWAYML_TIMEOUT_SECONDS: env.RUNWAYML_TIMEOUT_SECONDS || undefined,
      LOG_LEVEL: env.LOG_LEVEL || undefined
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      const invalidFields = error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
      throw new ConfigurationError(`Configuration validation failed: ${invalidFields}`);
    }
    throw error;
  }
}
