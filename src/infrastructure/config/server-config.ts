import { z } from 'zod';
import { InvalidConfigurationError } from '../../domain/index.js';
import { toValidationIssues } from '../../application/index.js';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Environment contract for the host process.
 *
 * `REDIS_URL` is optional: without it events stay in-process and the
 * Redis relay is not started.
 */
const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: logLevelSchema.default('info'),
  REDIS_URL: z.string().url().optional(),
  THING_CATALOG: z.string().min(1).default('config/things.json'),
});

export type LogLevel = z.infer<typeof logLevelSchema>;

export interface ServerConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  redisUrl: string | undefined;
  thingCatalogPath: string;
}

/** Reads and validates the process environment. Empty strings count as unset. */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      'Invalid server configuration',
      toValidationIssues(parsed.error),
    );
  }

  return {
    host: parsed.data.HOST,
    port: parsed.data.PORT,
    logLevel: parsed.data.LOG_LEVEL,
    redisUrl: parsed.data.REDIS_URL,
    thingCatalogPath: parsed.data.THING_CATALOG,
  };
}
