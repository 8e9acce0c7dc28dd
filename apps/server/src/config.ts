import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8000;

export interface ServerConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
}

/** Values given on the command line. They win over the environment */
export interface ConfigOverrides {
  host?: string;
  port?: string;
  logLevel?: string;
}

const EnvSchema = z.object({
  TASKTRACK_HOST: z.string().min(1).default(DEFAULT_HOST),
  TASKTRACK_PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  TASKTRACK_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

/**
 * Resolve the server configuration from environment variables and
 * command-line overrides. Empty variables count as unset.
 * Throws with the offending variable names when a value is invalid.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {},
): ServerConfig {
  const pick = (value: string | undefined) => (value === '' ? undefined : value);

  const parsed = EnvSchema.safeParse({
    TASKTRACK_HOST: pick(overrides.host ?? env['TASKTRACK_HOST']),
    TASKTRACK_PORT: pick(overrides.port ?? env['TASKTRACK_PORT']),
    TASKTRACK_LOG_LEVEL: pick(overrides.logLevel ?? env['TASKTRACK_LOG_LEVEL']),
  });

  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }

  return {
    host: parsed.data.TASKTRACK_HOST,
    port: parsed.data.TASKTRACK_PORT,
    logLevel: parsed.data.TASKTRACK_LOG_LEVEL,
  };
}
