/**
 * Runtime configuration from environment variables, with CLI overrides.
 */

import { z } from 'zod';
import { getDefaultDbPath } from '@todo-list/core';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warning', 'error', 'fatal'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

export const DEFAULT_PORT = 8080;
export const DEFAULT_HOST = '0.0.0.0';

const ENV_KEYS = ['PORT', 'HOST', 'DATABASE_PATH', 'LOG_LEVEL'] as const;

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  HOST: z.string().min(1).default(DEFAULT_HOST),
  DATABASE_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type ConfigEnv = Partial<Record<(typeof ENV_KEYS)[number], string | undefined>>;

export interface AppConfig {
  readonly port: number;
  readonly host: string;
  readonly dbPath: string;
  readonly logLevel: LogLevelName;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Drop empty values so they fall back to defaults */
function compact(env: ConfigEnv): ConfigEnv {
  const out: ConfigEnv = {};
  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value != null && value !== '') out[key] = value;
  }
  return out;
}

/**
 * Build the config from `env`, letting `overrides` (CLI flags, keyed by
 * variable name) win. Throws ConfigError naming every invalid variable.
 */
export function loadConfig(env: ConfigEnv = process.env, overrides: ConfigEnv = {}): AppConfig {
  const parsed = envSchema.safeParse({ ...compact(env), ...compact(overrides) });
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  return {
    port: parsed.data.PORT,
    host: parsed.data.HOST,
    dbPath: parsed.data.DATABASE_PATH ?? getDefaultDbPath(),
    logLevel: parsed.data.LOG_LEVEL,
  };
}
