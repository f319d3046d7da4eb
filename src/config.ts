/**
 * Configuration
 * Resolved once at process start and handed to the server or function handler
 */

import { resolve } from 'path';

export interface AppConfig {
  /** Path to the SQLite file holding county_health_rankings and zip_county */
  databasePath: string;
  port: number;
  host: string;
  /** `*` allows any origin */
  corsOrigins: string[];
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST = '0.0.0.0';
export const DEFAULT_DATABASE_FILE = 'data.db';

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid port: ${value}`);
  }
  return port;
}

function parseOrigins(value: string | undefined): string[] {
  if (!value) return ['*'];
  const origins = value.split(',').map((origin) => origin.trim()).filter(Boolean);
  return origins.length > 0 ? origins : ['*'];
}

/**
 * Build the config from environment variables, with explicit overrides
 * (usually CLI flags) taking precedence.
 */
export function resolveConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<AppConfig> = {}
): Readonly<AppConfig> {
  return Object.freeze({
    databasePath: resolve(overrides.databasePath ?? (env.COUNTY_DATA_DB || DEFAULT_DATABASE_FILE)),
    port: overrides.port ?? (env.PORT ? parsePort(env.PORT) : DEFAULT_PORT),
    host: overrides.host ?? (env.HOST || DEFAULT_HOST),
    corsOrigins: overrides.corsOrigins ?? parseOrigins(env.CORS_ORIGINS),
  });
}
