import type { LogLevel } from './middleware/logger.js';
import type { CompatibilityMode } from './types/registry.js';
import { isCompatibilityMode } from './validation.js';

export interface RegistryConfig {
  port: number;
  nodeEnv: string;
  logLevel: LogLevel;

  /** PostgreSQL connection string. Null selects the in-memory stores. */
  databaseUrl: string | null;
  /** Apply pending SQL migrations at startup. Only meaningful with a database. */
  runMigrations: boolean;

  /** Global compatibility mode until one is set through the API. */
  defaultCompatibility: CompatibilityMode;
  /** Request body limit in bytes. */
  maxSchemaBytes: number;
}

const LOG_LEVELS: ReadonlySet<string> = new Set(['error', 'warn', 'info', 'debug']);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

function parsePositiveInt(name: string, raw: string): number {
  const value = parseInt(raw, 10);
  if (!Number.isInteger(value) || value <= 0 || String(value) !== raw.trim()) {
    throw new Error(`${name} must be a positive integer (got '${raw}')`);
  }
  return value;
}

/**
 * Environment variables:
 *
 * REGISTRY_PORT                  (optional): HTTP listen port; default 8081
 * DATABASE_URL                   (optional): PostgreSQL connection string; unset keeps everything in memory
 * REGISTRY_RUN_MIGRATIONS        (optional): 'false' skips startup migrations; default true
 * REGISTRY_DEFAULT_COMPATIBILITY (optional): initial global mode; default BACKWARD
 * REGISTRY_MAX_SCHEMA_BYTES      (optional): request body limit; default 1048576
 * NODE_ENV                       (optional): runtime environment; default 'development'
 * LOG_LEVEL                      (optional): error | warn | info | debug; default 'info'
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RegistryConfig {
  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of error, warn, info, debug (got '${logLevel}')`);
  }

  const defaultCompatibility = (env.REGISTRY_DEFAULT_COMPATIBILITY ?? 'BACKWARD').trim().toUpperCase();
  if (!isCompatibilityMode(defaultCompatibility)) {
    throw new Error(`REGISTRY_DEFAULT_COMPATIBILITY is not a compatibility mode (got '${defaultCompatibility}')`);
  }

  const databaseUrl = env.DATABASE_URL || null;

  return {
    port: parsePositiveInt('REGISTRY_PORT', env.REGISTRY_PORT ?? '8081'),
    nodeEnv: env.NODE_ENV ?? 'development',
    logLevel,
    databaseUrl,
    runMigrations: databaseUrl !== null && env.REGISTRY_RUN_MIGRATIONS !== 'false',
    defaultCompatibility,
    maxSchemaBytes: parsePositiveInt('REGISTRY_MAX_SCHEMA_BYTES', env.REGISTRY_MAX_SCHEMA_BYTES ?? '1048576'),
  };
}
