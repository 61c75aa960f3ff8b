import { Hono } from 'hono';
import type { HealthResponse, ServiceHealth } from '../types.js';
import { checkDbHealth, type DbPool } from '../db/client.js';
import type { SchemaStore } from '../services/schema-store.js';

const VERSION = '1.0.0';
const startedAt = Date.now();

/**
 * Asymmetric cache TTLs: a healthy probe is trusted for 30s, an unhealthy
 * one for 5s so recovery shows up quickly.
 */
const HEALTHY_CACHE_TTL_MS = 30_000;
const UNHEALTHY_CACHE_TTL_MS = 5_000;

export interface HealthDependencies {
  schemaStore: SchemaStore;
  dbPool?: DbPool | null;
}

export function createHealthRoutes(deps: HealthDependencies): Hono {
  const app = new Hono();
  let cachedDbHealth: { data: ServiceHealth; expiresAt: number } | null = null;

  async function getDbHealth(pool: DbPool): Promise<ServiceHealth> {
    const now = Date.now();
    if (cachedDbHealth && now < cachedDbHealth.expiresAt) {
      return cachedDbHealth.data;
    }
    let result: ServiceHealth;
    try {
      result = { status: 'healthy', latency_ms: await checkDbHealth(pool) };
    } catch (err) {
      result = {
        status: 'unreachable',
        latency_ms: Date.now() - now,
        error: err instanceof Error ? err.message : 'Failed to reach PostgreSQL',
      };
    }
    const ttl = result.status === 'healthy' ? HEALTHY_CACHE_TTL_MS : UNHEALTHY_CACHE_TTL_MS;
    cachedDbHealth = { data: result, expiresAt: now + ttl };
    return result;
  }

  app.get('/', async (c) => {
    const services: Record<string, ServiceHealth> = {
      registry: { status: 'healthy' },
    };
    if (deps.dbPool) {
      services.postgresql = await getDbHealth(deps.dbPool);
    }

    const status: HealthResponse['status'] =
      services.postgresql?.status === 'unreachable' ? 'unhealthy' : 'healthy';

    const response: HealthResponse & { schema_count?: number } = {
      status,
      version: VERSION,
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
      storage: deps.dbPool ? 'postgres' : 'memory',
      services,
      timestamp: new Date().toISOString(),
    };
    if (status === 'healthy') {
      response.schema_count = await deps.schemaStore.count();
    }

    return c.json(response, status === 'healthy' ? 200 : 503);
  });

  return app;
}
