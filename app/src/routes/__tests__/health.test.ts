import { describe, it, expect } from 'vitest';
import { createHealthRoutes } from '../health.js';
import { InMemorySchemaStore } from '../../services/schema-store.js';
import { AvroCanonicalizer } from '../../services/avro-canonicalizer.js';
import { createMockPool } from '../../../tests/fixtures/pg-test.js';
import { USER_V1 } from '../../../tests/fixtures/schemas.js';

describe('health routes', () => {
  it('reports in-memory storage with the schema count', async () => {
    const schemaStore = new InMemorySchemaStore();
    await schemaStore.put(new AvroCanonicalizer().canonicalize(USER_V1), USER_V1);

    const res = await createHealthRoutes({ schemaStore }).request('/');
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.status).toBe('healthy');
    expect(body.storage).toBe('memory');
    expect(body.version).toBe('1.0.0');
    expect(body.schema_count).toBe(1);
    expect(body.services).toEqual({ registry: { status: 'healthy' } });
    expect(body.uptime_seconds).toBeGreaterThanOrEqual(0);
  });

  it('probes PostgreSQL and caches a healthy result', async () => {
    const pool = createMockPool();
    const app = createHealthRoutes({ schemaStore: new InMemorySchemaStore(), dbPool: pool });

    const first = await app.request('/');
    const body = await first.json();
    expect(first.status).toBe(200);
    expect(body.storage).toBe('postgres');
    expect(body.services.postgresql.status).toBe('healthy');

    await app.request('/');
    expect(pool.connect).toHaveBeenCalledTimes(1);
    expect(pool._mockClient.release).toHaveBeenCalledTimes(1);
  });

  it('answers 503 when PostgreSQL is unreachable', async () => {
    const pool = createMockPool();
    pool._mockClient.query.mockRejectedValue(new Error('connection terminated'));
    const app = createHealthRoutes({ schemaStore: new InMemorySchemaStore(), dbPool: pool });

    const res = await app.request('/');
    const body = await res.json();
    expect(res.status).toBe(503);
    expect(body.status).toBe('unhealthy');
    expect(body.services.postgresql.status).toBe('unreachable');
    expect(body.services.postgresql.error).toBe('connection terminated');
    expect(body.schema_count).toBeUndefined();
  });
});
