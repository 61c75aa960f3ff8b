import { describe, it, expect, beforeEach } from 'vitest';
import type { Hono } from 'hono';
import { createCompatibilityRoutes } from '../compatibility.js';
import type { SchemaRegistry } from '../../services/schema-registry.js';
import { createMemoryRegistry, jsonRequest } from '../../../tests/fixtures/registry.js';
import { USER_V1, USER_V2_OPTIONAL_EMAIL, USER_V2_REQUIRED_AGE } from '../../../tests/fixtures/schemas.js';

describe('compatibility routes', () => {
  let registry: SchemaRegistry;
  let app: Hono;

  beforeEach(() => {
    registry = createMemoryRegistry().registry;
    app = createCompatibilityRoutes({ registry });
  });

  function check(path: string, schema: string) {
    return app.request(path, jsonRequest('POST', { schema }));
  }

  it('answers 404 when the subject has no versions', async () => {
    const res = await check('/subjects/orders-value/versions/latest', USER_V1);
    expect(res.status).toBe(404);
    expect((await res.json()).error).toBe('version_not_found');
  });

  it('reports a compatible candidate', async () => {
    await registry.register('orders', 'value', USER_V1);
    const res = await check('/subjects/orders-value/versions/latest', USER_V2_OPTIONAL_EMAIL);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ is_compatible: true });
  });

  it('reports an incompatible candidate without registering it', async () => {
    await registry.register('orders', 'value', USER_V1);
    const res = await check('/subjects/orders-value/versions/1', USER_V2_REQUIRED_AGE);
    expect(await res.json()).toEqual({ is_compatible: false });
    expect(await registry.listVersions('orders', 'value')).toEqual([1]);
  });

  it('lists violation messages when verbose', async () => {
    await registry.register('orders', 'value', USER_V1);
    const res = await check('/subjects/orders-value/versions/latest?verbose=true', USER_V2_REQUIRED_AGE);
    expect(await res.json()).toEqual({
      is_compatible: false,
      messages: ["READER_FIELD_MISSING_DEFAULT_VALUE at $.age: field 'age' added without a default value"],
    });
  });

  it('answers 404 for a missing explicit version', async () => {
    await registry.register('orders', 'value', USER_V1);
    const res = await check('/subjects/orders-value/versions/7', USER_V1);
    expect(res.status).toBe(404);
  });
});
