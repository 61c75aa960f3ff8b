import { describe, it, expect, beforeEach } from 'vitest';
import type { Hono } from 'hono';
import { createConfigRoutes } from '../config.js';
import { createMemoryRegistry, jsonRequest } from '../../../tests/fixtures/registry.js';

describe('config routes', () => {
  let app: Hono;

  beforeEach(() => {
    app = createConfigRoutes({ registry: createMemoryRegistry().registry });
  });

  it('reads and updates the global mode', async () => {
    expect(await (await app.request('/')).json()).toEqual({ compatibilityLevel: 'BACKWARD' });

    const res = await app.request('/', jsonRequest('PUT', { compatibility: 'full' }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ compatibility: 'FULL' });
    expect(await (await app.request('/')).json()).toEqual({ compatibilityLevel: 'FULL' });
  });

  it('rejects an unknown mode', async () => {
    const res = await app.request('/', jsonRequest('PUT', { compatibility: 'SIDEWAYS' }));
    expect(res.status).toBe(422);
    const body = await res.json();
    expect(body.error).toBe('invalid_compatibility_mode');
    expect(body.mode).toBe('SIDEWAYS');
  });

  it('rejects a body without a mode', async () => {
    const res = await app.request('/', jsonRequest('PUT', { level: 'FULL' }));
    expect(res.status).toBe(422);
    expect((await res.json()).error).toBe('invalid_argument');
  });

  it('sets, reads and clears a subject override', async () => {
    expect(await (await app.request('/orders-value')).json()).toEqual({
      compatibilityLevel: 'BACKWARD',
      source: 'global',
    });

    const put = await app.request('/orders-value', jsonRequest('PUT', { compatibilityLevel: 'NONE' }));
    expect(await put.json()).toEqual({ compatibility: 'NONE' });
    expect(await (await app.request('/orders-value')).json()).toEqual({
      compatibilityLevel: 'NONE',
      source: 'subject',
    });

    const cleared = await app.request('/orders-value', { method: 'DELETE' });
    expect(await cleared.json()).toEqual({ compatibilityLevel: 'BACKWARD', source: 'global' });
  });

  it('keeps overrides per schema type', async () => {
    await app.request('/orders-key', jsonRequest('PUT', { compatibility: 'FORWARD' }));
    expect((await (await app.request('/orders-value')).json()).source).toBe('global');
  });
});
