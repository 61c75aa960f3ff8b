import { describe, it, expect, beforeEach } from 'vitest';
import { PostgresConfigStore } from '../../src/db/pg-config-store.js';
import { InternalRegistryError } from '../../src/errors.js';
import { createMockPool, type MockPool } from '../fixtures/pg-test.js';

describe('PostgresConfigStore', () => {
  let pool: MockPool;
  let store: PostgresConfigStore;

  beforeEach(() => {
    pool = createMockPool();
    store = new PostgresConfigStore(pool, 'FORWARD');
  });

  it('falls back to the initial default before a global row exists', async () => {
    expect(await store.getGlobalDefault()).toBe('FORWARD');
    expect(pool._queries[0]?.values).toEqual(['__GLOBAL__']);
  });

  it('upserts the global default under the sentinel key', async () => {
    expect(await store.setGlobalDefault('FULL')).toBe('FULL');
    expect(pool._queries[0]?.text).toContain('ON CONFLICT (scope_key) DO UPDATE');
    expect(pool._queries[0]?.values).toEqual(['__GLOBAL__', 'FULL']);
  });

  it('resolves the effective mode from override, then global row, then initial default', async () => {
    expect(await store.getEffectiveMode('orders-value')).toBe('FORWARD');

    pool._setResponse('ANY($1::text[])', { rows: [{ scope_key: '__GLOBAL__', mode: 'NONE' }], rowCount: 1 });
    expect(await store.getEffectiveMode('orders-value')).toBe('NONE');

    pool._setResponse('ANY($1::text[])', {
      rows: [
        { scope_key: '__GLOBAL__', mode: 'NONE' },
        { scope_key: 'orders-value', mode: 'FULL_TRANSITIVE' },
      ],
      rowCount: 2,
    });
    expect(await store.getEffectiveMode('orders-value')).toBe('FULL_TRANSITIVE');
    expect(pool._queries.at(-1)?.values).toEqual([['orders-value', '__GLOBAL__']]);
  });

  it('returns the removed override', async () => {
    pool._setResponse('DELETE FROM compatibility_config', { rows: [{ mode: 'BACKWARD' }], rowCount: 1 });
    expect(await store.clearOverride('orders-value')).toBe('BACKWARD');
  });

  it('rejects an unrecognised stored mode', async () => {
    pool._setResponse('SELECT mode FROM compatibility_config', { rows: [{ mode: 'SIDEWAYS' }], rowCount: 1 });
    await expect(store.getOverride('orders-value')).rejects.toBeInstanceOf(InternalRegistryError);
  });
});
