/**
 * Run a callback inside BEGIN/COMMIT on a dedicated pool client,
 * rolling back and rethrowing on failure. The client is always released.
 */
import type pg from 'pg';
import type { DbPool } from './client.js';

export async function withTransaction<T>(
  pool: DbPool,
  fn: (client: pg.PoolClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

/**
 * Serialize writers of one scope across registry replicas for the rest of
 * the transaction.
 */
export async function lockScope(client: pg.PoolClient, scopeKey: string): Promise<void> {
  await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [scopeKey]);
}
