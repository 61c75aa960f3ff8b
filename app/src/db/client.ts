import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;

/** Largest value an INTEGER / SERIAL column holds. */
export const PG_INT_MAX = 2_147_483_647;

export type DbLogFn = (level: 'error' | 'warn' | 'info', data: Record<string, unknown>) => void;

export interface DbClientOptions {
  connectionString: string;
  minConnections?: number;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
  log?: DbLogFn;
}

/**
 * Create a PostgreSQL connection pool.
 *
 * Registry writes are short transactions, so a small pool suffices:
 * min 2 keeps a warm connection for health checks.
 */
export function createDbPool(opts: DbClientOptions): DbPool {
  const pool = new Pool({
    connectionString: opts.connectionString,
    min: opts.minConnections ?? 2,
    max: opts.maxConnections ?? 10,
    idleTimeoutMillis: opts.idleTimeoutMs ?? 30_000,
    connectionTimeoutMillis: opts.connectionTimeoutMs ?? 5_000,
  });

  pool.on('error', (err) => {
    opts.log?.('error', {
      event: 'pg_pool_error',
      message: err.message,
    });
  });

  pool.on('connect', () => {
    opts.log?.('info', { event: 'pg_pool_connect' });
  });

  return pool;
}

/**
 * Health check: acquires and releases a connection.
 * Returns latency in ms or throws on failure.
 */
export async function checkDbHealth(pool: DbPool): Promise<number> {
  const start = Date.now();
  const client = await pool.connect();
  try {
    await client.query('SELECT 1');
    return Date.now() - start;
  } finally {
    client.release();
  }
}

/** Drain all connections. */
export async function closeDbPool(pool: DbPool): Promise<void> {
  await pool.end();
}
