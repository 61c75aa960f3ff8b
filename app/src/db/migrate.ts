/**
 * Migration Runner: forward-only SQL migrations.
 *
 * Discovers `NNN_name.sql` files in `migrations/`, records applied ones in a
 * `_migrations` table with their checksum, and applies pending ones in
 * numeric order, each in its own transaction. Re-running is a no-op.
 * A session advisory lock keeps replicas from migrating concurrently.
 */
import { readdir, readFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createHash } from 'node:crypto';
import type { DbLogFn, DbPool } from './client.js';

/**
 * Map an application name to a 31-bit positive advisory lock id, so
 * unrelated apps sharing a cluster do not contend.
 */
export function computeLockId(appName: string): number {
  const hash = createHash('sha256').update(appName).digest();
  return hash.readUInt32BE(0) & 0x7fffffff;
}

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEFAULT_MIGRATIONS_DIR = join(__dirname, 'migrations');
const MIGRATION_LOCK_ID = computeLockId('schema-registry:migration');
const LOCK_TIMEOUT_MS = 30_000;

export interface MigrateOptions {
  /** Directory holding the .sql files. Defaults to `migrations/` beside this module. */
  migrationsDir?: string;
  log?: DbLogFn;
}

export interface MigrationResult {
  /** Filenames of newly applied migrations. */
  applied: string[];
  /** Filenames of previously applied migrations. */
  skipped: string[];
  /** Total migration files discovered. */
  total: number;
  /** Checksum mismatches on already-applied files. */
  warnings: string[];
}

function computeChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

async function ensureMigrationsTable(pool: DbPool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      filename TEXT NOT NULL UNIQUE,
      checksum TEXT NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `);
}

async function getAppliedMigrations(pool: DbPool): Promise<Map<string, string>> {
  const result = await pool.query<{ filename: string; checksum: string }>(
    'SELECT filename, checksum FROM _migrations ORDER BY id',
  );
  const map = new Map<string, string>();
  for (const row of result.rows) {
    map.set(row.filename, row.checksum);
  }
  return map;
}

function migrationNumber(filename: string): number {
  return parseInt(filename.split('_')[0] ?? '', 10);
}

/** SQL files in the directory, sorted numerically. `_down` files are ignored. */
export async function discoverMigrations(dir: string = DEFAULT_MIGRATIONS_DIR): Promise<string[]> {
  const files = await readdir(dir);
  return files
    .filter((f) => f.endsWith('.sql') && !f.includes('_down'))
    .sort((a, b) => migrationNumber(a) - migrationNumber(b));
}

/** Apply every pending migration in order. */
export async function migrate(pool: DbPool, opts: MigrateOptions = {}): Promise<MigrationResult> {
  const dir = opts.migrationsDir ?? DEFAULT_MIGRATIONS_DIR;
  const result: MigrationResult = {
    applied: [],
    skipped: [],
    total: 0,
    warnings: [],
  };

  const lockClient = await pool.connect();
  try {
    await lockClient.query(`SELECT set_config('lock_timeout', $1, false)`, [`${LOCK_TIMEOUT_MS}ms`]);
    await lockClient.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_ID]);
  } catch (err) {
    lockClient.release();
    throw new Error(
      `Failed to acquire migration lock within ${LOCK_TIMEOUT_MS}ms: ` +
        `${err instanceof Error ? err.message : String(err)}`,
    );
  }

  try {
    await lockClient.query("SET lock_timeout = '0'");
    await ensureMigrationsTable(pool);
    const applied = await getAppliedMigrations(pool);
    const migrationFiles = await discoverMigrations(dir);
    result.total = migrationFiles.length;

    for (const filename of migrationFiles) {
      const content = await readFile(join(dir, filename), 'utf-8');
      const checksum = computeChecksum(content);

      const existingChecksum = applied.get(filename);
      if (existingChecksum !== undefined) {
        if (existingChecksum !== checksum) {
          result.warnings.push(
            `Checksum mismatch for ${filename}: expected ${existingChecksum}, got ${checksum}. Migration file has changed after application.`,
          );
        }
        result.skipped.push(filename);
        continue;
      }

      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        await client.query(content);
        await client.query('INSERT INTO _migrations (filename, checksum) VALUES ($1, $2)', [filename, checksum]);
        await client.query('COMMIT');
        result.applied.push(filename);
        opts.log?.('info', { event: 'migration_applied', filename });
      } catch (err) {
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
          opts.log?.('warn', {
            event: 'migration_rollback_failed',
            filename,
            message: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr),
          });
        });
        throw new Error(`Migration ${filename} failed: ${err instanceof Error ? err.message : String(err)}`);
      } finally {
        client.release();
      }
    }

    return result;
  } finally {
    // An unlock failure must not mask the migration outcome; the lock dies with the session anyway.
    await lockClient.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_ID]).catch((unlockErr: unknown) => {
      opts.log?.('warn', {
        event: 'migration_unlock_failed',
        message: unlockErr instanceof Error ? unlockErr.message : String(unlockErr),
      });
    });
    lockClient.release();
  }
}
