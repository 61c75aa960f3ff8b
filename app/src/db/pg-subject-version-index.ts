/**
 * PostgresSubjectVersionIndex: version history in `subject_versions`, with
 * the per-scope high-water mark in `subject_version_marks`.
 *
 * Appends run in a transaction holding a scope-keyed advisory lock, so
 * replicas sharing the database never hand out the same version number.
 * Single-statement mutations rely on row-level atomicity.
 */
import type pg from 'pg';
import type { SubjectVersionIndex } from '../services/subject-version-index.js';
import { SubjectNotFoundError, VersionNotFoundError } from '../errors.js';
import { PG_INT_MAX } from './client.js';
import type { AppendVersionResult, SubjectVersion, VersionRef } from '../types/registry.js';
import { lockScope, withTransaction } from './transaction.js';

interface VersionRow {
  scope_key: string;
  version: number;
  schema_id: number;
  deleted: boolean;
}

const VERSION_COLUMNS = 'scope_key, version, schema_id, deleted';

function toVersion(row: VersionRow): SubjectVersion {
  return {
    scopeKey: row.scope_key,
    version: row.version,
    schemaId: row.schema_id,
    deleted: row.deleted,
  };
}

function ascending(rows: ReadonlyArray<{ version: number }>): number[] {
  return rows.map((row) => row.version).sort((a, b) => a - b);
}

export class PostgresSubjectVersionIndex implements SubjectVersionIndex {
  constructor(private readonly pool: pg.Pool) {}

  async appendVersion(scopeKey: string, schemaId: number): Promise<AppendVersionResult> {
    return withTransaction(this.pool, async (client) => {
      await lockScope(client, scopeKey);

      const existing = await client.query<{ version: number }>(
        `SELECT version FROM subject_versions
         WHERE scope_key = $1 AND schema_id = $2 AND NOT deleted
         ORDER BY version LIMIT 1`,
        [scopeKey, schemaId],
      );
      const live = existing.rows[0];
      if (live) return { version: live.version, created: false };

      const mark = await client.query<{ high_water: number }>(
        `INSERT INTO subject_version_marks (scope_key, high_water)
         VALUES ($1, 1)
         ON CONFLICT (scope_key) DO UPDATE
         SET high_water = subject_version_marks.high_water + 1
         RETURNING high_water`,
        [scopeKey],
      );
      const version = mark.rows[0]?.high_water;
      if (version === undefined) {
        throw new Error(`High-water mark for ${scopeKey} was not returned`);
      }

      await client.query(
        'INSERT INTO subject_versions (scope_key, version, schema_id) VALUES ($1, $2, $3)',
        [scopeKey, version, schemaId],
      );
      return { version, created: true };
    });
  }

  async listVersions(scopeKey: string): Promise<number[]> {
    const result = await this.pool.query<{ version: number }>(
      'SELECT version FROM subject_versions WHERE scope_key = $1 AND NOT deleted ORDER BY version',
      [scopeKey],
    );
    if (result.rows.length === 0) throw new SubjectNotFoundError(scopeKey);
    return ascending(result.rows);
  }

  async getVersion(scopeKey: string, version: VersionRef): Promise<SubjectVersion> {
    if (version !== 'latest' && version > PG_INT_MAX) throw new VersionNotFoundError(scopeKey, version);
    const result =
      version === 'latest'
        ? await this.pool.query<VersionRow>(
            `SELECT ${VERSION_COLUMNS} FROM subject_versions
             WHERE scope_key = $1 AND NOT deleted
             ORDER BY version DESC LIMIT 1`,
            [scopeKey],
          )
        : await this.pool.query<VersionRow>(
            `SELECT ${VERSION_COLUMNS} FROM subject_versions
             WHERE scope_key = $1 AND version = $2 AND NOT deleted`,
            [scopeKey, version],
          );
    const row = result.rows[0];
    if (!row) throw new VersionNotFoundError(scopeKey, version);
    return toVersion(row);
  }

  async softDeleteVersion(scopeKey: string, version: number): Promise<number> {
    if (version > PG_INT_MAX) throw new VersionNotFoundError(scopeKey, version);
    const result = await this.pool.query<{ version: number }>(
      `UPDATE subject_versions SET deleted = true
       WHERE scope_key = $1 AND version = $2 AND NOT deleted
       RETURNING version`,
      [scopeKey, version],
    );
    if (result.rows.length === 0) throw new VersionNotFoundError(scopeKey, version);
    return version;
  }

  async deleteSubject(scopeKey: string): Promise<number[]> {
    const result = await this.pool.query<{ version: number }>(
      `UPDATE subject_versions SET deleted = true
       WHERE scope_key = $1 AND NOT deleted
       RETURNING version`,
      [scopeKey],
    );
    return ascending(result.rows);
  }

  async purgeSubject(scopeKey: string): Promise<number[]> {
    const result = await this.pool.query<{ version: number }>(
      'DELETE FROM subject_versions WHERE scope_key = $1 AND deleted RETURNING version',
      [scopeKey],
    );
    return ascending(result.rows);
  }

  async history(scopeKey: string): Promise<SubjectVersion[]> {
    const result = await this.pool.query<VersionRow>(
      `SELECT ${VERSION_COLUMNS} FROM subject_versions
       WHERE scope_key = $1 AND NOT deleted
       ORDER BY version`,
      [scopeKey],
    );
    return result.rows.map(toVersion);
  }

  async findBySchemaId(scopeKey: string, schemaId: number): Promise<SubjectVersion | undefined> {
    const result = await this.pool.query<VersionRow>(
      `SELECT ${VERSION_COLUMNS} FROM subject_versions
       WHERE scope_key = $1 AND schema_id = $2 AND NOT deleted
       ORDER BY version LIMIT 1`,
      [scopeKey, schemaId],
    );
    const row = result.rows[0];
    return row ? toVersion(row) : undefined;
  }

  async listSubjects(): Promise<string[]> {
    const result = await this.pool.query<{ scope_key: string }>(
      'SELECT DISTINCT scope_key FROM subject_versions WHERE NOT deleted',
    );
    // Sorted here so ordering matches the in-memory index regardless of collation.
    return result.rows.map((row) => row.scope_key).sort();
  }
}
