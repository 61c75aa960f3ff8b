/**
 * PostgresSchemaStore: the schema log in the `schemas` table.
 *
 * The fingerprint's UNIQUE constraint is the dedup point and the SERIAL
 * sequence the single id source, so concurrent registry replicas agree on
 * ids without an application lock. The canonical structure is rebuilt from
 * `raw_text` on read, which canonicalizes deterministically.
 */
import type pg from 'pg';
import type { SchemaCanonicalizer } from '../services/avro-canonicalizer.js';
import type { SchemaStore } from '../services/schema-store.js';
import { InternalRegistryError, SchemaIdNotFoundError } from '../errors.js';
import { PG_INT_MAX } from './client.js';
import type { CanonicalizedSchema, SchemaPutResult, StoredSchema } from '../types/registry.js';

interface SchemaRow {
  id: number;
  fingerprint: string;
  format: string;
  canonical_text: string;
  raw_text: string;
}

const SCHEMA_COLUMNS = 'id, fingerprint, format, canonical_text, raw_text';

export class PostgresSchemaStore implements SchemaStore {
  constructor(
    private readonly pool: pg.Pool,
    private readonly canonicalizer: SchemaCanonicalizer,
  ) {}

  async put(schema: CanonicalizedSchema, raw: string): Promise<SchemaPutResult> {
    const inserted = await this.pool.query<SchemaRow>(
      `INSERT INTO schemas (fingerprint, format, canonical_text, raw_text)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (fingerprint) DO NOTHING
       RETURNING ${SCHEMA_COLUMNS}`,
      [schema.fingerprint, schema.format, schema.canonicalText, raw],
    );
    const created = inserted.rows[0];
    if (created) return { schema: this.toStored(created), created: true };

    const existing = await this.getByFingerprint(schema.fingerprint);
    if (!existing) {
      throw new InternalRegistryError(`Schema ${schema.fingerprint} conflicted on insert but is not readable`);
    }
    return { schema: existing, created: false };
  }

  async getById(id: number): Promise<StoredSchema> {
    // Beyond the SERIAL range no row can match, and pg would reject the parameter.
    if (id > PG_INT_MAX) throw new SchemaIdNotFoundError(id);
    const result = await this.pool.query<SchemaRow>(`SELECT ${SCHEMA_COLUMNS} FROM schemas WHERE id = $1`, [id]);
    const row = result.rows[0];
    if (!row) throw new SchemaIdNotFoundError(id);
    return this.toStored(row);
  }

  async getByFingerprint(fingerprint: string): Promise<StoredSchema | undefined> {
    const result = await this.pool.query<SchemaRow>(
      `SELECT ${SCHEMA_COLUMNS} FROM schemas WHERE fingerprint = $1`,
      [fingerprint],
    );
    const row = result.rows[0];
    return row ? this.toStored(row) : undefined;
  }

  async count(): Promise<number> {
    const result = await this.pool.query<{ count: number }>('SELECT COUNT(*)::int AS count FROM schemas');
    return result.rows[0]?.count ?? 0;
  }

  private toStored(row: SchemaRow): StoredSchema {
    if (row.format !== this.canonicalizer.format) {
      throw new InternalRegistryError(`Schema ${row.id} has unsupported format ${row.format}`);
    }
    const { canonical } = this.canonicalizer.canonicalize(row.raw_text);
    return {
      id: row.id,
      format: this.canonicalizer.format,
      canonical,
      canonicalText: row.canonical_text,
      fingerprint: row.fingerprint,
      raw: row.raw_text,
    };
  }
}
