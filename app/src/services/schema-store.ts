/**
 * Schema Store: append-only, content-addressed log of canonical schemas.
 *
 * `put` deduplicates by fingerprint: semantically identical schemas share one
 * id no matter which subject registers them. Ids come from a single
 * monotonic counter and are never reassigned, even after every version that
 * referenced them is deleted.
 */
import { SchemaIdNotFoundError } from '../errors.js';
import type { CanonicalizedSchema, SchemaPutResult, StoredSchema } from '../types/registry.js';
import { Mutex } from './keyed-mutex.js';

export interface SchemaStore {
  /** Store a schema, or return the existing entry with the same fingerprint. */
  put(schema: CanonicalizedSchema, raw: string): Promise<SchemaPutResult>;
  /** @throws SchemaIdNotFoundError */
  getById(id: number): Promise<StoredSchema>;
  getByFingerprint(fingerprint: string): Promise<StoredSchema | undefined>;
  count(): Promise<number>;
}

export class InMemorySchemaStore implements SchemaStore {
  private readonly byId = new Map<number, StoredSchema>();
  private readonly idByFingerprint = new Map<string, number>();
  /** Single serialization point for id assignment. */
  private readonly idLock = new Mutex();
  private lastId = 0;

  async put(schema: CanonicalizedSchema, raw: string): Promise<SchemaPutResult> {
    return this.idLock.runExclusive(() => {
      const existingId = this.idByFingerprint.get(schema.fingerprint);
      const existing = existingId !== undefined ? this.byId.get(existingId) : undefined;
      if (existing) {
        return { schema: existing, created: false };
      }

      const stored: StoredSchema = {
        id: ++this.lastId,
        format: schema.format,
        canonical: schema.canonical,
        canonicalText: schema.canonicalText,
        fingerprint: schema.fingerprint,
        raw,
      };
      this.byId.set(stored.id, stored);
      this.idByFingerprint.set(stored.fingerprint, stored.id);
      return { schema: stored, created: true };
    });
  }

  async getById(id: number): Promise<StoredSchema> {
    const schema = this.byId.get(id);
    if (!schema) throw new SchemaIdNotFoundError(id);
    return schema;
  }

  async getByFingerprint(fingerprint: string): Promise<StoredSchema | undefined> {
    const id = this.idByFingerprint.get(fingerprint);
    return id === undefined ? undefined : this.byId.get(id);
  }

  async count(): Promise<number> {
    return this.byId.size;
  }
}
