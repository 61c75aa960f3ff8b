/**
 * Registry domain types: subjects, versions, stored schemas and
 * compatibility modes.
 *
 * A subject is addressed by its scope key `{name}-{type}`. Versions are
 * subject-scoped pointers into the global, append-only schema log.
 */
import type { AvroSchema } from './avro.js';

/** Subject schema type: which half of a record the schema describes. */
export const SCHEMA_TYPES = ['key', 'value'] as const;
export type SchemaType = (typeof SCHEMA_TYPES)[number];

/** Schema formats the registry can canonicalize. */
export type SchemaFormat = 'AVRO';

/** Parsed subject scope. `key` is the rendered `{name}-{type}` form. */
export interface SubjectScope {
  readonly name: string;
  readonly type: SchemaType;
  readonly key: string;
}

export const COMPATIBILITY_MODES = [
  'NONE',
  'BACKWARD',
  'BACKWARD_TRANSITIVE',
  'FORWARD',
  'FORWARD_TRANSITIVE',
  'FULL',
  'FULL_TRANSITIVE',
] as const;
export type CompatibilityMode = (typeof COMPATIBILITY_MODES)[number];

/** Sentinel scope key for the registry-wide compatibility default. */
export const GLOBAL_CONFIG_KEY = '__GLOBAL__';

/** Output of a successful canonicalization. */
export interface CanonicalizedSchema {
  readonly format: SchemaFormat;
  readonly canonical: AvroSchema;
  readonly canonicalText: string;
  /** SHA-256 hex digest of `canonicalText`. */
  readonly fingerprint: string;
}

/** Immutable entry of the schema log. */
export interface StoredSchema extends CanonicalizedSchema {
  readonly id: number;
  /** Text as first submitted, for exact round-trip. */
  readonly raw: string;
}

export interface SchemaPutResult {
  readonly schema: StoredSchema;
  /** False when an entry with the same fingerprint already existed. */
  readonly created: boolean;
}

/** One row of a subject's version history. */
export interface SubjectVersion {
  readonly scopeKey: string;
  readonly version: number;
  readonly schemaId: number;
  readonly deleted: boolean;
}

export interface AppendVersionResult {
  readonly version: number;
  /** False when a live version already pointed at the same schema id. */
  readonly created: boolean;
}

/** Version selector: an explicit number or the highest live version. */
export type VersionRef = number | 'latest';

/** A schema as seen through a subject version. */
export interface SubjectSchemaInfo {
  readonly subject: string;
  readonly version: number;
  readonly id: number;
  readonly schema: string;
}

export interface RegisterResult {
  readonly id: number;
  readonly version: number;
  /** False when the subject already held this schema as a live version. */
  readonly created: boolean;
}

export interface SubjectConfig {
  readonly compatibility: CompatibilityMode;
  /** Whether the mode is a subject override or inherited from the global default. */
  readonly source: 'subject' | 'global';
}
