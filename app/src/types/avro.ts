/**
 * Canonical Avro structure produced by the canonicalizer and consumed by
 * the compatibility engine.
 *
 * Named types (record, enum, fixed) are fully defined at their first
 * occurrence; later occurrences are `ref` nodes resolved through the
 * `named` table of the owning {@link AvroSchema}.
 */

export const AVRO_PRIMITIVES = [
  'null',
  'boolean',
  'int',
  'long',
  'float',
  'double',
  'bytes',
  'string',
] as const;
export type AvroPrimitiveName = (typeof AVRO_PRIMITIVES)[number];

/** JSON value as it may appear in a field default. */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface AvroPrimitive {
  readonly type: AvroPrimitiveName;
}

export interface AvroField {
  readonly name: string;
  readonly type: AvroType;
  readonly aliases: readonly string[];
  /** Present only when the field declares a default. */
  readonly default?: JsonValue;
}

export interface AvroRecord {
  readonly type: 'record';
  readonly name: string;
  readonly aliases: readonly string[];
  readonly fields: readonly AvroField[];
}

export interface AvroEnum {
  readonly type: 'enum';
  readonly name: string;
  readonly aliases: readonly string[];
  readonly symbols: readonly string[];
  readonly default?: string;
}

export interface AvroFixed {
  readonly type: 'fixed';
  readonly name: string;
  readonly aliases: readonly string[];
  readonly size: number;
}

export interface AvroArray {
  readonly type: 'array';
  readonly items: AvroType;
}

export interface AvroMap {
  readonly type: 'map';
  readonly values: AvroType;
}

export interface AvroUnion {
  readonly type: 'union';
  readonly branches: readonly AvroType[];
}

/** Reference to a named type defined elsewhere in the same schema. */
export interface AvroRef {
  readonly type: 'ref';
  readonly name: string;
}

export type AvroNamed = AvroRecord | AvroEnum | AvroFixed;

export type AvroType =
  | AvroPrimitive
  | AvroNamed
  | AvroArray
  | AvroMap
  | AvroUnion
  | AvroRef;

/** A whole canonical schema: its root type plus every named type by full name. */
export interface AvroSchema {
  readonly root: AvroType;
  readonly named: Readonly<Record<string, AvroNamed>>;
}
