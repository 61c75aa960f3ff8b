/**
 * Avro Canonicalizer: parses Avro schema JSON into the registry's
 * canonical structure and fingerprints it.
 *
 * The registry treats canonicalization as a capability behind the
 * {@link SchemaCanonicalizer} interface; this is the default implementation.
 *
 * Canonical form:
 * - full names everywhere (namespaces folded in), `doc`/`order`/logical
 *   types dropped, keys in a fixed order;
 * - each named type inlined at its first occurrence and referenced by full
 *   name after that;
 * - aliases and defaults kept, since they change resolution behaviour.
 *
 * The fingerprint is the SHA-256 hex digest of the canonical JSON text.
 */
import { createHash } from 'node:crypto';
import { z } from 'zod';
import { SchemaParseError } from '../errors.js';
import {
  AVRO_PRIMITIVES,
  type AvroEnum,
  type AvroField,
  type AvroFixed,
  type AvroNamed,
  type AvroPrimitiveName,
  type AvroRecord,
  type AvroSchema,
  type AvroType,
  type JsonValue,
} from '../types/avro.js';
import type { CanonicalizedSchema, SchemaFormat } from '../types/registry.js';

/** Parse schema text into a canonical structural form, or fail. */
export interface SchemaCanonicalizer {
  readonly format: SchemaFormat;
  /** @throws SchemaParseError carrying the parser diagnostic */
  canonicalize(text: string): CanonicalizedSchema;
}

const NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const INT_MIN = -2_147_483_648;
const INT_MAX = 2_147_483_647;
const LONG_BOUND = 2 ** 63;
const PRIMITIVE_SET: ReadonlySet<string> = new Set(AVRO_PRIMITIVES);

// ─── Raw Node Schemas ─────────────────────────────────────────

const AliasesSchema = z.array(z.string()).optional();

const RawFieldSchema = z
  .object({
    name: z.string(),
    type: z.unknown(),
    aliases: AliasesSchema,
    doc: z.string().optional(),
    order: z.enum(['ascending', 'descending', 'ignore']).optional(),
  })
  .passthrough();

const RawRecordSchema = z
  .object({
    type: z.enum(['record', 'error']),
    name: z.string(),
    namespace: z.string().optional(),
    aliases: AliasesSchema,
    doc: z.string().optional(),
    fields: z.array(z.unknown()),
  })
  .passthrough();

const RawEnumSchema = z
  .object({
    type: z.literal('enum'),
    name: z.string(),
    namespace: z.string().optional(),
    aliases: AliasesSchema,
    doc: z.string().optional(),
    symbols: z.array(z.string()),
    default: z.string().optional(),
  })
  .passthrough();

const RawFixedSchema = z
  .object({
    type: z.literal('fixed'),
    name: z.string(),
    namespace: z.string().optional(),
    aliases: AliasesSchema,
    size: z.number().int().nonnegative(),
  })
  .passthrough();

const RawArraySchema = z.object({ type: z.literal('array'), items: z.unknown() }).passthrough();
const RawMapSchema = z.object({ type: z.literal('map'), values: z.unknown() }).passthrough();

function isPrimitiveName(value: string): value is AvroPrimitiveName {
  return PRIMITIVE_SET.has(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasOwn(obj: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/** Validate `input` against a zod schema, reporting the first issue at `path`. */
function parseNode<T>(schema: z.ZodType<T>, input: unknown, path: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${path}.${issue.path.join('.')}` : path;
    throw new SchemaParseError(issue?.message ?? 'invalid schema node', where);
  }
  return result.data;
}

// ─── Parser ───────────────────────────────────────────────────

class AvroParser {
  private readonly named = new Map<string, AvroNamed>();

  parse(json: unknown): AvroSchema {
    const root = this.parseType(json, undefined, '$');
    return { root, named: Object.fromEntries(this.named) };
  }

  private parseType(node: unknown, namespace: string | undefined, path: string): AvroType {
    if (typeof node === 'string') {
      return this.parseTypeName(node, namespace, path);
    }
    if (Array.isArray(node)) {
      return this.parseUnion(node, namespace, path);
    }
    if (!isPlainObject(node)) {
      throw new SchemaParseError(`expected a type name, union or object, got ${JSON.stringify(node)}`, path);
    }

    const type = node.type;
    if (type === undefined) {
      throw new SchemaParseError("missing 'type' attribute", path);
    }
    if (typeof type !== 'string') {
      // {"type": {...}} / {"type": [...]} wraps another schema
      return this.parseType(type, namespace, `${path}.type`);
    }

    switch (type) {
      case 'record':
      case 'error':
        return this.parseRecord(parseNode(RawRecordSchema, node, path), namespace, path);
      case 'enum':
        return this.parseEnum(parseNode(RawEnumSchema, node, path), namespace, path);
      case 'fixed':
        return this.parseFixed(parseNode(RawFixedSchema, node, path), namespace, path);
      case 'array': {
        const raw = parseNode(RawArraySchema, node, path);
        if (!hasOwn(node, 'items')) throw new SchemaParseError("array requires 'items'", path);
        return { type: 'array', items: this.parseType(raw.items, namespace, `${path}.items`) };
      }
      case 'map': {
        const raw = parseNode(RawMapSchema, node, path);
        if (!hasOwn(node, 'values')) throw new SchemaParseError("map requires 'values'", path);
        return { type: 'map', values: this.parseType(raw.values, namespace, `${path}.values`) };
      }
      default:
        return this.parseTypeName(type, namespace, path);
    }
  }

  private parseTypeName(name: string, namespace: string | undefined, path: string): AvroType {
    if (isPrimitiveName(name)) return { type: name };
    const fullName = resolveFullName(name, namespace);
    if (this.named.has(fullName)) return { type: 'ref', name: fullName };
    // Unqualified names also resolve in the null namespace.
    if (this.named.has(name)) return { type: 'ref', name };
    throw new SchemaParseError(`unknown type '${name}'`, path);
  }

  private parseUnion(branches: unknown[], namespace: string | undefined, path: string): AvroType {
    if (branches.length === 0) {
      throw new SchemaParseError('union must declare at least one branch', path);
    }
    const seen = new Set<string>();
    const parsed = branches.map((branch, i) => {
      const branchPath = `${path}[${i}]`;
      const type = this.parseType(branch, namespace, branchPath);
      if (type.type === 'union') {
        throw new SchemaParseError('unions may not immediately contain other unions', branchPath);
      }
      const key = unionBranchKey(type);
      if (seen.has(key)) {
        throw new SchemaParseError(`duplicate union branch '${key}'`, branchPath);
      }
      seen.add(key);
      return type;
    });
    return { type: 'union', branches: parsed };
  }

  private defineName(
    rawName: string,
    rawNamespace: string | undefined,
    enclosing: string | undefined,
    path: string,
  ): { fullName: string; namespace: string | undefined } {
    const namespace = rawNamespace === undefined ? enclosing : rawNamespace || undefined;
    const fullName = resolveFullName(rawName, namespace);
    validateFullName(fullName, `${path}.name`);
    const shortName = fullName.slice(fullName.lastIndexOf('.') + 1);
    if (isPrimitiveName(shortName) && !fullName.includes('.')) {
      throw new SchemaParseError(`'${fullName}' redefines a primitive type`, `${path}.name`);
    }
    if (this.named.has(fullName)) {
      throw new SchemaParseError(`duplicate definition of '${fullName}'`, `${path}.name`);
    }
    const dot = fullName.lastIndexOf('.');
    return { fullName, namespace: dot === -1 ? undefined : fullName.slice(0, dot) };
  }

  private parseAliases(aliases: string[] | undefined, namespace: string | undefined, path: string): string[] {
    const resolved = (aliases ?? []).map((alias, i) => {
      const full = resolveFullName(alias, namespace);
      validateFullName(full, `${path}.aliases[${i}]`);
      return full;
    });
    return [...new Set(resolved)].sort();
  }

  private parseRecord(
    raw: z.infer<typeof RawRecordSchema>,
    enclosing: string | undefined,
    path: string,
  ): AvroRecord {
    const { fullName, namespace } = this.defineName(raw.name, raw.namespace, enclosing, path);
    if (raw.fields.length === 0) {
      throw new SchemaParseError(`record '${fullName}' must declare at least one field`, `${path}.fields`);
    }

    const fields: AvroField[] = [];
    const record: AvroRecord = {
      type: 'record',
      name: fullName,
      aliases: this.parseAliases(raw.aliases, namespace, path),
      fields,
    };
    // Registered before the fields so that self-references resolve.
    this.named.set(fullName, record);

    const fieldNames = new Set<string>();
    raw.fields.forEach((rawField, i) => {
      const fieldPath = `${path}.fields[${i}]`;
      const field = parseNode(RawFieldSchema, rawField, fieldPath);
      if (!NAME_RE.test(field.name)) {
        throw new SchemaParseError(`invalid field name '${field.name}'`, `${fieldPath}.name`);
      }
      if (fieldNames.has(field.name)) {
        throw new SchemaParseError(`duplicate field '${field.name}' in '${fullName}'`, `${fieldPath}.name`);
      }
      fieldNames.add(field.name);
      if (!isPlainObject(rawField) || !hasOwn(rawField, 'type')) {
        throw new SchemaParseError(`field '${field.name}' is missing 'type'`, fieldPath);
      }

      const type = this.parseType(field.type, namespace, `${fieldPath}.type`);
      const aliases = [...new Set(field.aliases ?? [])].sort();
      aliases.forEach((alias, j) => {
        if (!NAME_RE.test(alias)) {
          throw new SchemaParseError(`invalid field alias '${alias}'`, `${fieldPath}.aliases[${j}]`);
        }
      });

      if (isPlainObject(rawField) && hasOwn(rawField, 'default')) {
        const value = toJsonValue(rawField.default);
        if (value === undefined || !isValidDefault(type, value, Object.fromEntries(this.named))) {
          throw new SchemaParseError(
            `default ${JSON.stringify(rawField.default)} does not match the type of field '${field.name}'`,
            `${fieldPath}.default`,
          );
        }
        fields.push({ name: field.name, type, aliases, default: value });
      } else {
        fields.push({ name: field.name, type, aliases });
      }
    });

    return record;
  }

  private parseEnum(raw: z.infer<typeof RawEnumSchema>, enclosing: string | undefined, path: string): AvroEnum {
    const { fullName, namespace } = this.defineName(raw.name, raw.namespace, enclosing, path);
    if (raw.symbols.length === 0) {
      throw new SchemaParseError(`enum '${fullName}' must declare at least one symbol`, `${path}.symbols`);
    }
    const seen = new Set<string>();
    raw.symbols.forEach((symbol, i) => {
      if (!NAME_RE.test(symbol)) {
        throw new SchemaParseError(`invalid enum symbol '${symbol}'`, `${path}.symbols[${i}]`);
      }
      if (seen.has(symbol)) {
        throw new SchemaParseError(`duplicate enum symbol '${symbol}'`, `${path}.symbols[${i}]`);
      }
      seen.add(symbol);
    });
    if (raw.default !== undefined && !seen.has(raw.default)) {
      throw new SchemaParseError(`enum default '${raw.default}' is not a symbol of '${fullName}'`, `${path}.default`);
    }

    const type: AvroEnum = {
      type: 'enum',
      name: fullName,
      aliases: this.parseAliases(raw.aliases, namespace, path),
      symbols: [...raw.symbols],
      ...(raw.default !== undefined ? { default: raw.default } : {}),
    };
    this.named.set(fullName, type);
    return type;
  }

  private parseFixed(raw: z.infer<typeof RawFixedSchema>, enclosing: string | undefined, path: string): AvroFixed {
    const { fullName, namespace } = this.defineName(raw.name, raw.namespace, enclosing, path);
    const type: AvroFixed = {
      type: 'fixed',
      name: fullName,
      aliases: this.parseAliases(raw.aliases, namespace, path),
      size: raw.size,
    };
    this.named.set(fullName, type);
    return type;
  }
}

// ─── Names ────────────────────────────────────────────────────

function resolveFullName(name: string, namespace: string | undefined): string {
  if (name.includes('.') || !namespace) return name;
  return `${namespace}.${name}`;
}

function validateFullName(fullName: string, path: string): void {
  for (const part of fullName.split('.')) {
    if (!NAME_RE.test(part)) {
      throw new SchemaParseError(`invalid name '${fullName}'`, path);
    }
  }
}

function unionBranchKey(type: AvroType): string {
  switch (type.type) {
    case 'record':
    case 'enum':
    case 'fixed':
    case 'ref':
      return type.name;
    default:
      return type.type;
  }
}

// ─── Defaults ─────────────────────────────────────────────────

function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      if (converted === undefined) return undefined;
      items.push(converted);
    }
    return items;
  }
  if (isPlainObject(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toJsonValue(item);
      if (converted === undefined) return undefined;
      out[key] = converted;
    }
    return out;
  }
  return undefined;
}

/** Resolve `ref` nodes against the named-type table. */
export function derefType(type: AvroType, named: Readonly<Record<string, AvroNamed>>): Exclude<AvroType, { type: 'ref' }> {
  if (type.type !== 'ref') return type;
  const target = named[type.name];
  if (!target) {
    throw new SchemaParseError(`unresolved reference '${type.name}'`);
  }
  return target;
}

/**
 * Check a default value against its type. A union default must match the
 * first branch.
 */
export function isValidDefault(type: AvroType, value: JsonValue, named: Readonly<Record<string, AvroNamed>>): boolean {
  const resolved = derefType(type, named);
  switch (resolved.type) {
    case 'null':
      return value === null;
    case 'boolean':
      return typeof value === 'boolean';
    case 'int':
      return typeof value === 'number' && Number.isInteger(value) && value >= INT_MIN && value <= INT_MAX;
    case 'long':
      // JSON.parse has already rounded large literals to an integral double.
      return typeof value === 'number' && Number.isInteger(value) && Math.abs(value) <= LONG_BOUND;
    case 'float':
    case 'double':
      return typeof value === 'number';
    case 'bytes':
    case 'string':
      return typeof value === 'string';
    case 'fixed':
      return typeof value === 'string' && value.length === resolved.size;
    case 'enum':
      return typeof value === 'string' && resolved.symbols.includes(value);
    case 'array':
      return Array.isArray(value) && value.every((item) => isValidDefault(resolved.items, item, named));
    case 'map':
      return (
        isPlainObject(value) &&
        Object.values(value).every((item) => isValidDefault(resolved.values, item, named))
      );
    case 'record':
      if (!isPlainObject(value)) return false;
      return resolved.fields.every((field) => {
        const fieldValue = value[field.name];
        if (fieldValue === undefined) return field.default !== undefined;
        return isValidDefault(field.type, fieldValue, named);
      });
    case 'union': {
      const first = resolved.branches[0];
      return first !== undefined && isValidDefault(first, value, named);
    }
  }
}

// ─── Canonical Rendering ──────────────────────────────────────

function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      const item = value[key];
      if (item !== undefined) out[key] = sortKeys(item);
    }
    return out;
  }
  return value;
}

function renderType(type: AvroType): JsonValue {
  switch (type.type) {
    case 'ref':
      return type.name;
    case 'union':
      return type.branches.map(renderType);
    case 'array':
      return { type: 'array', items: renderType(type.items) };
    case 'map':
      return { type: 'map', values: renderType(type.values) };
    case 'record': {
      const out: { [key: string]: JsonValue } = { name: type.name, type: 'record' };
      if (type.aliases.length > 0) out.aliases = [...type.aliases];
      out.fields = type.fields.map((field) => {
        const f: { [key: string]: JsonValue } = { name: field.name, type: renderType(field.type) };
        if (field.aliases.length > 0) f.aliases = [...field.aliases];
        if (field.default !== undefined) f.default = sortKeys(field.default);
        return f;
      });
      return out;
    }
    case 'enum': {
      const out: { [key: string]: JsonValue } = { name: type.name, type: 'enum' };
      if (type.aliases.length > 0) out.aliases = [...type.aliases];
      out.symbols = [...type.symbols];
      if (type.default !== undefined) out.default = type.default;
      return out;
    }
    case 'fixed': {
      const out: { [key: string]: JsonValue } = { name: type.name, type: 'fixed' };
      if (type.aliases.length > 0) out.aliases = [...type.aliases];
      out.size = type.size;
      return out;
    }
    default:
      return type.type;
  }
}

/** Render the canonical JSON text of a parsed schema. */
export function renderCanonical(schema: AvroSchema): string {
  return JSON.stringify(renderType(schema.root));
}

export function computeFingerprint(canonicalText: string): string {
  return createHash('sha256').update(canonicalText).digest('hex');
}

// ─── Canonicalizer ────────────────────────────────────────────

export class AvroCanonicalizer implements SchemaCanonicalizer {
  readonly format: SchemaFormat = 'AVRO';

  canonicalize(text: string): CanonicalizedSchema {
    if (text.trim().length === 0) {
      throw new SchemaParseError('schema text is empty');
    }
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new SchemaParseError(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    const canonical = new AvroParser().parse(json);
    const canonicalText = renderCanonical(canonical);
    return {
      format: this.format,
      canonical,
      canonicalText,
      fingerprint: computeFingerprint(canonicalText),
    };
  }
}
