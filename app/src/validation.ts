/**
 * Input validation for registry operation parameters.
 *
 * Every helper either returns the narrowed value or throws an
 * InvalidArgumentError / InvalidModeError naming the parameter.
 */
import { z } from 'zod';
import { InvalidArgumentError, InvalidModeError } from './errors.js';
import {
  COMPATIBILITY_MODES,
  SCHEMA_TYPES,
  type CompatibilityMode,
  type SchemaType,
  type SubjectScope,
  type VersionRef,
} from './types/registry.js';

/** Maximum subject name length accepted by the registry. */
export const SUBJECT_NAME_MAX_LENGTH = 255;

const VERSION_RE = /^[1-9]\d*$/;
const SCHEMA_ID_RE = /^[1-9]\d*$/;
const COMPATIBILITY_MODE_SET: ReadonlySet<string> = new Set(COMPATIBILITY_MODES);
const SCHEMA_TYPE_SET: ReadonlySet<string> = new Set(SCHEMA_TYPES);

// ─── Request Schemas ──────────────────────────────────────────

export const SchemaBodySchema = z.object({
  schema: z.string().min(1, 'schema must be a non-empty string'),
  schemaType: z.literal('AVRO').optional(),
});

export const CompatibilityBodySchema = z.union([
  z.object({ compatibility: z.string().min(1) }),
  z.object({ compatibilityLevel: z.string().min(1) }),
]);

// ─── Parameter Helpers ────────────────────────────────────────

export function isSchemaType(value: unknown): value is SchemaType {
  return typeof value === 'string' && SCHEMA_TYPE_SET.has(value);
}

export function isCompatibilityMode(value: unknown): value is CompatibilityMode {
  return typeof value === 'string' && COMPATIBILITY_MODE_SET.has(value);
}

/**
 * Validate a subject name and schema type and build the scope key.
 * Names are any non-empty string without control characters.
 */
export function parseScope(name: unknown, type: unknown): SubjectScope {
  if (typeof name !== 'string' || name.length === 0) {
    throw new InvalidArgumentError('subject', 'subject must be a non-empty string');
  }
  if (name.length > SUBJECT_NAME_MAX_LENGTH) {
    throw new InvalidArgumentError('subject', `subject exceeds ${SUBJECT_NAME_MAX_LENGTH} characters`);
  }
  if (/[\u0000-\u001f\u007f]/.test(name)) {
    throw new InvalidArgumentError('subject', 'subject must not contain control characters');
  }
  if (!isSchemaType(type)) {
    throw new InvalidArgumentError('type', `type must be one of: ${SCHEMA_TYPES.join(', ')}`);
  }
  return { name, type, key: `${name}-${type}` };
}

/**
 * Split a rendered scope key (`orders-value`) at its last hyphen.
 * The inverse of {@link parseScope}'s `key`.
 */
export function parseScopeKey(scopeKey: string): SubjectScope {
  const idx = scopeKey.lastIndexOf('-');
  if (idx <= 0) {
    throw new InvalidArgumentError(
      'subject',
      `subject '${scopeKey}' must be of the form {name}-{key|value}`,
    );
  }
  return parseScope(scopeKey.slice(0, idx), scopeKey.slice(idx + 1));
}

/** Accept a positive integer (number or decimal string) or `"latest"`. */
export function parseVersionRef(value: unknown): VersionRef {
  if (value === undefined || value === 'latest' || value === -1 || value === '-1') return 'latest';
  if (typeof value === 'number' && Number.isSafeInteger(value) && value > 0) return value;
  if (typeof value === 'string' && VERSION_RE.test(value)) {
    const n = Number(value);
    if (Number.isSafeInteger(n)) return n;
  }
  throw new InvalidArgumentError('version', `version must be a positive integer or "latest" (got ${String(value)})`);
}

/** Accept a positive integer schema id (number or decimal string). */
export function parseSchemaId(value: unknown): number {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value > 0) return value;
  if (typeof value === 'string' && SCHEMA_ID_RE.test(value)) {
    const n = Number(value);
    if (Number.isSafeInteger(n)) return n;
  }
  throw new InvalidArgumentError('id', `schema id must be a positive integer (got ${String(value)})`);
}

/** Case-insensitive compatibility mode parsing. */
export function parseCompatibilityMode(value: unknown): CompatibilityMode {
  const normalized = typeof value === 'string' ? value.trim().toUpperCase() : value;
  if (!isCompatibilityMode(normalized)) {
    throw new InvalidModeError(String(value), COMPATIBILITY_MODES);
  }
  return normalized;
}

/** Validate raw schema text before canonicalization. */
export function parseSchemaText(value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InvalidArgumentError('schema', 'schema must be a non-empty string');
  }
  return value;
}

/** Validate a parsed JSON request body against a zod schema. */
export function parseRequestBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'body';
    throw new InvalidArgumentError(field, issue?.message ?? 'invalid request body');
  }
  return result.data;
}
