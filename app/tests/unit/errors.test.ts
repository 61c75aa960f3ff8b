import { describe, it, expect } from 'vitest';
import {
  CompatibilityError,
  InternalRegistryError,
  InvalidArgumentError,
  RegistryError,
  SchemaParseError,
  VersionNotFoundError,
  type CompatibilityViolation,
} from '../../src/errors.js';

const violation: CompatibilityViolation = {
  rule: 'READER_FIELD_MISSING_DEFAULT_VALUE',
  path: '$.age',
  direction: 'backward',
  version: 1,
  message: "field 'age' added without a default value",
};

describe('RegistryError hierarchy', () => {
  it('summarizes the first violation of a CompatibilityError', () => {
    const err = new CompatibilityError('orders-value', 'BACKWARD', [violation]);

    expect(err).toBeInstanceOf(RegistryError);
    expect(err).toBeInstanceOf(Error);
    expect(err.status).toBe(409);
    expect(err.code).toBe('incompatible_schema');
    expect(err.message).toBe(
      "Schema is incompatible with subject 'orders-value' under BACKWARD: READER_FIELD_MISSING_DEFAULT_VALUE at $.age: field 'age' added without a default value",
    );
    expect(err.body.violations).toEqual([violation]);
  });

  it('falls back to a bare summary without violations', () => {
    expect(new CompatibilityError('orders-value', 'FULL', []).message).toBe(
      "Schema is incompatible with subject 'orders-value' under FULL: incompatible",
    );
  });

  it('locates schema parse errors', () => {
    const err = new SchemaParseError('unknown type "strng"', '$.fields[0].type');
    expect(err.message).toBe('Invalid schema at $.fields[0].type: unknown type "strng"');
    expect(err.body).toMatchObject({ path: '$.fields[0].type', diagnostic: 'unknown type "strng"' });
    expect(new SchemaParseError('empty').path).toBe('$');
  });

  it('formats version lookups for latest', () => {
    expect(new VersionNotFoundError('orders-value', 'latest').message).toBe(
      'Version latest not found for subject orders-value',
    );
  });

  it('keeps the cause of internal errors', () => {
    const cause = new Error('disk full');
    const err = new InternalRegistryError('register failed: disk full', cause);
    expect(err.status).toBe(500);
    expect(err.cause).toBe(cause);
  });

  it('renders a log-friendly string', () => {
    expect(String(new InvalidArgumentError('id', 'bad id'))).toBe('InvalidArgumentError(422) invalid_argument: bad id');
  });

  it('recognizes registry errors', () => {
    expect(RegistryError.isRegistryError(new InvalidArgumentError('id', 'bad id'))).toBe(true);
    expect(RegistryError.isRegistryError(new Error('plain'))).toBe(false);
  });
});
