import { describe, it, expect, beforeEach } from 'vitest';
import { SchemaRegistry, type RegistryLogFn } from '../../src/services/schema-registry.js';
import { InMemorySchemaStore } from '../../src/services/schema-store.js';
import { InMemorySubjectVersionIndex } from '../../src/services/subject-version-index.js';
import { InMemoryConfigStore } from '../../src/services/config-store.js';
import {
  CompatibilityError,
  InternalRegistryError,
  InvalidArgumentError,
  InvalidModeError,
  SchemaIdNotFoundError,
  SchemaNotFoundError,
  SchemaParseError,
  SubjectNotFoundError,
  VersionNotFoundError,
} from '../../src/errors.js';
import {
  USER_RENAMED_ID,
  USER_V1,
  USER_V1_REFORMATTED,
  USER_V2_OPTIONAL_EMAIL,
  USER_V2_REQUIRED_AGE,
  counterSchema,
  recordSchema,
} from '../fixtures/schemas.js';

interface LogEntry {
  level: Parameters<RegistryLogFn>[0];
  data: Record<string, unknown>;
}

function setup(versionIndex = new InMemorySubjectVersionIndex()) {
  const logs: LogEntry[] = [];
  const schemaStore = new InMemorySchemaStore();
  const registry = new SchemaRegistry({
    schemaStore,
    versionIndex,
    configStore: new InMemoryConfigStore(),
    log: (level, data) => logs.push({ level, data }),
  });
  return { registry, schemaStore, logs };
}

function events(logs: LogEntry[]): unknown[] {
  return logs.map((entry) => entry.data.event);
}

describe('SchemaRegistry', () => {
  let registry: SchemaRegistry;
  let schemaStore: InMemorySchemaStore;
  let logs: LogEntry[];

  beforeEach(() => {
    ({ registry, schemaStore, logs } = setup());
  });

  describe('register', () => {
    it('registers the first version of a subject', async () => {
      expect(await registry.register('users', 'value', USER_V1)).toEqual({ id: 1, version: 1, created: true });
      expect(logs.find((l) => l.data.event === 'schema_registered')?.data).toMatchObject({
        subject: 'users-value',
        id: 1,
        version: 1,
      });
    });

    it('is idempotent for the same canonical schema', async () => {
      await registry.register('users', 'value', USER_V1);
      expect(await registry.register('users', 'value', USER_V1)).toEqual({ id: 1, version: 1, created: false });
      expect(await registry.register('users', 'value', USER_V1_REFORMATTED)).toEqual({
        id: 1,
        version: 1,
        created: false,
      });
      expect(await registry.listVersions('users', 'value')).toEqual([1]);
    });

    it('shares one id across subjects', async () => {
      await registry.register('users', 'value', USER_V1);
      expect(await registry.register('customers', 'value', USER_V1)).toEqual({ id: 1, version: 1, created: true });
      expect(await registry.register('users', 'key', USER_V1)).toEqual({ id: 1, version: 1, created: true });
      expect(await schemaStore.count()).toBe(1);
    });

    it('appends compatible evolutions', async () => {
      await registry.register('users', 'value', USER_V1);
      expect(await registry.register('users', 'value', USER_V2_OPTIONAL_EMAIL)).toEqual({
        id: 2,
        version: 2,
        created: true,
      });
      expect(await registry.listVersions('users', 'value')).toEqual([1, 2]);
    });

    it('rejects incompatible schemas without storing anything', async () => {
      await registry.register('users', 'value', USER_V1);
      const err = await registry.register('users', 'value', USER_V2_REQUIRED_AGE).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(CompatibilityError);
      if (!(err instanceof CompatibilityError)) return;
      expect(err.status).toBe(409);
      expect(err.mode).toBe('BACKWARD');
      expect(err.violations.map((v) => v.path)).toEqual(['$.age']);
      expect(await registry.listVersions('users', 'value')).toEqual([1]);
      expect(await schemaStore.count()).toBe(1);
      expect(events(logs)).toContain('compatibility_rejected');
    });

    it('rejects dropping a required field under BACKWARD', async () => {
      await registry.register('users', 'value', USER_V1);
      await expect(registry.register('users', 'value', USER_RENAMED_ID)).rejects.toBeInstanceOf(CompatibilityError);
    });

    it('accepts any first version whatever the mode', async () => {
      await registry.setGlobalConfig('FULL_TRANSITIVE');
      expect(await registry.register('users', 'value', USER_V2_REQUIRED_AGE)).toEqual({
        id: 1,
        version: 1,
        created: true,
      });
    });

    it('skips the check under NONE', async () => {
      await registry.register('users', 'value', USER_V1);
      await registry.setSubjectConfig('users', 'value', 'NONE');
      expect(await registry.register('users', 'value', '"string"')).toEqual({ id: 2, version: 2, created: true });
    });

    it('rejects unparseable schemas before touching the stores', async () => {
      await expect(registry.register('users', 'value', '{"type":"record"')).rejects.toBeInstanceOf(SchemaParseError);
      await expect(registry.register('users', 'value', '')).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(await schemaStore.count()).toBe(0);
      expect(await registry.listSubjects()).toEqual([]);
    });

    it('validates subject and type', async () => {
      const badSubject = await registry.register('', 'value', USER_V1).catch((e: unknown) => e);
      expect(badSubject).toBeInstanceOf(InvalidArgumentError);
      expect(badSubject instanceof InvalidArgumentError && badSubject.parameter).toBe('subject');

      const badType = await registry.register('users', 'both', USER_V1).catch((e: unknown) => e);
      expect(badType instanceof InvalidArgumentError && badType.parameter).toBe('type');
    });

    it('ignores deleted versions when checking compatibility', async () => {
      const v1 = recordSchema('Metric', [{ name: 'n', type: 'int' }]);
      const v2 = recordSchema('Metric', [{ name: 'n', type: 'long' }]);
      const candidate = recordSchema('Metric', [
        { name: 'n', type: 'int' },
        { name: 'unit', type: 'string', default: 'ms' },
      ]);
      await registry.register('metrics', 'value', v1);
      await registry.register('metrics', 'value', v2);
      await expect(registry.register('metrics', 'value', candidate)).rejects.toBeInstanceOf(CompatibilityError);

      await registry.deleteVersion('metrics', 'value', 2);
      expect(await registry.register('metrics', 'value', candidate)).toEqual({ id: 3, version: 3, created: true });
    });

    it('surfaces store failures as internal errors', async () => {
      class FailingIndex extends InMemorySubjectVersionIndex {
        override async appendVersion(): Promise<never> {
          throw new Error('disk full');
        }
      }
      const failing = setup(new FailingIndex());

      const err = await failing.registry.register('users', 'value', USER_V1).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(InternalRegistryError);
      expect(err instanceof InternalRegistryError && err.message).toBe('register failed: disk full');
      expect(failing.logs.find((l) => l.data.event === 'registry_internal_error')).toEqual({
        level: 'error',
        data: { event: 'registry_internal_error', operation: 'register', message: 'disk full' },
      });
    });
  });

  describe('concurrent registration', () => {
    it('assigns exactly versions 1..N to N distinct compatible schemas', async () => {
      const n = 20;
      const results = await Promise.all(
        Array.from({ length: n }, (_, i) => registry.register('counters', 'value', counterSchema(i + 1))),
      );

      const versions = results.map((r) => r.version).sort((a, b) => a - b);
      expect(versions).toEqual(Array.from({ length: n }, (_, i) => i + 1));
      expect(new Set(results.map((r) => r.id)).size).toBe(n);
      expect(await registry.listVersions('counters', 'value')).toEqual(versions);
    });

    it('creates one version for concurrent identical registrations', async () => {
      const results = await Promise.all(Array.from({ length: 5 }, () => registry.register('users', 'value', USER_V1)));
      expect(results.filter((r) => r.created)).toHaveLength(1);
      expect(new Set(results.map((r) => `${r.id}:${r.version}`))).toEqual(new Set(['1:1']));
    });

    it('re-checks against versions appended while waiting for the lock', async () => {
      await registry.register('events', 'value', recordSchema('Event', [{ name: 'n', type: 'int' }]));
      const withInt = recordSchema('Event', [
        { name: 'n', type: 'int' },
        { name: 'x', type: 'int', default: 0 },
      ]);
      const withString = recordSchema('Event', [
        { name: 'n', type: 'int' },
        { name: 'x', type: 'string', default: '' },
      ]);

      const outcomes = await Promise.allSettled([
        registry.register('events', 'value', withInt),
        registry.register('events', 'value', withString),
      ]);

      expect(outcomes.filter((o) => o.status === 'fulfilled')).toHaveLength(1);
      const rejected = outcomes.filter((o): o is PromiseRejectedResult => o.status === 'rejected');
      expect(rejected).toHaveLength(1);
      expect(rejected[0]?.reason).toBeInstanceOf(CompatibilityError);
      expect(await registry.listVersions('events', 'value')).toEqual([1, 2]);
    });
  });

  describe('reads', () => {
    beforeEach(async () => {
      await registry.register('users', 'value', USER_V1);
      await registry.register('users', 'value', USER_V2_OPTIONAL_EMAIL);
    });

    it('returns a version with its id and raw text', async () => {
      expect(await registry.getSchema('users', 'value', 1)).toEqual({
        subject: 'users-value',
        version: 1,
        id: 1,
        schema: USER_V1,
      });
      expect((await registry.getSchema('users', 'value')).version).toBe(2);
      expect((await registry.getSchema('users', 'value', 'latest')).version).toBe(2);
      expect((await registry.getSchema('users', 'value', '-1')).version).toBe(2);
    });

    it('rejects missing and malformed versions', async () => {
      await expect(registry.getSchema('users', 'value', 3)).rejects.toBeInstanceOf(VersionNotFoundError);
      await expect(registry.getSchema('users', 'value', '0')).rejects.toBeInstanceOf(InvalidArgumentError);
      await expect(registry.getSchema('orders', 'value')).rejects.toBeInstanceOf(VersionNotFoundError);
    });

    it('returns schemas by global id', async () => {
      expect((await registry.getSchemaById(2)).raw).toBe(USER_V2_OPTIONAL_EMAIL);
      expect((await registry.getSchemaById('1')).raw).toBe(USER_V1);
      await expect(registry.getSchemaById(9)).rejects.toBeInstanceOf(SchemaIdNotFoundError);
      await expect(registry.getSchemaById('abc')).rejects.toBeInstanceOf(InvalidArgumentError);
    });

    it('lists subjects and versions', async () => {
      await registry.register('accounts', 'key', '"string"');
      expect(await registry.listSubjects()).toEqual(['accounts-key', 'users-value']);
      await expect(registry.listVersions('orders', 'value')).rejects.toBeInstanceOf(SubjectNotFoundError);
    });
  });

  describe('deletion', () => {
    beforeEach(async () => {
      await registry.register('users', 'value', USER_V1);
      await registry.register('users', 'value', USER_V2_OPTIONAL_EMAIL);
    });

    it('soft-deletes one version', async () => {
      expect(await registry.deleteVersion('users', 'value', 1)).toBe(1);
      await expect(registry.getSchema('users', 'value', 1)).rejects.toBeInstanceOf(VersionNotFoundError);
      expect(await registry.listVersions('users', 'value')).toEqual([2]);
      await expect(registry.deleteVersion('users', 'value', 1)).rejects.toBeInstanceOf(VersionNotFoundError);
    });

    it('deletes the latest version by reference', async () => {
      expect(await registry.deleteVersion('users', 'value', 'latest')).toBe(2);
      expect(await registry.listVersions('users', 'value')).toEqual([1]);
    });

    it('keeps the schema reachable by id after its version is deleted', async () => {
      await registry.deleteVersion('users', 'value', 2);
      expect((await registry.getSchemaById(2)).raw).toBe(USER_V2_OPTIONAL_EMAIL);
    });

    it('deletes a whole subject and continues numbering afterwards', async () => {
      expect(await registry.deleteSubject('users', 'value')).toEqual([1, 2]);
      await expect(registry.listVersions('users', 'value')).rejects.toBeInstanceOf(SubjectNotFoundError);
      expect(await registry.listSubjects()).toEqual([]);
      expect((await registry.getSchemaById(1)).raw).toBe(USER_V1);
      expect((await registry.getSchemaById(2)).raw).toBe(USER_V2_OPTIONAL_EMAIL);

      expect(await registry.register('users', 'value', USER_V1)).toEqual({ id: 1, version: 3, created: true });
    });

    it('returns an empty list when deleting an unknown subject', async () => {
      expect(await registry.deleteSubject('orders', 'value')).toEqual([]);
    });

    it('purges soft-deleted versions only', async () => {
      await registry.deleteVersion('users', 'value', 1);
      expect(await registry.purgeSubject('users', 'value')).toEqual([1]);
      expect(await registry.listVersions('users', 'value')).toEqual([2]);
      expect(events(logs)).toContain('subject_purged');
    });
  });

  describe('checkSchema', () => {
    beforeEach(async () => {
      await registry.register('users', 'value', USER_V1);
    });

    it('finds a registered schema in any formatting', async () => {
      expect(await registry.checkSchema('users', 'value', USER_V1_REFORMATTED)).toEqual({
        subject: 'users-value',
        version: 1,
        id: 1,
        schema: USER_V1,
      });
    });

    it('distinguishes an unregistered schema from an unknown subject', async () => {
      await expect(registry.checkSchema('users', 'value', USER_V2_OPTIONAL_EMAIL)).rejects.toBeInstanceOf(
        SchemaNotFoundError,
      );
      await expect(registry.checkSchema('orders', 'value', USER_V1)).rejects.toBeInstanceOf(SubjectNotFoundError);
    });

    it('does not find a schema under a subject that only registered it elsewhere', async () => {
      await registry.register('customers', 'value', USER_V2_OPTIONAL_EMAIL);
      await expect(registry.checkSchema('users', 'value', USER_V2_OPTIONAL_EMAIL)).rejects.toBeInstanceOf(
        SchemaNotFoundError,
      );
    });
  });

  describe('testCompatibility', () => {
    beforeEach(async () => {
      await registry.register('users', 'value', USER_V1);
    });

    it('answers without registering', async () => {
      expect(await registry.testCompatibility('users', 'value', USER_V2_OPTIONAL_EMAIL)).toBe(true);
      expect(await registry.testCompatibility('users', 'value', USER_V2_REQUIRED_AGE)).toBe(false);
      expect(await registry.listVersions('users', 'value')).toEqual([1]);
      expect(await schemaStore.count()).toBe(1);
    });

    it('tests against an explicit version', async () => {
      await registry.register('users', 'value', USER_V2_OPTIONAL_EMAIL);
      await registry.setSubjectConfig('users', 'value', 'FORWARD');
      expect(await registry.testCompatibility('users', 'value', USER_V1, 1)).toBe(true);
      await expect(registry.testCompatibility('users', 'value', USER_V1, 5)).rejects.toBeInstanceOf(
        VersionNotFoundError,
      );
    });

    it('fails for a subject without versions', async () => {
      await expect(registry.testCompatibility('orders', 'value', USER_V1)).rejects.toBeInstanceOf(VersionNotFoundError);
    });

    it('explains incompatibilities', async () => {
      const result = await registry.explainCompatibility('users', 'value', USER_V2_REQUIRED_AGE);
      expect(result.compatible).toBe(false);
      expect(result.checkedVersions).toEqual([1]);
      expect(result.violations.map((v) => v.rule)).toEqual(['READER_FIELD_MISSING_DEFAULT_VALUE']);
    });
  });

  describe('config', () => {
    it('defaults to BACKWARD', async () => {
      expect(await registry.getGlobalConfig()).toBe('BACKWARD');
      expect(await registry.getSubjectConfig('users', 'value')).toEqual({ compatibility: 'BACKWARD', source: 'global' });
    });

    it('normalizes and validates modes', async () => {
      expect(await registry.setGlobalConfig(' full ')).toBe('FULL');
      expect(await registry.getGlobalConfig()).toBe('FULL');
      await expect(registry.setGlobalConfig('SIDEWAYS')).rejects.toBeInstanceOf(InvalidModeError);
      await expect(registry.setSubjectConfig('users', 'value', '')).rejects.toBeInstanceOf(InvalidModeError);
    });

    it('overrides per subject and clears back to the global default', async () => {
      expect(await registry.setSubjectConfig('users', 'value', 'NONE')).toBe('NONE');
      expect(await registry.getSubjectConfig('users', 'value')).toEqual({ compatibility: 'NONE', source: 'subject' });
      expect(await registry.getSubjectConfig('users', 'key')).toEqual({ compatibility: 'BACKWARD', source: 'global' });

      expect(await registry.clearSubjectConfig('users', 'value')).toEqual({ compatibility: 'BACKWARD', source: 'global' });
    });
  });
});
