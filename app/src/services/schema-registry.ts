/**
 * SchemaRegistry: the public operation surface of the registry core.
 *
 * Composes the Schema Store, Subject-Version Index, Config Store and
 * Compatibility Engine. Readers never lock. Writers serialize per scope key
 * through a KeyedMutex; schema-id assignment is serialized separately inside
 * the Schema Store.
 *
 * `register` canonicalizes and runs the compatibility check before taking the
 * scope lock, then re-reads the reference versions under the lock and
 * re-evaluates only if they moved. Every failure is thrown as a
 * RegistryError before any mutation happens.
 */
import {
  CompatibilityError,
  InternalRegistryError,
  RegistryError,
  SchemaIdNotFoundError,
  SchemaNotFoundError,
  SubjectNotFoundError,
  VersionNotFoundError,
} from '../errors.js';
import type {
  CanonicalizedSchema,
  CompatibilityMode,
  RegisterResult,
  StoredSchema,
  SubjectConfig,
  SubjectSchemaInfo,
  SubjectScope,
  SubjectVersion,
  VersionRef,
} from '../types/registry.js';
import {
  parseCompatibilityMode,
  parseSchemaId,
  parseSchemaText,
  parseScope,
  parseVersionRef,
} from '../validation.js';
import { AvroCanonicalizer, type SchemaCanonicalizer } from './avro-canonicalizer.js';
import {
  checkCompatibility,
  referencesFor,
  type CompatibilityResult,
  type ReferenceSchema,
} from './compatibility-engine.js';
import type { ConfigStore } from './config-store.js';
import { KeyedMutex } from './keyed-mutex.js';
import type { SchemaStore } from './schema-store.js';
import type { SubjectVersionIndex } from './subject-version-index.js';

export type RegistryLogFn = (
  level: 'error' | 'warn' | 'info' | 'debug',
  data: Record<string, unknown>,
) => void;

export interface SchemaRegistryDeps {
  schemaStore: SchemaStore;
  versionIndex: SubjectVersionIndex;
  configStore: ConfigStore;
  /** Defaults to the Avro canonicalizer. */
  canonicalizer?: SchemaCanonicalizer;
  log?: RegistryLogFn;
}

interface ReferenceSnapshot {
  readonly mode: CompatibilityMode;
  readonly versions: readonly number[];
  readonly references: readonly ReferenceSchema[];
}

export class SchemaRegistry {
  private readonly schemaStore: SchemaStore;
  private readonly versionIndex: SubjectVersionIndex;
  private readonly configStore: ConfigStore;
  private readonly canonicalizer: SchemaCanonicalizer;
  private readonly log: RegistryLogFn;
  private readonly scopeLocks = new KeyedMutex();

  constructor(deps: SchemaRegistryDeps) {
    this.schemaStore = deps.schemaStore;
    this.versionIndex = deps.versionIndex;
    this.configStore = deps.configStore;
    this.canonicalizer = deps.canonicalizer ?? new AvroCanonicalizer();
    this.log = deps.log ?? (() => {});
  }

  // ─── Writes ─────────────────────────────────────────────────

  /**
   * Register a schema under a subject and return its global id.
   *
   * Re-registering a schema the subject already holds as a live version
   * returns that version with `created: false` and skips the compatibility
   * check.
   */
  async register(subject: string, type: string, schemaText: string): Promise<RegisterResult> {
    return this.guard('register', async () => {
      const scope = parseScope(subject, type);
      const candidate = this.canonicalize(schemaText);

      // Optimistic pass outside the lock.
      const before = await this.snapshot(scope.key);
      const precheck = this.evaluate(candidate, before);

      return this.scopeLocks.runExclusive(scope.key, async () => {
        const existing = await this.findRegistered(scope.key, candidate.fingerprint);
        if (existing) {
          this.log('debug', { event: 'schema_already_registered', subject: scope.key, ...existing });
          return { id: existing.schemaId, version: existing.version, created: false };
        }

        const current = await this.snapshot(scope.key);
        const result = sameSnapshot(before, current) ? precheck : this.evaluate(candidate, current);
        if (!result.compatible) {
          this.log('info', {
            event: 'compatibility_rejected',
            subject: scope.key,
            mode: result.mode,
            checked_versions: result.checkedVersions,
            violations: result.violations.length,
          });
          throw new CompatibilityError(scope.key, result.mode, result.violations);
        }

        const { schema, created: schemaCreated } = await this.schemaStore.put(candidate, schemaText);
        const appended = await this.versionIndex.appendVersion(scope.key, schema.id);
        this.log('info', {
          event: 'schema_registered',
          subject: scope.key,
          id: schema.id,
          version: appended.version,
          new_schema: schemaCreated,
          new_version: appended.created,
        });
        return { id: schema.id, version: appended.version, created: appended.created };
      });
    });
  }

  /** Soft-delete one version; returns its number. */
  async deleteVersion(subject: string, type: string, version: VersionRef | string): Promise<number> {
    return this.guard('delete_version', async () => {
      const scope = parseScope(subject, type);
      const ref = parseVersionRef(version);
      return this.scopeLocks.runExclusive(scope.key, async () => {
        const row = await this.versionIndex.getVersion(scope.key, ref);
        const deleted = await this.versionIndex.softDeleteVersion(scope.key, row.version);
        this.log('info', { event: 'version_deleted', subject: scope.key, version: deleted });
        return deleted;
      });
    });
  }

  /** Soft-delete every live version; returns their numbers ascending. */
  async deleteSubject(subject: string, type: string): Promise<number[]> {
    return this.guard('delete_subject', async () => {
      const scope = parseScope(subject, type);
      return this.scopeLocks.runExclusive(scope.key, async () => {
        const removed = await this.versionIndex.deleteSubject(scope.key);
        this.log('info', { event: 'subject_deleted', subject: scope.key, versions: removed });
        return removed;
      });
    });
  }

  /**
   * Hard-delete the soft-deleted versions of a subject. Live versions are
   * untouched and version numbers are still never reused.
   */
  async purgeSubject(subject: string, type: string): Promise<number[]> {
    return this.guard('purge_subject', async () => {
      const scope = parseScope(subject, type);
      return this.scopeLocks.runExclusive(scope.key, async () => {
        const purged = await this.versionIndex.purgeSubject(scope.key);
        this.log('info', { event: 'subject_purged', subject: scope.key, versions: purged });
        return purged;
      });
    });
  }

  // ─── Reads ──────────────────────────────────────────────────

  async getSchemaById(id: number | string): Promise<StoredSchema> {
    return this.guard('get_schema_by_id', async () => this.schemaStore.getById(parseSchemaId(id)));
  }

  async getSchema(subject: string, type: string, version: VersionRef | string = 'latest'): Promise<SubjectSchemaInfo> {
    return this.guard('get_schema', async () => {
      const scope = parseScope(subject, type);
      const row = await this.versionIndex.getVersion(scope.key, parseVersionRef(version));
      return this.toInfo(row);
    });
  }

  async listVersions(subject: string, type: string): Promise<number[]> {
    return this.guard('list_versions', async () => {
      const scope = parseScope(subject, type);
      return this.versionIndex.listVersions(scope.key);
    });
  }

  async listSubjects(): Promise<string[]> {
    return this.guard('list_subjects', async () => this.versionIndex.listSubjects());
  }

  /** Look up a schema under a subject without registering it. */
  async checkSchema(subject: string, type: string, schemaText: string): Promise<SubjectSchemaInfo> {
    return this.guard('check_schema', async () => {
      const scope = parseScope(subject, type);
      const candidate = this.canonicalize(schemaText);
      const existing = await this.findRegistered(scope.key, candidate.fingerprint);
      if (existing) return this.toInfo(existing);
      const history = await this.versionIndex.history(scope.key);
      if (history.length === 0) throw new SubjectNotFoundError(scope.key);
      throw new SchemaNotFoundError(scope.key);
    });
  }

  /** Compatibility of a candidate against `latest` (per mode) or one version. */
  async testCompatibility(
    subject: string,
    type: string,
    schemaText: string,
    version: VersionRef | string = 'latest',
  ): Promise<boolean> {
    const result = await this.explainCompatibility(subject, type, schemaText, version);
    return result.compatible;
  }

  /** Like testCompatibility, but returns the violations behind the verdict. */
  async explainCompatibility(
    subject: string,
    type: string,
    schemaText: string,
    version: VersionRef | string = 'latest',
  ): Promise<CompatibilityResult> {
    return this.guard('test_compatibility', async () => {
      const scope = parseScope(subject, type);
      const ref = parseVersionRef(version);
      const candidate = this.canonicalize(schemaText);
      const mode = await this.configStore.getEffectiveMode(scope.key);

      let rows: readonly SubjectVersion[];
      if (ref === 'latest') {
        const history = await this.versionIndex.history(scope.key);
        if (history.length === 0) throw new VersionNotFoundError(scope.key, 'latest');
        rows = referencesFor(mode, history);
      } else {
        rows = [await this.versionIndex.getVersion(scope.key, ref)];
      }

      const references = await this.loadReferences(rows);
      return checkCompatibility(candidate.canonical, references, mode);
    });
  }

  // ─── Config ─────────────────────────────────────────────────

  async getGlobalConfig(): Promise<CompatibilityMode> {
    return this.guard('get_global_config', async () => this.configStore.getGlobalDefault());
  }

  async setGlobalConfig(mode: string): Promise<CompatibilityMode> {
    return this.guard('set_global_config', async () => {
      const parsed = parseCompatibilityMode(mode);
      await this.configStore.setGlobalDefault(parsed);
      this.log('info', { event: 'global_config_updated', mode: parsed });
      return parsed;
    });
  }

  async getSubjectConfig(subject: string, type: string): Promise<SubjectConfig> {
    return this.guard('get_subject_config', async () => {
      const scope = parseScope(subject, type);
      return this.subjectConfig(scope);
    });
  }

  async setSubjectConfig(subject: string, type: string, mode: string): Promise<CompatibilityMode> {
    return this.guard('set_subject_config', async () => {
      const scope = parseScope(subject, type);
      const parsed = parseCompatibilityMode(mode);
      await this.configStore.setOverride(scope.key, parsed);
      this.log('info', { event: 'subject_config_updated', subject: scope.key, mode: parsed });
      return parsed;
    });
  }

  /** Remove a subject override; returns the now-effective config. */
  async clearSubjectConfig(subject: string, type: string): Promise<SubjectConfig> {
    return this.guard('clear_subject_config', async () => {
      const scope = parseScope(subject, type);
      const previous = await this.configStore.clearOverride(scope.key);
      this.log('info', { event: 'subject_config_cleared', subject: scope.key, previous: previous ?? null });
      return this.subjectConfig(scope);
    });
  }

  // ─── Internals ──────────────────────────────────────────────

  private canonicalize(schemaText: string): CanonicalizedSchema {
    return this.canonicalizer.canonicalize(parseSchemaText(schemaText));
  }

  private async subjectConfig(scope: SubjectScope): Promise<SubjectConfig> {
    const override = await this.configStore.getOverride(scope.key);
    if (override) return { compatibility: override, source: 'subject' };
    return { compatibility: await this.configStore.getGlobalDefault(), source: 'global' };
  }

  /** Live version of the scope holding a schema with this fingerprint. */
  private async findRegistered(scopeKey: string, fingerprint: string): Promise<SubjectVersion | undefined> {
    const schema = await this.schemaStore.getByFingerprint(fingerprint);
    if (!schema) return undefined;
    return this.versionIndex.findBySchemaId(scopeKey, schema.id);
  }

  private async snapshot(scopeKey: string): Promise<ReferenceSnapshot> {
    const mode = await this.configStore.getEffectiveMode(scopeKey);
    const rows = mode === 'NONE' ? [] : referencesFor(mode, await this.versionIndex.history(scopeKey));
    return {
      mode,
      versions: rows.map((row) => row.version),
      references: await this.loadReferences(rows),
    };
  }

  private async loadReferences(rows: readonly SubjectVersion[]): Promise<ReferenceSchema[]> {
    return Promise.all(
      rows.map(async (row) => ({ version: row.version, schema: (await this.schemaFor(row)).canonical })),
    );
  }

  /** A version pointing at a missing schema id is store corruption, not a 404. */
  private async schemaFor(row: SubjectVersion): Promise<StoredSchema> {
    try {
      return await this.schemaStore.getById(row.schemaId);
    } catch (err) {
      if (err instanceof SchemaIdNotFoundError) {
        throw new InternalRegistryError(
          `Version ${row.version} of ${row.scopeKey} references missing schema ${row.schemaId}`,
          err,
        );
      }
      throw err;
    }
  }

  private evaluate(candidate: CanonicalizedSchema, snapshot: ReferenceSnapshot): CompatibilityResult {
    return checkCompatibility(candidate.canonical, snapshot.references, snapshot.mode);
  }

  private async toInfo(row: SubjectVersion): Promise<SubjectSchemaInfo> {
    const stored = await this.schemaFor(row);
    return { subject: row.scopeKey, version: row.version, id: stored.id, schema: stored.raw };
  }

  /** Pass RegistryErrors through; surface anything else as an internal error. */
  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof RegistryError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      this.log('error', { event: 'registry_internal_error', operation, message });
      throw new InternalRegistryError(`${operation} failed: ${message}`, err);
    }
  }
}

function sameSnapshot(a: ReferenceSnapshot, b: ReferenceSnapshot): boolean {
  return a.mode === b.mode && a.versions.length === b.versions.length && a.versions.every((v, i) => v === b.versions[i]);
}
