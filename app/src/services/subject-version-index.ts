/**
 * Subject-Version Index: per-subject ordered version history.
 *
 * Each scope keeps a map keyed by version number with a deleted flag, plus a
 * high-water mark. New versions continue from the high-water mark, so a
 * number is never handed out twice, not after soft deletion, full subject
 * deletion or purge.
 *
 * The index does not serialize writers itself; the registry façade holds the
 * per-scope lock around every mutation.
 */
import { SubjectNotFoundError, VersionNotFoundError } from '../errors.js';
import type { AppendVersionResult, SubjectVersion, VersionRef } from '../types/registry.js';

export interface SubjectVersionIndex {
  /**
   * Append a version pointing at `schemaId`. Returns the existing live
   * version with `created: false` when one already points at that id.
   */
  appendVersion(scopeKey: string, schemaId: number): Promise<AppendVersionResult>;
  /** @throws SubjectNotFoundError when no version is live */
  listVersions(scopeKey: string): Promise<number[]>;
  /** @throws VersionNotFoundError when absent or deleted */
  getVersion(scopeKey: string, version: VersionRef): Promise<SubjectVersion>;
  /** @throws VersionNotFoundError when absent or already deleted */
  softDeleteVersion(scopeKey: string, version: number): Promise<number>;
  /** Soft-delete every live version; returns their numbers ascending. */
  deleteSubject(scopeKey: string): Promise<number[]>;
  /** Physically remove soft-deleted versions; returns their numbers ascending. */
  purgeSubject(scopeKey: string): Promise<number[]>;
  /** Live versions oldest to newest. Empty when the scope is absent. */
  history(scopeKey: string): Promise<SubjectVersion[]>;
  findBySchemaId(scopeKey: string, schemaId: number): Promise<SubjectVersion | undefined>;
  /** Scope keys with at least one live version, sorted. */
  listSubjects(): Promise<string[]>;
}

interface ScopeEntry {
  readonly versions: Map<number, SubjectVersion>;
  highWater: number;
}

export class InMemorySubjectVersionIndex implements SubjectVersionIndex {
  private readonly scopes = new Map<string, ScopeEntry>();

  async appendVersion(scopeKey: string, schemaId: number): Promise<AppendVersionResult> {
    const entry = this.scope(scopeKey);
    for (const row of entry.versions.values()) {
      if (!row.deleted && row.schemaId === schemaId) {
        return { version: row.version, created: false };
      }
    }

    const version = entry.highWater + 1;
    entry.highWater = version;
    entry.versions.set(version, { scopeKey, version, schemaId, deleted: false });
    return { version, created: true };
  }

  async listVersions(scopeKey: string): Promise<number[]> {
    const live = this.live(scopeKey);
    if (live.length === 0) throw new SubjectNotFoundError(scopeKey);
    return live.map((row) => row.version);
  }

  async getVersion(scopeKey: string, version: VersionRef): Promise<SubjectVersion> {
    if (version === 'latest') {
      const latest = this.live(scopeKey).at(-1);
      if (!latest) throw new VersionNotFoundError(scopeKey, version);
      return latest;
    }
    const row = this.scopes.get(scopeKey)?.versions.get(version);
    if (!row || row.deleted) throw new VersionNotFoundError(scopeKey, version);
    return row;
  }

  async softDeleteVersion(scopeKey: string, version: number): Promise<number> {
    const entry = this.scopes.get(scopeKey);
    const row = entry?.versions.get(version);
    if (!entry || !row || row.deleted) throw new VersionNotFoundError(scopeKey, version);
    entry.versions.set(version, { ...row, deleted: true });
    return version;
  }

  async deleteSubject(scopeKey: string): Promise<number[]> {
    const entry = this.scopes.get(scopeKey);
    if (!entry) return [];
    const removed: number[] = [];
    for (const row of this.live(scopeKey)) {
      entry.versions.set(row.version, { ...row, deleted: true });
      removed.push(row.version);
    }
    return removed;
  }

  async purgeSubject(scopeKey: string): Promise<number[]> {
    const entry = this.scopes.get(scopeKey);
    if (!entry) return [];
    const purged = [...entry.versions.values()]
      .filter((row) => row.deleted)
      .map((row) => row.version)
      .sort((a, b) => a - b);
    for (const version of purged) entry.versions.delete(version);
    // The entry (and its high-water mark) outlives its rows.
    return purged;
  }

  async history(scopeKey: string): Promise<SubjectVersion[]> {
    return this.live(scopeKey);
  }

  async findBySchemaId(scopeKey: string, schemaId: number): Promise<SubjectVersion | undefined> {
    return this.live(scopeKey).find((row) => row.schemaId === schemaId);
  }

  async listSubjects(): Promise<string[]> {
    const subjects: string[] = [];
    for (const scopeKey of this.scopes.keys()) {
      if (this.live(scopeKey).length > 0) subjects.push(scopeKey);
    }
    return subjects.sort();
  }

  private scope(scopeKey: string): ScopeEntry {
    let entry = this.scopes.get(scopeKey);
    if (!entry) {
      entry = { versions: new Map(), highWater: 0 };
      this.scopes.set(scopeKey, entry);
    }
    return entry;
  }

  private live(scopeKey: string): SubjectVersion[] {
    const entry = this.scopes.get(scopeKey);
    if (!entry) return [];
    return [...entry.versions.values()]
      .filter((row) => !row.deleted)
      .sort((a, b) => a.version - b.version);
  }
}
