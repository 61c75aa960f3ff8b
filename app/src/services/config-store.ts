/**
 * Config Store: global default compatibility mode plus per-subject
 * overrides. A subject without an override inherits the global default,
 * which always has a value.
 *
 * Modes are validated at the façade boundary; stores only ever see
 * recognised values.
 */
import type { CompatibilityMode } from '../types/registry.js';

export interface ConfigStore {
  getGlobalDefault(): Promise<CompatibilityMode>;
  setGlobalDefault(mode: CompatibilityMode): Promise<CompatibilityMode>;
  getOverride(scopeKey: string): Promise<CompatibilityMode | undefined>;
  setOverride(scopeKey: string, mode: CompatibilityMode): Promise<CompatibilityMode>;
  /** Returns the removed override, if there was one. */
  clearOverride(scopeKey: string): Promise<CompatibilityMode | undefined>;
  /** The override if set, else the global default. */
  getEffectiveMode(scopeKey: string): Promise<CompatibilityMode>;
}

export class InMemoryConfigStore implements ConfigStore {
  private globalDefault: CompatibilityMode;
  private readonly overrides = new Map<string, CompatibilityMode>();

  constructor(initialDefault: CompatibilityMode = 'BACKWARD') {
    this.globalDefault = initialDefault;
  }

  async getGlobalDefault(): Promise<CompatibilityMode> {
    return this.globalDefault;
  }

  async setGlobalDefault(mode: CompatibilityMode): Promise<CompatibilityMode> {
    this.globalDefault = mode;
    return mode;
  }

  async getOverride(scopeKey: string): Promise<CompatibilityMode | undefined> {
    return this.overrides.get(scopeKey);
  }

  async setOverride(scopeKey: string, mode: CompatibilityMode): Promise<CompatibilityMode> {
    this.overrides.set(scopeKey, mode);
    return mode;
  }

  async clearOverride(scopeKey: string): Promise<CompatibilityMode | undefined> {
    const previous = this.overrides.get(scopeKey);
    this.overrides.delete(scopeKey);
    return previous;
  }

  async getEffectiveMode(scopeKey: string): Promise<CompatibilityMode> {
    return this.overrides.get(scopeKey) ?? this.globalDefault;
  }
}
