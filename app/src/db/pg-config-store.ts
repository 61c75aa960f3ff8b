/**
 * PostgresConfigStore: compatibility modes in `compatibility_config`.
 *
 * The global default lives in the row keyed GLOBAL_CONFIG_KEY. Until that row
 * is written, the configured initial default applies.
 */
import type pg from 'pg';
import type { ConfigStore } from '../services/config-store.js';
import { InternalRegistryError } from '../errors.js';
import { GLOBAL_CONFIG_KEY, type CompatibilityMode } from '../types/registry.js';
import { isCompatibilityMode } from '../validation.js';

export class PostgresConfigStore implements ConfigStore {
  constructor(
    private readonly pool: pg.Pool,
    private readonly initialDefault: CompatibilityMode = 'BACKWARD',
  ) {}

  async getGlobalDefault(): Promise<CompatibilityMode> {
    return (await this.read(GLOBAL_CONFIG_KEY)) ?? this.initialDefault;
  }

  async setGlobalDefault(mode: CompatibilityMode): Promise<CompatibilityMode> {
    await this.write(GLOBAL_CONFIG_KEY, mode);
    return mode;
  }

  async getOverride(scopeKey: string): Promise<CompatibilityMode | undefined> {
    return this.read(scopeKey);
  }

  async setOverride(scopeKey: string, mode: CompatibilityMode): Promise<CompatibilityMode> {
    await this.write(scopeKey, mode);
    return mode;
  }

  async clearOverride(scopeKey: string): Promise<CompatibilityMode | undefined> {
    const result = await this.pool.query<{ mode: string }>(
      'DELETE FROM compatibility_config WHERE scope_key = $1 RETURNING mode',
      [scopeKey],
    );
    const row = result.rows[0];
    return row ? this.toMode(scopeKey, row.mode) : undefined;
  }

  async getEffectiveMode(scopeKey: string): Promise<CompatibilityMode> {
    const result = await this.pool.query<{ scope_key: string; mode: string }>(
      'SELECT scope_key, mode FROM compatibility_config WHERE scope_key = ANY($1::text[])',
      [[scopeKey, GLOBAL_CONFIG_KEY]],
    );
    const override = result.rows.find((row) => row.scope_key === scopeKey);
    if (override) return this.toMode(scopeKey, override.mode);
    const global = result.rows.find((row) => row.scope_key === GLOBAL_CONFIG_KEY);
    return global ? this.toMode(GLOBAL_CONFIG_KEY, global.mode) : this.initialDefault;
  }

  private async read(scopeKey: string): Promise<CompatibilityMode | undefined> {
    const result = await this.pool.query<{ mode: string }>(
      'SELECT mode FROM compatibility_config WHERE scope_key = $1',
      [scopeKey],
    );
    const row = result.rows[0];
    return row ? this.toMode(scopeKey, row.mode) : undefined;
  }

  private async write(scopeKey: string, mode: CompatibilityMode): Promise<void> {
    await this.pool.query(
      `INSERT INTO compatibility_config (scope_key, mode)
       VALUES ($1, $2)
       ON CONFLICT (scope_key) DO UPDATE
       SET mode = $2, updated_at = now()`,
      [scopeKey, mode],
    );
  }

  private toMode(scopeKey: string, mode: string): CompatibilityMode {
    if (!isCompatibilityMode(mode)) {
      throw new InternalRegistryError(`Stored compatibility mode for ${scopeKey} is not recognised: ${mode}`);
    }
    return mode;
  }
}
