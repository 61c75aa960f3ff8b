/**
 * Library entry point: the registry core without the HTTP server.
 */
export * from './errors.js';
export * from './types/registry.js';
export * from './types/avro.js';
export { AvroCanonicalizer, renderCanonical, computeFingerprint, type SchemaCanonicalizer } from './services/avro-canonicalizer.js';
export {
  canRead,
  checkCompatibility,
  isCompatible,
  referencesFor,
  type CompatibilityResult,
  type ReferenceSchema,
} from './services/compatibility-engine.js';
export { InMemorySchemaStore, type SchemaStore } from './services/schema-store.js';
export { InMemorySubjectVersionIndex, type SubjectVersionIndex } from './services/subject-version-index.js';
export { InMemoryConfigStore, type ConfigStore } from './services/config-store.js';
export { KeyedMutex, Mutex } from './services/keyed-mutex.js';
export { SchemaRegistry, type SchemaRegistryDeps, type RegistryLogFn } from './services/schema-registry.js';
export { PostgresSchemaStore } from './db/pg-schema-store.js';
export { PostgresSubjectVersionIndex } from './db/pg-subject-version-index.js';
export { PostgresConfigStore } from './db/pg-config-store.js';
export { migrate, type MigrationResult } from './db/migrate.js';
export { createDbPool, closeDbPool, type DbPool } from './db/client.js';
