import { Hono } from 'hono';
import { secureHeaders } from 'hono/secure-headers';
import { requestId } from './middleware/request-id.js';
import { createLogger, type LogFn } from './middleware/logger.js';
import { createBodyLimit } from './middleware/body-limit.js';
import { createHealthRoutes } from './routes/health.js';
import { createSubjectRoutes } from './routes/subjects.js';
import { createSchemaRoutes } from './routes/schemas.js';
import { createCompatibilityRoutes } from './routes/compatibility.js';
import { createConfigRoutes } from './routes/config.js';
import { createDbPool, type DbPool } from './db/client.js';
import { PostgresSchemaStore } from './db/pg-schema-store.js';
import { PostgresSubjectVersionIndex } from './db/pg-subject-version-index.js';
import { PostgresConfigStore } from './db/pg-config-store.js';
import { AvroCanonicalizer } from './services/avro-canonicalizer.js';
import { InMemorySchemaStore, type SchemaStore } from './services/schema-store.js';
import { InMemorySubjectVersionIndex, type SubjectVersionIndex } from './services/subject-version-index.js';
import { InMemoryConfigStore, type ConfigStore } from './services/config-store.js';
import { SchemaRegistry } from './services/schema-registry.js';
import { handleRouteError } from './utils/error-handler.js';
import type { RegistryConfig } from './config.js';

export const SERVICE_NAME = 'schema-registry';

export interface RegistryApp {
  app: Hono;
  registry: SchemaRegistry;
  /** PostgreSQL pool (null when DATABASE_URL is not configured). */
  dbPool: DbPool | null;
  log: LogFn;
}

interface RegistryStores {
  schemaStore: SchemaStore;
  versionIndex: SubjectVersionIndex;
  configStore: ConfigStore;
}

/**
 * Create and configure the registry Hono application. Stores are
 * Postgres-backed when a database is configured and in-memory otherwise.
 */
export function createRegistryApp(config: RegistryConfig): RegistryApp {
  const app = new Hono();
  const { middleware: loggerMiddleware, log } = createLogger(SERVICE_NAME, config.logLevel);
  const canonicalizer = new AvroCanonicalizer();

  let dbPool: DbPool | null = null;
  let stores: RegistryStores;
  if (config.databaseUrl) {
    dbPool = createDbPool({ connectionString: config.databaseUrl, log });
    stores = {
      schemaStore: new PostgresSchemaStore(dbPool, canonicalizer),
      versionIndex: new PostgresSubjectVersionIndex(dbPool),
      configStore: new PostgresConfigStore(dbPool, config.defaultCompatibility),
    };
  } else {
    stores = {
      schemaStore: new InMemorySchemaStore(),
      versionIndex: new InMemorySubjectVersionIndex(),
      configStore: new InMemoryConfigStore(config.defaultCompatibility),
    };
  }

  const registry = new SchemaRegistry({ ...stores, canonicalizer, log });

  // Middleware order: request id first so every later layer can log it,
  // body limit before any route reads the body.
  app.use('*', requestId());
  app.use('*', secureHeaders());
  app.use('*', createBodyLimit(config.maxSchemaBytes));
  app.use('*', loggerMiddleware);

  app.onError((err, c) => handleRouteError(c, err, log));
  app.notFound((c) => c.json({ error: 'not_found', message: `No route for ${c.req.method} ${c.req.path}` }, 404));

  app.route('/health', createHealthRoutes({ schemaStore: stores.schemaStore, dbPool }));
  app.route('/subjects', createSubjectRoutes({ registry, log }));
  app.route('/schemas', createSchemaRoutes({ registry, log }));
  app.route('/compatibility', createCompatibilityRoutes({ registry, log }));
  app.route('/config', createConfigRoutes({ registry, log }));

  app.get('/', (c) => c.json({ service: SERVICE_NAME, status: 'running', version: '1.0.0' }));

  return { app, registry, dbPool, log };
}
