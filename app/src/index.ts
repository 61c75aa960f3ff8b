import { serve } from '@hono/node-server';
import { createRegistryApp, SERVICE_NAME } from './server.js';
import { loadConfig } from './config.js';
import { closeDbPool } from './db/client.js';
import { migrate } from './db/migrate.js';

const config = loadConfig();
const { app, dbPool, log } = createRegistryApp(config);

if (dbPool && config.runMigrations) {
  const result = await migrate(dbPool, { log });
  log('info', {
    event: 'migrations_complete',
    applied: result.applied,
    skipped: result.skipped.length,
    total: result.total,
  });
  for (const warning of result.warnings) {
    log('warn', { event: 'migration_warning', message: warning });
  }
}

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  log('info', { event: 'listening', url: `http://localhost:${info.port}`, service: SERVICE_NAME });
});

let shuttingDown = false;
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log('info', { event: 'shutdown_started', signal });

  server.close();
  if (dbPool) {
    await closeDbPool(dbPool).catch((err: unknown) => {
      log('warn', { event: 'pg_pool_close_failed', message: err instanceof Error ? err.message : String(err) });
    });
  }

  log('info', { event: 'shutdown_complete' });

  // Force exit if the event loop does not drain; unref'd so it never holds the process open.
  setTimeout(() => process.exit(1), 10_000).unref();
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
