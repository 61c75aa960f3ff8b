/**
 * Compatibility config routes. Bodies take `compatibility` or its alias
 * `compatibilityLevel`; responses use `compatibilityLevel`.
 */
import { Hono, type Context } from 'hono';
import type { LogFn } from '../middleware/logger.js';
import type { SchemaRegistry } from '../services/schema-registry.js';
import { handleRouteError } from '../utils/error-handler.js';
import { CompatibilityBodySchema, parseRequestBody, parseScopeKey } from '../validation.js';

export interface ConfigRouteDeps {
  registry: SchemaRegistry;
  log?: LogFn;
}

async function readMode(c: Context): Promise<string> {
  const body = parseRequestBody(CompatibilityBodySchema, await c.req.json().catch(() => null));
  return 'compatibility' in body ? body.compatibility : body.compatibilityLevel;
}

export function createConfigRoutes(deps: ConfigRouteDeps): Hono {
  const { registry } = deps;
  const app = new Hono();

  app.onError((err, c) => handleRouteError(c, err, deps.log));

  app.get('/', async (c) => c.json({ compatibilityLevel: await registry.getGlobalConfig() }));

  app.put('/', async (c) => {
    const mode = await registry.setGlobalConfig(await readMode(c));
    return c.json({ compatibility: mode });
  });

  app.get('/:scope', async (c) => {
    const scope = parseScopeKey(c.req.param('scope'));
    const config = await registry.getSubjectConfig(scope.name, scope.type);
    return c.json({ compatibilityLevel: config.compatibility, source: config.source });
  });

  app.put('/:scope', async (c) => {
    const scope = parseScopeKey(c.req.param('scope'));
    const mode = await registry.setSubjectConfig(scope.name, scope.type, await readMode(c));
    return c.json({ compatibility: mode });
  });

  app.delete('/:scope', async (c) => {
    const scope = parseScopeKey(c.req.param('scope'));
    const config = await registry.clearSubjectConfig(scope.name, scope.type);
    return c.json({ compatibilityLevel: config.compatibility, source: config.source });
  });

  return app;
}
