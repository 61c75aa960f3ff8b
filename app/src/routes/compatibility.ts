/**
 * Compatibility test routes. A dry run: nothing is registered.
 *
 * `?verbose=true` adds one message per violation to the response.
 */
import { Hono } from 'hono';
import type { LogFn } from '../middleware/logger.js';
import type { SchemaRegistry } from '../services/schema-registry.js';
import { handleRouteError } from '../utils/error-handler.js';
import { SchemaBodySchema, parseRequestBody, parseScopeKey } from '../validation.js';

export interface CompatibilityRouteDeps {
  registry: SchemaRegistry;
  log?: LogFn;
}

export function createCompatibilityRoutes(deps: CompatibilityRouteDeps): Hono {
  const app = new Hono();

  app.onError((err, c) => handleRouteError(c, err, deps.log));

  app.post('/subjects/:scope/versions/:version', async (c) => {
    const scope = parseScopeKey(c.req.param('scope'));
    const body = parseRequestBody(SchemaBodySchema, await c.req.json().catch(() => null));
    const result = await deps.registry.explainCompatibility(
      scope.name,
      scope.type,
      body.schema,
      c.req.param('version'),
    );

    if (c.req.query('verbose') !== 'true') {
      return c.json({ is_compatible: result.compatible });
    }
    return c.json({
      is_compatible: result.compatible,
      messages: result.violations.map((v) => `${v.rule} at ${v.path}: ${v.message}`),
    });
  });

  return app;
}
