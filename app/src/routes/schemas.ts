import { Hono } from 'hono';
import type { LogFn } from '../middleware/logger.js';
import type { SchemaRegistry } from '../services/schema-registry.js';
import { handleRouteError } from '../utils/error-handler.js';

export interface SchemaRouteDeps {
  registry: SchemaRegistry;
  log?: LogFn;
}

/** Global schema lookup by id. */
export function createSchemaRoutes(deps: SchemaRouteDeps): Hono {
  const app = new Hono();

  app.onError((err, c) => handleRouteError(c, err, deps.log));

  app.get('/ids/:id', async (c) => {
    const schema = await deps.registry.getSchemaById(c.req.param('id'));
    return c.json({ schema: schema.raw });
  });

  return app;
}
