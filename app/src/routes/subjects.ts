/**
 * Subject routes: registration, version listing and lookup, deletion.
 *
 * `:scope` is the rendered `{subject}-{key|value}` key, split at its last
 * hyphen.
 */
import { Hono } from 'hono';
import type { LogFn } from '../middleware/logger.js';
import type { SchemaRegistry } from '../services/schema-registry.js';
import { handleRouteError } from '../utils/error-handler.js';
import { SchemaBodySchema, parseRequestBody, parseScopeKey } from '../validation.js';

export interface SubjectRouteDeps {
  registry: SchemaRegistry;
  log?: LogFn;
}

export function createSubjectRoutes(deps: SubjectRouteDeps): Hono {
  const { registry } = deps;
  const app = new Hono();

  app.onError((err, c) => handleRouteError(c, err, deps.log));

  app.get('/', async (c) => c.json(await registry.listSubjects()));

  // POST /:scope/versions: register a schema
  app.post('/:scope/versions', async (c) => {
    const scope = parseScopeKey(c.req.param('scope'));
    const body = parseRequestBody(SchemaBodySchema, await c.req.json().catch(() => null));
    const result = await registry.register(scope.name, scope.type, body.schema);
    return c.json({ id: result.id, version: result.version });
  });

  app.get('/:scope/versions', async (c) => {
    const scope = parseScopeKey(c.req.param('scope'));
    return c.json(await registry.listVersions(scope.name, scope.type));
  });

  app.get('/:scope/versions/:version', async (c) => {
    const scope = parseScopeKey(c.req.param('scope'));
    return c.json(await registry.getSchema(scope.name, scope.type, c.req.param('version')));
  });

  app.delete('/:scope/versions/:version', async (c) => {
    const scope = parseScopeKey(c.req.param('scope'));
    return c.json(await registry.deleteVersion(scope.name, scope.type, c.req.param('version')));
  });

  // DELETE /:scope: soft delete; ?permanent=true purges soft-deleted versions
  app.delete('/:scope', async (c) => {
    const scope = parseScopeKey(c.req.param('scope'));
    const removed = c.req.query('permanent') === 'true'
      ? await registry.purgeSubject(scope.name, scope.type)
      : await registry.deleteSubject(scope.name, scope.type);
    return c.json(removed);
  });

  // POST /:scope: is this schema already registered here?
  app.post('/:scope', async (c) => {
    const scope = parseScopeKey(c.req.param('scope'));
    const body = parseRequestBody(SchemaBodySchema, await c.req.json().catch(() => null));
    return c.json(await registry.checkSchema(scope.name, scope.type, body.schema));
  });

  return app;
}
