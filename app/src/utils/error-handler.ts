import type { Context } from 'hono';
import { RegistryError } from '../errors.js';
import type { LogFn } from '../middleware/logger.js';

/**
 * Shared route error handler. RegistryErrors become their JSON body with
 * their status, tagged with the request id when one is set; anything else
 * is logged and answered with a generic 500.
 */
export function handleRouteError(
  c: Context,
  err: unknown,
  log?: LogFn,
  fallbackMessage = 'Internal server error',
): Response {
  if (RegistryError.isRegistryError(err)) {
    if (err.status >= 500) {
      log?.('error', { event: 'route_error', code: err.code, message: err.message, path: c.req.path });
    }
    const requestId = c.get('requestId');
    return c.json(requestId ? { ...err.body, request_id: requestId } : err.body, err.status);
  }
  log?.('error', {
    event: 'route_unhandled_error',
    message: err instanceof Error ? err.message : String(err),
    path: c.req.path,
  });
  return c.json({ error: 'internal_error', message: fallbackMessage }, 500);
}
