import { createMiddleware } from 'hono/factory';

const METHODS_WITH_BODY: ReadonlySet<string> = new Set(['POST', 'PUT', 'PATCH']);

/**
 * Cap schema submissions at `maxBytes` (REGISTRY_MAX_SCHEMA_BYTES).
 *
 * Checked against Content-Length before the body is read; a request that
 * omits the header is passed through and bounded by the server instead.
 */
export function createBodyLimit(maxBytes: number = 1_048_576) {
  return createMiddleware(async (c, next) => {
    if (!METHODS_WITH_BODY.has(c.req.method)) {
      await next();
      return;
    }
    const declared = Number(c.req.header('content-length') ?? '0');
    if (Number.isFinite(declared) && declared > maxBytes) {
      return c.json(
        {
          error: 'payload_too_large',
          message: `Request body of ${declared} bytes exceeds the ${maxBytes} byte limit`,
          request_id: c.get('requestId'),
        },
        413,
      );
    }
    await next();
  });
}
