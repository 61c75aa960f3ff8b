import { createMiddleware } from 'hono/factory';
import { randomUUID } from 'node:crypto';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

const ACCEPTED_ID = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Tag every request with an X-Request-Id, echoed on the response and
 * available to later layers as `c.get('requestId')`. A caller-supplied id
 * is kept when it is a short token; anything else is replaced.
 */
export const requestId = () =>
  createMiddleware(async (c, next) => {
    const incoming = c.req.header('x-request-id');
    const id = incoming && ACCEPTED_ID.test(incoming) ? incoming : randomUUID();
    c.set('requestId', id);
    c.header('X-Request-Id', id);
    await next();
  });
