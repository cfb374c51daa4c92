/**
 * Per-request id and access log.
 *
 * A client-sent X-Request-Id is reused when it looks like an id (1-128 chars
 * of [A-Za-z0-9_.-]); anything else is replaced. Handlers read the id and a
 * bound child logger from c.var.
 */

import { randomUUID } from 'crypto';
import { createMiddleware } from 'hono/factory';
import type { Logger } from '../logger';

export type RequestVariables = {
  requestId: string;
  log: Logger;
};

const CLIENT_ID = /^[A-Za-z0-9_.-]{1,128}$/;

export function resolveRequestId(header: string | undefined): string {
  return header && CLIENT_ID.test(header) ? header : `req_${randomUUID()}`;
}

export function requestContext(base: Logger) {
  return createMiddleware<{ Variables: RequestVariables }>(async (c, next) => {
    const requestId = resolveRequestId(c.req.header('x-request-id'));
    const log = base.child({ requestId });
    c.set('requestId', requestId);
    c.set('log', log);
    c.header('X-Request-Id', requestId);

    const startedAt = performance.now();
    await next();

    const status = c.res.status;
    const durationMs = Math.round(performance.now() - startedAt);
    const level = status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info';
    log[level]({ method: c.req.method, path: c.req.path, status, durationMs }, 'request completed');
  });
}
