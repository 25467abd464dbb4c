/**
 * Request ID Middleware
 *
 * Attaches a ULID request ID to every request (`X-Request-Id`), reusing the
 * client's header when present, and logs one line per completed request.
 */

import type { Context, Next } from 'hono';
import { ulid } from 'ulidx';
import { httpLogger } from '../logger';
import type { AppEnv } from '../types';

export async function requestIdMiddleware(c: Context<AppEnv>, next: Next): Promise<void> {
  const requestId = c.req.header('x-request-id') || `req_${ulid()}`;
  c.set('requestId', requestId);
  c.header('X-Request-Id', requestId);
  await next();
}

export async function requestLoggingMiddleware(c: Context<AppEnv>, next: Next): Promise<void> {
  const start = performance.now();

  await next();

  const durationMs = Math.round((performance.now() - start) * 10) / 10;
  const status = c.res.status;
  const fields = {
    requestId: c.get('requestId'),
    method: c.req.method,
    path: c.req.path,
    status,
    durationMs,
  };

  const level = status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info';
  httpLogger[level](fields, `${c.req.method} ${c.req.path} → ${status} (${durationMs}ms)`);
}
