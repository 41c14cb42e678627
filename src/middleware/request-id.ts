import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import logger, { type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

/** Accepts a caller's X-Request-ID when it is short and safe, else mints one. */
export function resolveRequestId(raw: string | undefined): string {
  if (raw) {
    const candidate = raw.trim().slice(0, 64);
    if (REQUEST_ID_PATTERN.test(candidate)) return candidate;
  }
  return randomUUID();
}

export async function requestIdMiddleware(c: Context, next: Next) {
  const requestId = resolveRequestId(c.req.header('X-Request-ID'));
  const log = logger.child({ requestId });
  c.set('requestId', requestId);
  c.set('log', log);
  c.header('X-Request-ID', requestId);

  const startedAt = Date.now();
  await next();
  log.debug(
    { method: c.req.method, path: c.req.path, status: c.res.status, ms: Date.now() - startedAt },
    'Request completed',
  );
}
