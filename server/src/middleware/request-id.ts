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

/**
 * Honors a well-formed inbound X-Request-ID, otherwise mints one, and
 * exposes a request-scoped child logger as `c.get('log')`.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const inbound = c.req.header('X-Request-ID')?.trim().slice(0, 64);
  const requestId = inbound && REQUEST_ID_PATTERN.test(inbound) ? inbound : randomUUID();
  c.set('requestId', requestId);
  c.set('log', logger.child({ requestId }));
  c.header('X-Request-ID', requestId);
  await next();
}
