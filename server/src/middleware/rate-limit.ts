import type { Context, Next } from 'hono';
import logger from '../lib/logger.js';

interface WindowEntry {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  maxRequests: number;
  windowMs: number;
  /** Upper bound on tracked clients; the least recently seen are evicted first. */
  maxBuckets?: number;
  trustProxy?: boolean;
}

function clientKey(c: Context, trustProxy: boolean): string {
  const scope = `${c.req.method}:${c.req.path}`;
  if (trustProxy) {
    const forwarded = c.req.header('x-forwarded-for')?.split(',')[0]?.trim().slice(0, 128);
    if (forwarded) return `ip:${forwarded}:${scope}`;
  }
  return `anonymous:${scope}`;
}

/**
 * Fixed-window limiter for the expensive endpoints (a send run can hold an
 * SMTP session for minutes). Each call owns its bucket map.
 */
export function rateLimitMiddleware(options: RateLimitOptions) {
  const { maxRequests, windowMs } = options;
  const maxBuckets = options.maxBuckets ?? 10_000;
  const trustProxy = options.trustProxy ?? process.env.TRUST_PROXY === 'true';
  const buckets = new Map<string, WindowEntry>();

  return async (c: Context, next: Next) => {
    const key = clientKey(c, trustProxy);
    const now = Date.now();
    let entry = buckets.get(key);

    if (!entry || now >= entry.resetAt) {
      while (buckets.size >= maxBuckets) {
        const oldest = buckets.keys().next().value;
        if (oldest === undefined) break;
        buckets.delete(oldest);
      }
      entry = { count: 0, resetAt: now + windowMs };
    } else {
      buckets.delete(key);
    }
    buckets.set(key, entry);

    entry.count += 1;
    const resetSeconds = Math.max(1, Math.ceil((entry.resetAt - now) / 1000));
    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(Math.max(0, maxRequests - entry.count)));
    c.header('X-RateLimit-Reset', String(resetSeconds));

    if (entry.count > maxRequests) {
      c.header('Retry-After', String(resetSeconds));
      logger.warn({ key, count: entry.count, max: maxRequests }, 'Rate limit exceeded');
      return c.json({ error: 'Too many requests. Please try again later.' }, 429);
    }

    await next();
  };
}
