/**
 * Rate Limiting Middleware
 *
 * Fixed-window limiter over an in-memory Map, keyed by client IP.
 * Single-node only; counters reset on restart.
 *
 * Limits (per IP, per hour):
 * - POST /register: 10
 * - POST /login: 20
 * - POST /request_chat, POST /accept_chat: 30
 * - POST /send_message: 100
 */

import type { Context, MiddlewareHandler, Next } from 'hono';
import { AppError } from '../lib/errors';

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

export interface RateLimiter extends MiddlewareHandler {
  reset(): void;
}

export function clientIp(c: Context): string {
  return c.req.header('x-forwarded-for')?.split(',')[0]?.trim()
    || c.req.header('x-real-ip')
    || 'unknown';
}

const stores: Map<string, RateLimitEntry>[] = [];

// Expired windows are swept every 5 minutes
const sweeper = setInterval(() => {
  const now = Date.now();
  for (const store of stores) {
    for (const [key, entry] of store) {
      if (now > entry.resetAt) {
        store.delete(key);
      }
    }
  }
}, 5 * 60 * 1000);
sweeper.unref();

export function rateLimit(opts: {
  windowMs: number;
  max: number;
  keyPrefix?: string;
  now?: () => number;
}): RateLimiter {
  const store = new Map<string, RateLimitEntry>();
  stores.push(store);
  const now = opts.now ?? Date.now;

  const middleware = async (c: Context, next: Next) => {
    const key = `${opts.keyPrefix || 'api'}:${clientIp(c)}`;
    const ts = now();

    let entry = store.get(key);

    if (!entry || ts > entry.resetAt) {
      entry = { count: 0, resetAt: ts + opts.windowMs };
      store.set(key, entry);
    }

    entry.count++;

    c.header('X-RateLimit-Limit', String(opts.max));
    c.header('X-RateLimit-Remaining', String(Math.max(0, opts.max - entry.count)));
    c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetAt / 1000)));

    if (entry.count > opts.max) {
      c.header('Retry-After', String(Math.max(1, Math.ceil((entry.resetAt - ts) / 1000))));
      throw AppError.rateLimited('Too many requests. Please try again later.');
    }

    await next();
  };

  return Object.assign(middleware, { reset: () => store.clear() });
}

const HOUR = 60 * 60 * 1000;

export function createRateLimiters() {
  return {
    register: rateLimit({ windowMs: HOUR, max: 10, keyPrefix: 'register' }),
    login: rateLimit({ windowMs: HOUR, max: 20, keyPrefix: 'login' }),
    requestChat: rateLimit({ windowMs: HOUR, max: 30, keyPrefix: 'request_chat' }),
    acceptChat: rateLimit({ windowMs: HOUR, max: 30, keyPrefix: 'accept_chat' }),
    sendMessage: rateLimit({ windowMs: HOUR, max: 100, keyPrefix: 'send_message' }),
  };
}

export type RateLimiters = ReturnType<typeof createRateLimiters>;
