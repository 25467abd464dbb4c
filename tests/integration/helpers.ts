import type { Hono } from 'hono';
import { TokenSigner } from '../../src/auth/tokens';
import { createRateLimiters } from '../../src/middleware/rateLimit';
import type { MessageNotifier } from '../../src/realtime/delivery-gateway';
import { createApp } from '../../src/server';
import type { AppDeps } from '../../src/server';
import { AuthService } from '../../src/services/AuthService';
import type { PasswordHasher } from '../../src/services/AuthService';
import { ChatRequestService } from '../../src/services/ChatRequestService';
import { KeyService } from '../../src/services/KeyService';
import { MessageService } from '../../src/services/MessageService';
import type { AppEnv } from '../../src/types';
import { InMemoryStore } from '../fakes/InMemoryStore';

export const plainHasher: PasswordHasher = {
  hash: async (password) => `hashed:${password}`,
  compare: async (password, hash) => hash === `hashed:${password}`,
};

export interface TestApp {
  app: Hono<AppEnv>;
  store: InMemoryStore;
}

/**
 * The full HTTP stack over in-memory repositories, with fresh rate limiters.
 */
export function buildTestApp(opts: {
  notifier: MessageNotifier;
  health?: Partial<AppDeps['health']>;
}): TestApp {
  const store = new InMemoryStore();
  const repos = store.repositories();
  const auth = new AuthService(repos.users, new TokenSigner('test-secret', 3600), plainHasher);

  const app = createApp({
    auth,
    keys: new KeyService(repos.publicKeys),
    chat: new ChatRequestService(repos.users, repos.chatRequests),
    messages: new MessageService(repos.users, repos.messages, opts.notifier),
    health: {
      database: async () => ({ connected: true, latencyMs: 1 }),
      onlineCount: () => 0,
      hubRunning: () => true,
      ...opts.health,
    },
    limiters: createRateLimiters(),
    allowedOrigins: [],
  });

  return { app, store };
}

export function post(app: Hono<AppEnv>, path: string, body: unknown, token?: string) {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (token) headers.Authorization = `Bearer ${token}`;
  return app.request(path, { method: 'POST', headers, body: JSON.stringify(body) });
}

export function get(app: Hono<AppEnv>, path: string, token?: string) {
  return app.request(path, token ? { headers: { Authorization: `Bearer ${token}` } } : {});
}

/** Registers and logs in, returning the session token. */
export async function signUp(app: Hono<AppEnv>, username: string, password = 'pw'): Promise<string> {
  await post(app, '/register', { username, password });
  const res = await post(app, '/login', { username, password });
  const body: unknown = await res.json();
  if (typeof body !== 'object' || body === null || !('token' in body) || typeof body.token !== 'string') {
    throw new Error(`login failed for ${username}: ${res.status}`);
  }
  return body.token;
}
