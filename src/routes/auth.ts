/**
 * Account routes: POST /register, POST /login
 */

import { Hono } from 'hono';
import { AuthenticationError } from '../lib/errors';
import { credentialsSchema, loginSchema, parseJsonBody, readJsonBody } from '../lib/validators';
import type { RateLimiters } from '../middleware/rateLimit';
import type { AuthService } from '../services/AuthService';
import type { AppEnv } from '../types';

export function createAuthRoutes(deps: {
  auth: AuthService;
  limiters: Pick<RateLimiters, 'register' | 'login'>;
}): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post('/register', deps.limiters.register, async (c) => {
    const { username, password } = await parseJsonBody(c, credentialsSchema);
    await deps.auth.register(username, password);
    return c.json({ message: 'New user registered successfully!' }, 201);
  });

  routes.post('/login', deps.limiters.login, async (c) => {
    const parsed = loginSchema.safeParse(await readJsonBody(c));
    if (!parsed.success) {
      throw new AuthenticationError('Could not verify', 'MISSING_CREDENTIALS');
    }
    const { username, password } = parsed.data;
    const token = await deps.auth.login(username, password);
    return c.json({ token });
  });

  return routes;
}
