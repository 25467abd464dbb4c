/**
 * Bearer-token authentication for protected routes.
 *
 * Sets `user` on the context; downstream handlers read it with c.get('user').
 */

import type { MiddlewareHandler } from 'hono';
import { extractBearerToken } from '../auth/tokens';
import { AuthenticationError } from '../lib/errors';
import type { AppEnv, AuthUser } from '../types';

export interface TokenAuthenticator {
  authenticate(token: string): Promise<AuthUser>;
}

export function requireAuth(auth: TokenAuthenticator): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const token = extractBearerToken(c.req.header('Authorization'));
    if (!token) {
      throw new AuthenticationError('Token is missing!', 'TOKEN_MISSING');
    }

    c.set('user', await auth.authenticate(token));
    await next();
  };
}
