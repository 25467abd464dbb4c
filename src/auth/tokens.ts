/**
 * Session tokens
 *
 * HS256 JWTs carrying `user_id` and `username`, signed with SECRET_KEY.
 */

import { SignJWT, jwtVerify, errors } from 'jose';
import { AuthenticationError } from '../lib/errors';
import type { AuthUser } from '../types';

export interface TokenClaims {
  user_id: number;
  username: string;
  iat: number;
  exp: number;
}

export class TokenSigner {
  private readonly key: Uint8Array;

  constructor(
    secret: string,
    private readonly ttlSeconds: number,
    private readonly now: () => number = () => Math.floor(Date.now() / 1000)
  ) {
    this.key = new TextEncoder().encode(secret);
  }

  async issue(user: AuthUser): Promise<string> {
    const iat = this.now();
    return new SignJWT({ user_id: user.id, username: user.username })
      .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
      .setIssuedAt(iat)
      .setExpirationTime(iat + this.ttlSeconds)
      .sign(this.key);
  }

  /**
   * Throws AuthenticationError with the message shown to the client.
   */
  async verify(token: string): Promise<TokenClaims> {
    let payload: Record<string, unknown>;
    try {
      ({ payload } = await jwtVerify(token, this.key, {
        algorithms: ['HS256'],
        currentDate: new Date(this.now() * 1000),
      }));
    } catch (err) {
      if (err instanceof errors.JWTExpired) {
        throw new AuthenticationError('Token has expired!', 'TOKEN_EXPIRED');
      }
      throw new AuthenticationError('Token is invalid!', 'TOKEN_INVALID');
    }

    const { user_id, username, iat, exp } = payload;
    if (
      typeof user_id !== 'number' ||
      typeof username !== 'string' ||
      typeof iat !== 'number' ||
      typeof exp !== 'number'
    ) {
      throw new AuthenticationError('Token is invalid!', 'TOKEN_INVALID');
    }

    return { user_id, username, iat, exp };
  }
}

/**
 * Pulls the token out of an Authorization header. `null` when the header
 * is absent; AuthenticationError when it is not a Bearer credential.
 */
export function extractBearerToken(header: string | undefined | null): string | null {
  if (!header) return null;
  if (!header.startsWith('Bearer ')) {
    throw new AuthenticationError('Invalid token format', 'TOKEN_FORMAT');
  }
  const token = header.slice('Bearer '.length).trim();
  if (!token) {
    throw new AuthenticationError('Invalid token format', 'TOKEN_FORMAT');
  }
  return token;
}
