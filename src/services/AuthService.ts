/**
 * Auth Service
 *
 * Registration, password login and token authentication. Passwords are
 * bcrypt-hashed; sessions are stateless JWTs, but every authenticated call
 * re-loads the user so a token for a deleted account stops working.
 */

import bcrypt from 'bcryptjs';
import type { TokenSigner } from '../auth/tokens';
import { AuthenticationError } from '../lib/errors';
import { authLogger } from '../logger';
import type { UserStore } from '../repositories';
import type { AuthUser } from '../types';

// ============================================================================
// TYPES
// ============================================================================

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  compare(password: string, hash: string): Promise<boolean>;
}

export function bcryptHasher(rounds: number): PasswordHasher {
  return {
    hash: (password) => bcrypt.hash(password, rounds),
    compare: (password, hash) => bcrypt.compare(password, hash),
  };
}

const INVALID_CREDENTIALS = 'Could not verify! Check username/password.';

// ============================================================================
// SERVICE
// ============================================================================

export class AuthService {
  constructor(
    private readonly users: UserStore,
    private readonly tokens: TokenSigner,
    private readonly hasher: PasswordHasher
  ) {}

  async register(username: string, password: string): Promise<AuthUser> {
    const passwordHash = await this.hasher.hash(password);
    const user = await this.users.create(username, passwordHash);
    authLogger.info({ userId: user.id }, 'User registered');
    return { id: user.id, username: user.username };
  }

  /**
   * Returns a signed token, or throws 401 for an unknown user or wrong
   * password alike.
   */
  async login(username: string, password: string): Promise<string> {
    const user = await this.users.findByUsername(username);
    if (!user) {
      authLogger.info('Login failed: unknown user');
      throw new AuthenticationError(INVALID_CREDENTIALS, 'INVALID_CREDENTIALS');
    }

    const ok = await this.hasher.compare(password, user.password_hash);
    if (!ok) {
      authLogger.info({ userId: user.id }, 'Login failed: wrong password');
      throw new AuthenticationError(INVALID_CREDENTIALS, 'INVALID_CREDENTIALS');
    }

    authLogger.info({ userId: user.id }, 'Login succeeded');
    return this.tokens.issue({ id: user.id, username: user.username });
  }

  async authenticate(token: string): Promise<AuthUser> {
    const claims = await this.tokens.verify(token);
    const user = await this.users.findById(claims.user_id);
    if (!user) {
      throw new AuthenticationError('Token is invalid!', 'TOKEN_INVALID');
    }
    return { id: user.id, username: user.username };
  }
}
