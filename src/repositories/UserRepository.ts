/**
 * User Repository
 *
 * Data access layer for the users table.
 */

import { isUniqueViolation } from '../db';
import { ConflictError } from '../lib/errors';
import type { User } from '../types';
import { BaseRepository } from './BaseRepository';

export interface UserStore {
  create(username: string, passwordHash: string): Promise<User>;
  findByUsername(username: string): Promise<User | null>;
  findById(id: number): Promise<User | null>;
  findIdByUsername(username: string): Promise<number | null>;
}

export class UserRepository extends BaseRepository implements UserStore {
  protected readonly tableName = 'users';

  /**
   * Insert a user. A taken username raises ConflictError.
   */
  async create(username: string, passwordHash: string): Promise<User> {
    try {
      const result = await this.execute<User>(
        `INSERT INTO ${this.tableName} (username, password_hash)
         VALUES ($1, $2)
         RETURNING id, username, password_hash`,
        [username, passwordHash]
      );
      return result.rows[0];
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError('Username already exists.', 'USERNAME_TAKEN');
      }
      throw err;
    }
  }

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.execute<User>(
      `SELECT id, username, password_hash FROM ${this.tableName} WHERE username = $1`,
      [username]
    );
    return result.rows[0] ?? null;
  }

  async findById(id: number): Promise<User | null> {
    const result = await this.execute<User>(
      `SELECT id, username, password_hash FROM ${this.tableName} WHERE id = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async findIdByUsername(username: string): Promise<number | null> {
    const result = await this.execute<{ id: number }>(
      `SELECT id FROM ${this.tableName} WHERE username = $1`,
      [username]
    );
    return result.rows[0]?.id ?? null;
  }
}
