/**
 * Public Key Repository
 *
 * One public key per user; a re-upload replaces it.
 */

import { BaseRepository } from './BaseRepository';

export interface PublicKeyStore {
  upsert(userId: number, publicKey: string): Promise<void>;
  findByUsername(username: string): Promise<string | null>;
}

export class PublicKeyRepository extends BaseRepository implements PublicKeyStore {
  protected readonly tableName = 'public_keys';

  async upsert(userId: number, publicKey: string): Promise<void> {
    await this.execute(
      `INSERT INTO ${this.tableName} (user_id, public_key) VALUES ($1, $2)
       ON CONFLICT (user_id) DO UPDATE SET public_key = EXCLUDED.public_key`,
      [userId, publicKey]
    );
  }

  async findByUsername(username: string): Promise<string | null> {
    const result = await this.execute<{ public_key: string }>(
      `SELECT pk.public_key
       FROM ${this.tableName} pk
       JOIN users u ON u.id = pk.user_id
       WHERE u.username = $1`,
      [username]
    );
    return result.rows[0]?.public_key ?? null;
  }
}
