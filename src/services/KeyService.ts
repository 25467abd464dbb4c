import { NotFoundError } from '../lib/errors';
import type { PublicKeyStore } from '../repositories';
import type { AuthUser } from '../types';

/**
 * Public key directory. The server stores keys as opaque strings.
 */
export class KeyService {
  constructor(private readonly keys: PublicKeyStore) {}

  async upload(user: AuthUser, publicKey: string): Promise<void> {
    await this.keys.upsert(user.id, publicKey);
  }

  async getByUsername(username: string): Promise<{ username: string; public_key: string }> {
    const publicKey = await this.keys.findByUsername(username);
    if (publicKey === null) {
      throw new NotFoundError('User not found or has no public key.', 'KEY_NOT_FOUND');
    }
    return { username, public_key: publicKey };
  }
}
