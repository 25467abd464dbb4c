/**
 * Chat Request Repository
 *
 * A request is directed (requester → requested) and moves pending → accepted.
 * Contacts are the accepted requests in either direction.
 */

import { isUniqueViolation } from '../db';
import { ConflictError } from '../lib/errors';
import type { PendingChatRequest } from '../types';
import { BaseRepository } from './BaseRepository';

export interface ChatRequestStore {
  create(requesterId: number, requestedId: number): Promise<void>;
  listPending(requestedId: number): Promise<PendingChatRequest[]>;
  accept(requesterId: number, requestedId: number): Promise<boolean>;
  listContacts(userId: number): Promise<string[]>;
}

export class ChatRequestRepository extends BaseRepository implements ChatRequestStore {
  protected readonly tableName = 'chat_requests';

  /**
   * Insert a pending request. An existing row for the same direction, pending
   * or accepted, raises ConflictError.
   */
  async create(requesterId: number, requestedId: number): Promise<void> {
    try {
      await this.execute(
        `INSERT INTO ${this.tableName} (requester_id, requested_id, status)
         VALUES ($1, $2, 'pending')`,
        [requesterId, requestedId]
      );
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError('Chat request already pending or accepted.', 'CHAT_REQUEST_EXISTS');
      }
      throw err;
    }
  }

  async listPending(requestedId: number): Promise<PendingChatRequest[]> {
    const result = await this.execute<PendingChatRequest>(
      `SELECT u.username AS requester_username, cr.status
       FROM ${this.tableName} cr
       JOIN users u ON u.id = cr.requester_id
       WHERE cr.requested_id = $1 AND cr.status = 'pending'
       ORDER BY cr.id ASC`,
      [requestedId]
    );
    return result.rows;
  }

  /**
   * Returns false when there was no pending request to accept.
   */
  async accept(requesterId: number, requestedId: number): Promise<boolean> {
    const result = await this.execute(
      `UPDATE ${this.tableName}
       SET status = 'accepted'
       WHERE requester_id = $1 AND requested_id = $2 AND status = 'pending'`,
      [requesterId, requestedId]
    );
    return result.rowCount > 0;
  }

  async listContacts(userId: number): Promise<string[]> {
    const result = await this.execute<{ username: string }>(
      `SELECT u.username
       FROM ${this.tableName} cr
       JOIN users u ON u.id = cr.requested_id
       WHERE cr.requester_id = $1 AND cr.status = 'accepted'
       UNION
       SELECT u.username
       FROM ${this.tableName} cr
       JOIN users u ON u.id = cr.requester_id
       WHERE cr.requested_id = $1 AND cr.status = 'accepted'
       ORDER BY username ASC`,
      [userId]
    );
    return result.rows.map((row) => row.username);
  }
}
