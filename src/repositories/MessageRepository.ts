/**
 * Message Log
 *
 * Append-only store of ciphertext pairs. Each message carries two blobs,
 * one encrypted for the sender and one for the recipient; reads return the
 * one meant for the reader.
 */

import type { MessageRecord, StoredMessage } from '../types';
import { BaseRepository } from './BaseRepository';

export interface MessageLog {
  append(senderId: number, recipientId: number, senderBlob: string, recipientBlob: string): Promise<StoredMessage>;
  query(userId: number, partnerId: number, sinceId: number): Promise<MessageRecord[]>;
}

interface MessageRow {
  id: number;
  sender_id: number;
  recipient_id: number;
  timestamp: Date;
  sender_username: string;
  encrypted_blob: string;
}

export class MessageRepository extends BaseRepository implements MessageLog {
  protected readonly tableName = 'messages';

  async append(
    senderId: number,
    recipientId: number,
    senderBlob: string,
    recipientBlob: string
  ): Promise<StoredMessage> {
    const result = await this.execute<{ id: number; timestamp: Date }>(
      `INSERT INTO ${this.tableName} (sender_id, recipient_id, sender_blob, recipient_blob)
       VALUES ($1, $2, $3, $4)
       RETURNING id, timestamp`,
      [senderId, recipientId, senderBlob, recipientBlob]
    );
    const row = result.rows[0];
    return { id: row.id, timestamp: row.timestamp.toISOString() };
  }

  /**
   * Messages between the two users newer than `sinceId`, oldest first.
   */
  async query(userId: number, partnerId: number, sinceId: number): Promise<MessageRecord[]> {
    const result = await this.execute<MessageRow>(
      `SELECT
         m.id,
         m.sender_id,
         m.recipient_id,
         m.timestamp,
         u_sender.username AS sender_username,
         CASE WHEN m.sender_id = $1 THEN m.sender_blob ELSE m.recipient_blob END AS encrypted_blob
       FROM ${this.tableName} m
       JOIN users u_sender ON u_sender.id = m.sender_id
       WHERE ((m.sender_id = $1 AND m.recipient_id = $2) OR (m.sender_id = $2 AND m.recipient_id = $1))
         AND m.id > $3
       ORDER BY m.timestamp ASC, m.id ASC`,
      [userId, partnerId, sinceId]
    );
    return result.rows.map((row) => ({ ...row, timestamp: row.timestamp.toISOString() }));
  }
}
