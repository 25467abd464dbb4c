/**
 * Message Service
 *
 * Persist, then notify. A message is durable in the log before the hub
 * hears about it, so a lost push is always recoverable by polling.
 */

import { NotFoundError } from '../lib/errors';
import type { MessageNotifier } from '../realtime/delivery-gateway';
import type { MessageLog, UserStore } from '../repositories';
import type { AuthUser, MessageRecord } from '../types';

export class MessageService {
  constructor(
    private readonly users: UserStore,
    private readonly log: MessageLog,
    private readonly notifier: MessageNotifier
  ) {}

  async send(
    sender: AuthUser,
    recipientUsername: string,
    senderBlob: string,
    recipientBlob: string
  ): Promise<MessageRecord> {
    const recipientId = await this.users.findIdByUsername(recipientUsername);
    if (recipientId === null) {
      throw new NotFoundError('Recipient user not found.', 'RECIPIENT_NOT_FOUND');
    }

    const stored = await this.log.append(sender.id, recipientId, senderBlob, recipientBlob);

    // The record exactly as the recipient would read it back
    const record: MessageRecord = {
      id: stored.id,
      sender_id: sender.id,
      recipient_id: recipientId,
      timestamp: stored.timestamp,
      sender_username: sender.username,
      encrypted_blob: recipientBlob,
    };
    this.notifier.notifyMessageStored(recipientId, record);
    return record;
  }

  async list(user: AuthUser, partnerUsername: string, sinceId: number): Promise<MessageRecord[]> {
    const partnerId = await this.users.findIdByUsername(partnerUsername);
    if (partnerId === null) {
      throw new NotFoundError('Partner user not found.', 'PARTNER_NOT_FOUND');
    }
    return this.log.query(user.id, partnerId, sinceId);
  }
}
