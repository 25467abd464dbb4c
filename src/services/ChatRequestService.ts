/**
 * Chat Request Service
 *
 * The contact handshake: A requests B, B accepts, and from then on each
 * appears in the other's contact list.
 */

import { NotFoundError, ValidationError } from '../lib/errors';
import type { ChatRequestStore, UserStore } from '../repositories';
import type { AuthUser, PendingChatRequest } from '../types';

export class ChatRequestService {
  constructor(
    private readonly users: UserStore,
    private readonly requests: ChatRequestStore
  ) {}

  async request(user: AuthUser, recipientUsername: string): Promise<void> {
    const recipientId = await this.users.findIdByUsername(recipientUsername);
    if (recipientId === null) {
      throw new NotFoundError('Recipient user not found.', 'RECIPIENT_NOT_FOUND');
    }
    if (recipientId === user.id) {
      throw new ValidationError('Cannot send chat request to yourself.', 'SELF_REQUEST');
    }
    await this.requests.create(user.id, recipientId);
  }

  async listPending(user: AuthUser): Promise<PendingChatRequest[]> {
    return this.requests.listPending(user.id);
  }

  /**
   * An unknown requester is reported the same way as a missing request.
   */
  async accept(user: AuthUser, requesterUsername: string): Promise<void> {
    const requesterId = await this.users.findIdByUsername(requesterUsername);
    const accepted = requesterId !== null && (await this.requests.accept(requesterId, user.id));
    if (!accepted) {
      throw new NotFoundError('No pending request found from that user.', 'CHAT_REQUEST_NOT_FOUND');
    }
  }

  async listContacts(user: AuthUser): Promise<string[]> {
    return this.requests.listContacts(user.id);
  }
}
