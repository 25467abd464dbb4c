import type { QueryFn } from '../db';
import { ChatRequestRepository } from './ChatRequestRepository';
import type { ChatRequestStore } from './ChatRequestRepository';
import { MessageRepository } from './MessageRepository';
import type { MessageLog } from './MessageRepository';
import { PublicKeyRepository } from './PublicKeyRepository';
import type { PublicKeyStore } from './PublicKeyRepository';
import { UserRepository } from './UserRepository';
import type { UserStore } from './UserRepository';

export type { ChatRequestStore, MessageLog, PublicKeyStore, UserStore };
export { ChatRequestRepository, MessageRepository, PublicKeyRepository, UserRepository };

export interface Repositories {
  users: UserStore;
  publicKeys: PublicKeyStore;
  chatRequests: ChatRequestStore;
  messages: MessageLog;
}

export function createRepositories(query: QueryFn): Repositories {
  return {
    users: new UserRepository(query),
    publicKeys: new PublicKeyRepository(query),
    chatRequests: new ChatRequestRepository(query),
    messages: new MessageRepository(query),
  };
}
