import { ConflictError } from '../../src/lib/errors';
import type {
  ChatRequestStore,
  MessageLog,
  PublicKeyStore,
  Repositories,
  UserStore,
} from '../../src/repositories';
import type {
  ChatRequestStatus,
  MessageRecord,
  PendingChatRequest,
  StoredMessage,
  User,
} from '../../src/types';

interface ChatRequestRow {
  id: number;
  requester_id: number;
  requested_id: number;
  status: ChatRequestStatus;
}

interface MessageRow {
  id: number;
  sender_id: number;
  recipient_id: number;
  sender_blob: string;
  recipient_blob: string;
  timestamp: string;
}

/**
 * The relay's tables held in arrays, with the same constraints the SQL
 * schema enforces. Timestamps come from a clock that ticks one second per
 * insert starting at 2026-01-01T00:00:00Z.
 */
export class InMemoryStore {
  readonly users: User[] = [];
  readonly publicKeys = new Map<number, string>();
  readonly chatRequests: ChatRequestRow[] = [];
  readonly messages: MessageRow[] = [];
  private clock = 0;

  tick(): string {
    return new Date(Date.UTC(2026, 0, 1, 0, 0, this.clock++)).toISOString();
  }

  userByUsername(username: string): User | undefined {
    return this.users.find((u) => u.username === username);
  }

  usernameOf(id: number): string {
    const user = this.users.find((u) => u.id === id);
    if (!user) throw new Error(`no user ${id}`);
    return user.username;
  }

  repositories(): Repositories {
    return {
      users: new InMemoryUserStore(this),
      publicKeys: new InMemoryPublicKeyStore(this),
      chatRequests: new InMemoryChatRequestStore(this),
      messages: new InMemoryMessageLog(this),
    };
  }
}

export class InMemoryUserStore implements UserStore {
  constructor(private readonly db: InMemoryStore) {}

  async create(username: string, passwordHash: string): Promise<User> {
    if (this.db.userByUsername(username)) {
      throw new ConflictError('Username already exists.', 'USERNAME_TAKEN');
    }
    const user: User = { id: this.db.users.length + 1, username, password_hash: passwordHash };
    this.db.users.push(user);
    return user;
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.db.userByUsername(username) ?? null;
  }

  async findById(id: number): Promise<User | null> {
    return this.db.users.find((u) => u.id === id) ?? null;
  }

  async findIdByUsername(username: string): Promise<number | null> {
    return this.db.userByUsername(username)?.id ?? null;
  }
}

export class InMemoryPublicKeyStore implements PublicKeyStore {
  constructor(private readonly db: InMemoryStore) {}

  async upsert(userId: number, publicKey: string): Promise<void> {
    this.db.publicKeys.set(userId, publicKey);
  }

  async findByUsername(username: string): Promise<string | null> {
    const user = this.db.userByUsername(username);
    if (!user) return null;
    return this.db.publicKeys.get(user.id) ?? null;
  }
}

export class InMemoryChatRequestStore implements ChatRequestStore {
  constructor(private readonly db: InMemoryStore) {}

  async create(requesterId: number, requestedId: number): Promise<void> {
    const exists = this.db.chatRequests.some(
      (r) => r.requester_id === requesterId && r.requested_id === requestedId
    );
    if (exists) {
      throw new ConflictError('Chat request already pending or accepted.', 'CHAT_REQUEST_EXISTS');
    }
    this.db.chatRequests.push({
      id: this.db.chatRequests.length + 1,
      requester_id: requesterId,
      requested_id: requestedId,
      status: 'pending',
    });
  }

  async listPending(requestedId: number): Promise<PendingChatRequest[]> {
    return this.db.chatRequests
      .filter((r) => r.requested_id === requestedId && r.status === 'pending')
      .map((r) => ({ requester_username: this.db.usernameOf(r.requester_id), status: r.status }));
  }

  async accept(requesterId: number, requestedId: number): Promise<boolean> {
    const row = this.db.chatRequests.find(
      (r) => r.requester_id === requesterId && r.requested_id === requestedId && r.status === 'pending'
    );
    if (!row) return false;
    row.status = 'accepted';
    return true;
  }

  async listContacts(userId: number): Promise<string[]> {
    const names = new Set<string>();
    for (const r of this.db.chatRequests) {
      if (r.status !== 'accepted') continue;
      if (r.requester_id === userId) names.add(this.db.usernameOf(r.requested_id));
      if (r.requested_id === userId) names.add(this.db.usernameOf(r.requester_id));
    }
    return [...names].sort();
  }
}

export class InMemoryMessageLog implements MessageLog {
  constructor(private readonly db: InMemoryStore) {}

  async append(
    senderId: number,
    recipientId: number,
    senderBlob: string,
    recipientBlob: string
  ): Promise<StoredMessage> {
    const row: MessageRow = {
      id: this.db.messages.length + 1,
      sender_id: senderId,
      recipient_id: recipientId,
      sender_blob: senderBlob,
      recipient_blob: recipientBlob,
      timestamp: this.db.tick(),
    };
    this.db.messages.push(row);
    return { id: row.id, timestamp: row.timestamp };
  }

  async query(userId: number, partnerId: number, sinceId: number): Promise<MessageRecord[]> {
    return this.db.messages
      .filter(
        (m) =>
          ((m.sender_id === userId && m.recipient_id === partnerId) ||
            (m.sender_id === partnerId && m.recipient_id === userId)) &&
          m.id > sinceId
      )
      .map((m) => ({
        id: m.id,
        sender_id: m.sender_id,
        recipient_id: m.recipient_id,
        timestamp: m.timestamp,
        sender_username: this.db.usernameOf(m.sender_id),
        encrypted_blob: m.sender_id === userId ? m.sender_blob : m.recipient_blob,
      }));
  }
}
