/**
 * Service tests against the in-memory repositories.
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TokenSigner } from '../../src/auth/tokens';
import { AuthService, bcryptHasher } from '../../src/services/AuthService';
import type { PasswordHasher } from '../../src/services/AuthService';
import { ChatRequestService } from '../../src/services/ChatRequestService';
import { KeyService } from '../../src/services/KeyService';
import { MessageService } from '../../src/services/MessageService';
import type { MessageNotifier } from '../../src/realtime/delivery-gateway';
import type { Repositories } from '../../src/repositories';
import type { AuthUser } from '../../src/types';
import { InMemoryStore } from '../fakes/InMemoryStore';

const plainHasher: PasswordHasher = {
  hash: async (password) => `hashed:${password}`,
  compare: async (password, hash) => hash === `hashed:${password}`,
};

const T0 = 1_800_000_000;

let store: InMemoryStore;
let repos: Repositories;
let alice: AuthUser;
let bob: AuthUser;

beforeEach(async () => {
  store = new InMemoryStore();
  repos = store.repositories();
  alice = await repos.users.create('alice', 'hashed:pw');
  bob = await repos.users.create('bob', 'hashed:pw');
});

describe('AuthService', () => {
  let service: AuthService;

  beforeEach(() => {
    service = new AuthService(repos.users, new TokenSigner('test-secret', 3600, () => T0), plainHasher);
  });

  it('should store the hashed password on register', async () => {
    const carol = await service.register('carol', 'secret');
    expect(carol).toEqual({ id: 3, username: 'carol' });
    expect(store.userByUsername('carol')?.password_hash).toBe('hashed:secret');
  });

  it('should reject a taken username', async () => {
    await expect(service.register('alice', 'x')).rejects.toMatchObject({
      statusCode: 409,
      message: 'Username already exists.',
    });
  });

  it('should issue a token that authenticates back to the user', async () => {
    const token = await service.login('alice', 'pw');
    await expect(service.authenticate(token)).resolves.toEqual({ id: 1, username: 'alice' });
  });

  it('should give one answer for unknown users and wrong passwords', async () => {
    const expected = { statusCode: 401, message: 'Could not verify! Check username/password.' };
    await expect(service.login('mallory', 'pw')).rejects.toMatchObject(expected);
    await expect(service.login('alice', 'wrong')).rejects.toMatchObject(expected);
  });

  it('should reject a token for a user that no longer exists', async () => {
    const signer = new TokenSigner('test-secret', 3600, () => T0);
    const token = await signer.issue({ id: 99, username: 'ghost' });
    await expect(service.authenticate(token)).rejects.toMatchObject({
      message: 'Token is invalid!',
      code: 'TOKEN_INVALID',
    });
  });
});

describe('bcryptHasher', () => {
  it('should verify the right password and refuse a wrong one', async () => {
    const hasher = bcryptHasher(4);
    const hash = await hasher.hash('pw');

    expect(hash).not.toBe('pw');
    await expect(hasher.compare('pw', hash)).resolves.toBe(true);
    await expect(hasher.compare('wrong', hash)).resolves.toBe(false);
  });
});

describe('KeyService', () => {
  it('should replace a key on re-upload', async () => {
    const keys = new KeyService(repos.publicKeys);
    await keys.upload(alice, 'key-1');
    await keys.upload(alice, 'key-2');

    await expect(keys.getByUsername('alice')).resolves.toEqual({ username: 'alice', public_key: 'key-2' });
  });

  it('should 404 when the user has no key', async () => {
    const keys = new KeyService(repos.publicKeys);
    await expect(keys.getByUsername('bob')).rejects.toMatchObject({
      statusCode: 404,
      message: 'User not found or has no public key.',
    });
    await expect(keys.getByUsername('nobody')).rejects.toMatchObject({ statusCode: 404 });
  });
});

describe('ChatRequestService', () => {
  let chat: ChatRequestService;

  beforeEach(() => {
    chat = new ChatRequestService(repos.users, repos.chatRequests);
  });

  it('should complete the handshake', async () => {
    await chat.request(alice, 'bob');
    expect(await chat.listPending(bob)).toEqual([{ requester_username: 'alice', status: 'pending' }]);

    await chat.accept(bob, 'alice');
    expect(await chat.listPending(bob)).toEqual([]);
    expect(await chat.listContacts(alice)).toEqual(['bob']);
    expect(await chat.listContacts(bob)).toEqual(['alice']);
  });

  it('should reject requests to unknown users and to yourself', async () => {
    await expect(chat.request(alice, 'nobody')).rejects.toMatchObject({
      statusCode: 404,
      message: 'Recipient user not found.',
    });
    await expect(chat.request(alice, 'alice')).rejects.toMatchObject({
      statusCode: 400,
      message: 'Cannot send chat request to yourself.',
    });
  });

  it('should reject a duplicate request', async () => {
    await chat.request(alice, 'bob');
    await expect(chat.request(alice, 'bob')).rejects.toMatchObject({
      statusCode: 409,
      message: 'Chat request already pending or accepted.',
    });
  });

  it('should 404 an accept with nothing pending', async () => {
    const expected = { statusCode: 404, message: 'No pending request found from that user.' };
    await expect(chat.accept(bob, 'alice')).rejects.toMatchObject(expected);
    await expect(chat.accept(bob, 'nobody')).rejects.toMatchObject(expected);
  });

  it('should list contacts from both directions once each, sorted', async () => {
    const carol = await repos.users.create('carol', 'hashed:pw');
    await chat.request(carol, 'alice');
    await chat.request(alice, 'bob');
    await chat.request(bob, 'alice');
    await chat.accept(alice, 'carol');
    await chat.accept(bob, 'alice');
    await chat.accept(alice, 'bob');

    expect(await chat.listContacts(alice)).toEqual(['bob', 'carol']);
  });
});

describe('MessageService', () => {
  it('should persist before notifying, with the recipient blob', async () => {
    const persistedAtNotify: number[] = [];
    const notifier: MessageNotifier = {
      notifyMessageStored: vi.fn(() => {
        persistedAtNotify.push(store.messages.length);
      }),
    };
    const messages = new MessageService(repos.users, repos.messages, notifier);

    const record = await messages.send(alice, 'bob', 'for-alice', 'for-bob');

    expect(record).toEqual({
      id: 1,
      sender_id: 1,
      recipient_id: 2,
      timestamp: '2026-01-01T00:00:00.000Z',
      sender_username: 'alice',
      encrypted_blob: 'for-bob',
    });
    expect(persistedAtNotify).toEqual([1]);
    expect(notifier.notifyMessageStored).toHaveBeenCalledWith(2, record);
  });

  it('should not notify when the recipient is unknown', async () => {
    const notifier: MessageNotifier = { notifyMessageStored: vi.fn() };
    const messages = new MessageService(repos.users, repos.messages, notifier);

    await expect(messages.send(alice, 'nobody', 'a', 'b')).rejects.toMatchObject({
      statusCode: 404,
      message: 'Recipient user not found.',
    });
    expect(notifier.notifyMessageStored).not.toHaveBeenCalled();
    expect(store.messages).toHaveLength(0);
  });

  it('should list the conversation with each side reading its own blob', async () => {
    const messages = new MessageService(repos.users, repos.messages, { notifyMessageStored: () => {} });
    await messages.send(alice, 'bob', 'a1-for-alice', 'a1-for-bob');
    await messages.send(bob, 'alice', 'b1-for-bob', 'b1-for-alice');

    const forAlice = await messages.list(alice, 'bob', 0);
    expect(forAlice.map((m) => m.encrypted_blob)).toEqual(['a1-for-alice', 'b1-for-alice']);

    const forBob = await messages.list(bob, 'alice', 1);
    expect(forBob).toEqual([
      {
        id: 2,
        sender_id: 2,
        recipient_id: 1,
        timestamp: '2026-01-01T00:00:01.000Z',
        sender_username: 'bob',
        encrypted_blob: 'b1-for-bob',
      },
    ]);
  });

  it('should 404 an unknown partner', async () => {
    const messages = new MessageService(repos.users, repos.messages, { notifyMessageStored: () => {} });
    await expect(messages.list(alice, 'nobody', 0)).rejects.toMatchObject({
      message: 'Partner user not found.',
      code: 'PARTNER_NOT_FOUND',
    });
  });
});
