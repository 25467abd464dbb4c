/**
 * Contact handshake: POST /request_chat, GET /get_chat_requests,
 * POST /accept_chat, GET /get_contacts
 */

import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import { acceptChatSchema, parseJsonBody, requestChatSchema } from '../lib/validators';
import type { RateLimiters } from '../middleware/rateLimit';
import type { ChatRequestService } from '../services/ChatRequestService';
import type { AppEnv } from '../types';

export function createChatRoutes(deps: {
  chat: ChatRequestService;
  requireAuth: MiddlewareHandler<AppEnv>;
  limiters: Pick<RateLimiters, 'requestChat' | 'acceptChat'>;
}): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post('/request_chat', deps.limiters.requestChat, deps.requireAuth, async (c) => {
    const { recipient_username } = await parseJsonBody(c, requestChatSchema);
    await deps.chat.request(c.get('user'), recipient_username);
    return c.json({ message: `Chat request sent to ${recipient_username}.` }, 201);
  });

  routes.get('/get_chat_requests', deps.requireAuth, async (c) => {
    const pending = await deps.chat.listPending(c.get('user'));
    return c.json({ pending_requests: pending });
  });

  routes.post('/accept_chat', deps.limiters.acceptChat, deps.requireAuth, async (c) => {
    const { requester_username } = await parseJsonBody(c, acceptChatSchema);
    await deps.chat.accept(c.get('user'), requester_username);
    return c.json({ message: `Chat request from ${requester_username} accepted!` });
  });

  routes.get('/get_contacts', deps.requireAuth, async (c) => {
    const contacts = await deps.chat.listContacts(c.get('user'));
    return c.json({ contacts });
  });

  return routes;
}
