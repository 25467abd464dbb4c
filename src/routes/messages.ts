/**
 * Message routes: POST /send_message, GET /get_messages
 *
 * /get_messages is the durable path; the WebSocket push is only a shortcut
 * for recipients who happen to be online.
 */

import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import {
  parseJsonBody,
  parseWith,
  sendMessageSchema,
  sinceIdSchema,
  usernameQuerySchema,
} from '../lib/validators';
import type { RateLimiters } from '../middleware/rateLimit';
import type { MessageService } from '../services/MessageService';
import type { AppEnv } from '../types';

export function createMessageRoutes(deps: {
  messages: MessageService;
  requireAuth: MiddlewareHandler<AppEnv>;
  limiters: Pick<RateLimiters, 'sendMessage'>;
}): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post('/send_message', deps.limiters.sendMessage, deps.requireAuth, async (c) => {
    const body = await parseJsonBody(c, sendMessageSchema);
    await deps.messages.send(
      c.get('user'),
      body.recipient_username,
      body.sender_blob,
      body.recipient_blob
    );
    return c.json({ message: 'Message sent successfully.' }, 201);
  });

  routes.get('/get_messages', deps.requireAuth, async (c) => {
    const partner = parseWith(usernameQuerySchema, c.req.query('username'));
    const sinceId = parseWith(sinceIdSchema, c.req.query('since_id'));
    const messages = await deps.messages.list(c.get('user'), partner, sinceId);
    return c.json({ messages });
  });

  return routes;
}
