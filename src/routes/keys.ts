/**
 * Public key directory: POST /upload_key, GET /get_key
 */

import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import { parseJsonBody, parseWith, uploadKeySchema, usernameQuerySchema } from '../lib/validators';
import type { KeyService } from '../services/KeyService';
import type { AppEnv } from '../types';

export function createKeyRoutes(deps: {
  keys: KeyService;
  requireAuth: MiddlewareHandler<AppEnv>;
}): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post('/upload_key', deps.requireAuth, async (c) => {
    const { public_key } = await parseJsonBody(c, uploadKeySchema);
    await deps.keys.upload(c.get('user'), public_key);
    return c.json({ message: 'Public key uploaded successfully.' });
  });

  routes.get('/get_key', deps.requireAuth, async (c) => {
    const username = parseWith(usernameQuerySchema, c.req.query('username'));
    return c.json(await deps.keys.getByUsername(username));
  });

  return routes;
}
