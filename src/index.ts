/**
 * Relay entry point
 *
 * config → database + schema → hub loop → HTTP app → /ws upgrade handler
 * → graceful shutdown hooks.
 */

import { Server } from 'node:http';
import { serve } from '@hono/node-server';
import { TokenSigner } from './auth/tokens';
import { config, validateConfig } from './config';
import { createDb } from './db';
import { gracefulShutdown } from './lib/shutdown';
import { logger } from './logger';
import { DeliveryGateway } from './realtime/delivery-gateway';
import { Hub } from './realtime/hub';
import { PushServer } from './realtime/ws-server';
import { createRepositories } from './repositories';
import { captureException, flushSentry, initSentry } from './sentry';
import { createApp } from './server';
import { AuthService, bcryptHasher } from './services/AuthService';
import { ChatRequestService } from './services/ChatRequestService';
import { KeyService } from './services/KeyService';
import { MessageService } from './services/MessageService';

async function main(): Promise<void> {
  initSentry();

  const { valid, errors } = validateConfig();
  if (!valid) {
    logger.fatal({ errors }, 'Configuration validation failed');
    process.exit(1);
  }

  const db = createDb({ url: config.database.url, maxConnections: config.database.maxConnections });
  await db.applySchema();

  const hub = new Hub({ pushQueueSize: config.realtime.hubQueueSize });
  hub.start();

  const repos = createRepositories(db.query);
  const tokens = new TokenSigner(config.auth.secretKey, config.auth.tokenTtlSeconds);
  const auth = new AuthService(repos.users, tokens, bcryptHasher(config.auth.bcryptRounds));

  const app = createApp({
    auth,
    keys: new KeyService(repos.publicKeys),
    chat: new ChatRequestService(repos.users, repos.chatRequests),
    messages: new MessageService(repos.users, repos.messages, new DeliveryGateway(hub)),
    health: {
      database: () => db.healthCheck(),
      onlineCount: () => hub.onlineCount(),
      hubRunning: () => hub.running,
    },
  });

  const server = serve({ fetch: app.fetch, port: config.app.port }, (info) => {
    logger.info({ port: info.port, env: config.app.env }, 'Relay listening');
  });
  if (!(server instanceof Server)) {
    throw new Error('Expected a node:http server');
  }

  const pushServer = new PushServer(hub, auth, {
    sendQueueSize: config.realtime.sendQueueSize,
    pingIntervalMs: config.realtime.pingIntervalMs,
    idleTimeoutMs: config.realtime.idleTimeoutMs,
    maxPayloadBytes: config.realtime.maxPayloadBytes,
    allowedOrigins: config.app.allowedOrigins,
  });
  pushServer.attach(server);

  // ============================================================================
  // GRACEFUL SHUTDOWN
  // ============================================================================

  gracefulShutdown.register('hub', 0, () => hub.stop());
  gracefulShutdown.register('websockets', 10, () => pushServer.close());
  gracefulShutdown.register('httpServer', 20, () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    })
  );
  gracefulShutdown.register('database', 30, () => db.close());
  gracefulShutdown.register('sentry', 40, () => flushSentry());
  gracefulShutdown.setup();

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    captureException(reason);
  });
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
