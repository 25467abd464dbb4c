/**
 * HTTP application
 *
 * Builds the Hono app from its collaborators. Nothing here opens sockets or
 * pools, so tests drive it through app.request().
 */

import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { cors } from 'hono/cors';
import { config } from './config';
import { createHonoErrorHandler, createNotFoundHandler } from './lib/errors/error-handler';
import { requireAuth } from './middleware/auth';
import { createRateLimiters } from './middleware/rateLimit';
import type { RateLimiters } from './middleware/rateLimit';
import { requestIdMiddleware, requestLoggingMiddleware } from './middleware/request-id';
import { securityHeaders } from './middleware/security';
import { httpMetricsMiddleware } from './monitoring/http-metrics';
import { createMetricsEndpoint } from './monitoring/metrics';
import { createAuthRoutes } from './routes/auth';
import { createChatRoutes } from './routes/chat';
import { createKeyRoutes } from './routes/keys';
import { createMessageRoutes } from './routes/messages';
import type { AuthService } from './services/AuthService';
import type { ChatRequestService } from './services/ChatRequestService';
import type { KeyService } from './services/KeyService';
import type { MessageService } from './services/MessageService';
import type { AppEnv } from './types';

export interface AppDeps {
  auth: AuthService;
  keys: KeyService;
  chat: ChatRequestService;
  messages: MessageService;
  health: {
    database(): Promise<{ connected: boolean; latencyMs: number }>;
    onlineCount(): number;
    hubRunning(): boolean;
  };
  limiters?: RateLimiters;
  allowedOrigins?: readonly string[];
  bodyLimitBytes?: number;
}

export function createApp(deps: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const limiters = deps.limiters ?? createRateLimiters();
  const allowedOrigins = deps.allowedOrigins ?? config.app.allowedOrigins;
  const maxBody = deps.bodyLimitBytes ?? config.app.bodyLimitBytes;

  // ============================================================================
  // MIDDLEWARE
  // ============================================================================

  app.use('*', requestIdMiddleware);
  app.use('*', requestLoggingMiddleware);
  app.use('*', securityHeaders);

  // Explicit origins only; an empty list allows any origin without credentials
  app.use('*', cors({
    origin: (requestOrigin) => {
      if (allowedOrigins.length === 0) return '*';
      return allowedOrigins.includes(requestOrigin) ? requestOrigin : null;
    },
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
    maxAge: 3600,
  }));

  app.use('*', bodyLimit({
    maxSize: maxBody,
    onError: (c) => c.json({ message: 'Request body too large', code: 'PAYLOAD_TOO_LARGE' }, 413),
  }));

  app.use('*', httpMetricsMiddleware());

  createMetricsEndpoint(app);

  // ============================================================================
  // HEALTH CHECK
  // ============================================================================

  app.get('/health', (c) => {
    return c.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  app.get('/health/detailed', async (c) => {
    const database = await deps.health.database();
    const hubRunning = deps.health.hubRunning();
    const healthy = database.connected && hubRunning;

    return c.json({
      status: healthy ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: Math.floor(process.uptime()),
      checks: {
        database: database.connected
          ? { status: 'ok', latencyMs: database.latencyMs }
          : { status: 'error', latencyMs: database.latencyMs },
        hub: {
          status: hubRunning ? 'ok' : 'stopped',
          onlineUsers: deps.health.onlineCount(),
        },
      },
    }, healthy ? 200 : 503);
  });

  // ============================================================================
  // API
  // ============================================================================

  const auth = requireAuth(deps.auth);

  app.route('/', createAuthRoutes({ auth: deps.auth, limiters }));
  app.route('/', createKeyRoutes({ keys: deps.keys, requireAuth: auth }));
  app.route('/', createChatRoutes({ chat: deps.chat, requireAuth: auth, limiters }));
  app.route('/', createMessageRoutes({ messages: deps.messages, requireAuth: auth, limiters }));

  app.notFound(createNotFoundHandler());
  app.onError(createHonoErrorHandler());

  return app;
}
