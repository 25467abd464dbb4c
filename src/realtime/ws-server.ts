/**
 * WebSocket push endpoint (GET /ws)
 *
 * Hooks the HTTP server's `upgrade` event. The bearer token (header, or
 * `?token=` for browser clients that cannot set headers) is verified before
 * the upgrade completes; a refused upgrade gets a bare HTTP status line.
 */

import type { IncomingMessage, Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer } from 'ws';
import type { WebSocket } from 'ws';
import { extractBearerToken } from '../auth/tokens';
import { AppError } from '../lib/errors';
import type { Logger } from '../logger';
import { wsLogger } from '../logger';
import type { TokenAuthenticator } from '../middleware/auth';
import { wsConnectionsTotal } from '../monitoring/metrics';
import type { AuthUser } from '../types';
import { Connection } from './connection';
import type { ConnectionOptions } from './connection';
import type { Hub } from './hub';
import { WsPushStream } from './ws-stream';

// ============================================================================
// TYPES
// ============================================================================

export interface PushServerOptions extends ConnectionOptions {
  path?: string;
  maxPayloadBytes: number;
  allowedOrigins?: readonly string[];
}

export type UpgradeDecision =
  | { ok: true; user: AuthUser }
  | { ok: false; status: number; reason: string };

const STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  500: 'Internal Server Error',
};

// ============================================================================
// AUTHORIZATION
// ============================================================================

/**
 * Decides whether an upgrade request may proceed. Pure apart from the
 * token check, so it is testable without sockets.
 */
export async function authorizeUpgrade(
  req: Pick<IncomingMessage, 'url' | 'headers'>,
  auth: TokenAuthenticator,
  opts: { path?: string; allowedOrigins?: readonly string[] } = {}
): Promise<UpgradeDecision> {
  const url = new URL(req.url ?? '/', 'http://localhost');
  if (url.pathname !== (opts.path ?? '/ws')) {
    return { ok: false, status: 404, reason: 'not_found' };
  }

  const origin = req.headers.origin;
  const allowed = opts.allowedOrigins ?? [];
  if (origin && allowed.length > 0 && !allowed.includes(origin)) {
    return { ok: false, status: 403, reason: 'origin_rejected' };
  }

  try {
    const token = extractBearerToken(req.headers.authorization) ?? url.searchParams.get('token');
    if (!token) {
      return { ok: false, status: 401, reason: 'token_missing' };
    }
    return { ok: true, user: await auth.authenticate(token) };
  } catch (err) {
    if (err instanceof AppError && err.statusCode === 401) {
      return { ok: false, status: 401, reason: err.code.toLowerCase() };
    }
    throw err;
  }
}

function refuse(socket: Duplex, status: number): void {
  socket.write(`HTTP/1.1 ${status} ${STATUS_TEXT[status] ?? 'Error'}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

// ============================================================================
// SERVER
// ============================================================================

export class PushServer {
  private readonly wss: WebSocketServer;
  private readonly log: Logger;

  constructor(
    private readonly hub: Hub,
    private readonly auth: TokenAuthenticator,
    private readonly opts: PushServerOptions
  ) {
    this.wss = new WebSocketServer({ noServer: true, maxPayload: opts.maxPayloadBytes });
    this.log = opts.logger ?? wsLogger;
  }

  attach(server: Server): void {
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head).catch((err: unknown) => {
        this.log.error({ err }, 'Upgrade failed');
        wsConnectionsTotal.inc({ outcome: 'error' });
        if (!socket.destroyed) refuse(socket, 500);
      });
    });
  }

  private async handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    const decision = await authorizeUpgrade(req, this.auth, this.opts);
    if (!decision.ok) {
      this.log.info({ status: decision.status, reason: decision.reason }, 'Upgrade refused');
      wsConnectionsTotal.inc({ outcome: decision.reason });
      refuse(socket, decision.status);
      return;
    }

    // The client may have gone away while the token was checked
    if (socket.destroyed) return;

    this.wss.handleUpgrade(req, socket, head, (ws) => {
      wsConnectionsTotal.inc({ outcome: 'accepted' });
      this.accept(ws, decision.user);
    });
  }

  /**
   * build → register → start pumps
   */
  accept(ws: WebSocket, user: AuthUser): Connection {
    const conn = new Connection(user.id, new WsPushStream(ws), this.hub, this.opts);
    this.hub.register(conn);
    this.log.info({ userId: user.id, connectionId: conn.id }, 'WebSocket connected');
    conn.start().catch((err: unknown) => {
      this.log.error({ err, userId: user.id }, 'Connection pumps failed');
    });
    return conn;
  }

  async close(): Promise<void> {
    for (const client of this.wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
