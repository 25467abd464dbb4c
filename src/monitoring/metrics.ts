import type { Hono } from 'hono';
import { Registry, Histogram, Counter, Gauge, collectDefaultMetrics } from 'prom-client';
import type { AppEnv } from '../types';

const registry = new Registry();
collectDefaultMetrics({ register: registry });

const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
  registers: [registry],
});

// ============================================================================
// REAL-TIME DELIVERY
// ============================================================================

export type PushDropReason = 'offline' | 'queue_full' | 'serialize_failed' | 'hub_saturated';

const pushDropsTotal = new Counter<'reason'>({
  name: 'push_drops_total',
  help: 'Push jobs dropped before reaching a connection queue',
  labelNames: ['reason'],
  registers: [registry],
});

const pushFramesEnqueuedTotal = new Counter({
  name: 'push_frames_enqueued_total',
  help: 'Frames placed on a connection send queue',
  registers: [registry],
});

const wsConnectionsActive = new Gauge({
  name: 'ws_connections_active',
  help: 'Connections currently registered with the hub',
  registers: [registry],
});

const wsConnectionsTotal = new Counter<'outcome'>({
  name: 'ws_connections_total',
  help: 'WebSocket upgrade attempts by outcome',
  labelNames: ['outcome'],
  registers: [registry],
});

function createMetricsEndpoint(app: Hono<AppEnv>): void {
  app.get('/metrics', async (c) => {
    const metrics = await registry.metrics();
    return c.text(metrics, 200, {
      'Content-Type': registry.contentType,
    });
  });
}

export {
  registry,
  httpRequestDuration,
  httpRequestsTotal,
  pushDropsTotal,
  pushFramesEnqueuedTotal,
  wsConnectionsActive,
  wsConnectionsTotal,
  createMetricsEndpoint,
};
