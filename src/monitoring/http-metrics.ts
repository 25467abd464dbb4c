import { httpRequestDuration, httpRequestsTotal } from './metrics'
import type { MiddlewareHandler } from 'hono'

// Routes are flat, so the path itself is a bounded label set; anything
// unknown collapses into one bucket.
const KNOWN_ROUTES = new Set([
  '/register',
  '/login',
  '/upload_key',
  '/get_key',
  '/request_chat',
  '/get_chat_requests',
  '/accept_chat',
  '/get_contacts',
  '/send_message',
  '/get_messages',
])

export function normalizeRoute(path: string): string {
  return KNOWN_ROUTES.has(path) ? path : 'other'
}

export function httpMetricsMiddleware(): MiddlewareHandler {
  return async (c, next) => {
    const path = c.req.path

    if (path.startsWith('/health') || path === '/metrics') {
      return next()
    }

    const start = performance.now()
    const method = c.req.method
    const route = normalizeRoute(path)

    try {
      await next()
    } catch (err) {
      const duration = (performance.now() - start) / 1000
      httpRequestDuration.observe({ method, route, status_code: '500' }, duration)
      httpRequestsTotal.inc({ method, route, status_code: '500' })
      throw err
    }

    const duration = (performance.now() - start) / 1000
    const statusCode = c.res.status.toString()

    httpRequestDuration.observe({ method, route, status_code: statusCode }, duration)
    httpRequestsTotal.inc({ method, route, status_code: statusCode })
  }
}
