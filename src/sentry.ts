/**
 * Sentry Error Tracking
 *
 * Initializes Sentry when SENTRY_DSN is set. Without a DSN every helper
 * here is a no-op.
 */

import * as Sentry from '@sentry/node';
import { config } from './config';
import { logger } from './logger';

let enabled = false;

export function initSentry(): void {
  const dsn = config.observability.sentryDsn;
  if (!dsn) {
    logger.info('Sentry DSN not configured, error tracking disabled');
    return;
  }

  Sentry.init({
    dsn,
    environment: config.app.env,
    release: `cipher-relay@${process.env.npm_package_version || '1.0.0'}`,
    tracesSampleRate: config.app.isProduction ? 0.1 : 1.0,
    sendDefaultPii: false,

    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers['authorization'];
        delete event.request.headers['cookie'];
      }
      return event;
    },

    ignoreErrors: [
      'ECONNRESET',
      'EPIPE',
      'AbortError',
      'Client network socket disconnected',
    ],
  });

  enabled = true;
  logger.info('Sentry error tracking initialized');
}

export function captureException(err: unknown, extra?: Record<string, unknown>): void {
  if (!enabled) return;
  try {
    Sentry.captureException(err, extra ? { extra } : undefined);
  } catch (sentryError) {
    logger.debug({ err: sentryError }, 'Sentry capture failed');
  }
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!enabled) return;
  await Sentry.flush(timeoutMs);
}
