/**
 * Structured Logger
 *
 * Pino-based structured JSON logging.
 * - Development: pretty-printed, colorized (pino-pretty)
 * - Production: JSON lines
 *
 * Child loggers for subsystems:
 *   const log = logger.child({ module: 'hub' });
 *   log.info({ userId }, 'Connection registered');
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { config } from './config';

const isDev = config.app.isDevelopment && !config.app.isTest;

export const logger = pino({
  level: config.observability.logLevel || (isDev ? 'debug' : 'info'),

  // Ciphertext and key material never reach the logs
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'password',
      'token',
      'secret',
      'sender_blob',
      'recipient_blob',
      'encrypted_blob',
      'public_key',
    ],
    censor: '[REDACTED]',
  },

  base: {
    service: 'cipher-relay',
    env: config.app.env,
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,service,env',
        },
      }
    : undefined,
});

export type { Logger };

export const hubLogger = logger.child({ module: 'hub' });
export const wsLogger = logger.child({ module: 'ws' });
export const authLogger = logger.child({ module: 'auth' });
export const dbLogger = logger.child({ module: 'db' });
export const httpLogger = logger.child({ module: 'http' });
