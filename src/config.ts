/**
 * Relay Configuration
 *
 * Centralized configuration read once from the environment.
 */

import 'dotenv/config';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * DATABASE_URL wins; otherwise the URL is assembled from the component
 * variables used by the docker-compose setup.
 */
function resolveDatabaseUrl(): string {
  if (process.env.DATABASE_URL) return process.env.DATABASE_URL;

  const user = process.env.POSTGRES_USER;
  const password = process.env.POSTGRES_PASSWORD;
  const database = process.env.POSTGRES_DB;
  if (!user || !database) return '';

  const host = process.env.DB_HOST || 'localhost';
  const port = process.env.DB_PORT || '5432';
  const auth = password
    ? `${encodeURIComponent(user)}:${encodeURIComponent(password)}`
    : encodeURIComponent(user);
  return `postgresql://${auth}@${host}:${port}/${database}`;
}

export const config = {
  // Database (PostgreSQL)
  database: {
    url: resolveDatabaseUrl(),
    maxConnections: intFromEnv('DB_MAX_CONNECTIONS', 10),
  },

  auth: {
    secretKey: process.env.SECRET_KEY || '',
    tokenTtlSeconds: intFromEnv('JWT_TTL_SECONDS', 24 * 60 * 60),
    bcryptRounds: intFromEnv('BCRYPT_ROUNDS', 10),
  },

  // Real-time delivery
  realtime: {
    sendQueueSize: intFromEnv('WS_SEND_QUEUE_SIZE', 256),
    hubQueueSize: intFromEnv('HUB_PUSH_QUEUE_SIZE', 1024),
    pingIntervalMs: intFromEnv('WS_PING_INTERVAL_MS', 30_000),
    idleTimeoutMs: intFromEnv('WS_IDLE_TIMEOUT_MS', 60_000),
    maxPayloadBytes: intFromEnv('WS_MAX_PAYLOAD_BYTES', 4096),
  },

  observability: {
    sentryDsn: process.env.SENTRY_DSN || '',
    logLevel: process.env.LOG_LEVEL || '',
  },

  app: {
    port: intFromEnv('PORT', 5000),
    env: process.env.NODE_ENV || 'development',
    isDevelopment: process.env.NODE_ENV !== 'production',
    isProduction: process.env.NODE_ENV === 'production',
    isTest: process.env.NODE_ENV === 'test',
    bodyLimitBytes: intFromEnv('BODY_LIMIT_BYTES', 1024 * 1024),
    allowedOrigins: (process.env.ALLOWED_ORIGINS || '')
      .split(',')
      .map(origin => origin.trim())
      .filter(Boolean),
  },
} as const;

export type Config = typeof config;

/**
 * Validate required configuration before the server starts
 */
export function validateConfig(cfg: Config = config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!cfg.database.url) {
    errors.push('DATABASE_URL (or POSTGRES_USER/POSTGRES_DB) is required');
  }

  if (!cfg.auth.secretKey) {
    errors.push('SECRET_KEY is required');
  } else if (cfg.app.isProduction && cfg.auth.secretKey.length < 32) {
    errors.push('SECRET_KEY must be at least 32 characters in production');
  }

  if (cfg.realtime.sendQueueSize < 1) errors.push('WS_SEND_QUEUE_SIZE must be positive');
  if (cfg.realtime.hubQueueSize < 1) errors.push('HUB_PUSH_QUEUE_SIZE must be positive');
  if (cfg.realtime.idleTimeoutMs <= cfg.realtime.pingIntervalMs) {
    errors.push('WS_IDLE_TIMEOUT_MS must be greater than WS_PING_INTERVAL_MS');
  }

  return { valid: errors.length === 0, errors };
}

export default config;
