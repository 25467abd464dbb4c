/**
 * Database Client
 *
 * node-postgres pool behind a small query interface. Repositories receive a
 * `QueryFn` so they run unchanged against the pool or a fake.
 *
 * @see schema.sql
 */

import { readFileSync } from 'node:fs';
import pg from 'pg';
import { dbLogger } from './logger';

// ============================================================================
// QUERY INTERFACE
// ============================================================================

export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number;
}

export type QueryFn = <T = Record<string, unknown>>(
  sql: string,
  params?: unknown[]
) => Promise<QueryResult<T>>;

export interface Database {
  query: QueryFn;
  healthCheck(): Promise<{ connected: boolean; latencyMs: number }>;
  applySchema(): Promise<void>;
  close(): Promise<void>;
}

// ============================================================================
// ERROR HANDLING
// ============================================================================

export interface DatabaseError extends Error {
  code?: string;
  constraint?: string;
  detail?: string;
  table?: string;
}

/**
 * Check if error is a unique constraint violation
 */
export function isUniqueViolation(error: unknown): error is DatabaseError {
  if (!(error instanceof Error)) return false;
  return 'code' in error && error.code === '23505';
}

// ============================================================================
// POOL
// ============================================================================

export function loadSchema(): string {
  return readFileSync(new URL('./schema.sql', import.meta.url), 'utf8');
}

export function createDb(opts: { url: string; maxConnections?: number }): Database {
  const pool = new pg.Pool({
    connectionString: opts.url,
    max: opts.maxConnections ?? 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });

  // Idle clients can error when the server restarts; pg would otherwise
  // crash the process on an unhandled 'error' event.
  pool.on('error', (err) => {
    dbLogger.error({ err }, 'Idle database client error');
  });

  const db: Database = {
    query: async <T = Record<string, unknown>>(sql: string, params?: unknown[]) => {
      const result = await pool.query(sql, params);
      return {
        rows: result.rows as T[],
        rowCount: result.rowCount ?? 0,
      };
    },

    async healthCheck() {
      const start = Date.now();
      try {
        await pool.query('SELECT 1');
        return { connected: true, latencyMs: Date.now() - start };
      } catch (err) {
        dbLogger.warn({ err }, 'Database health check failed');
        return { connected: false, latencyMs: Date.now() - start };
      }
    },

    async applySchema() {
      await pool.query(loadSchema());
      dbLogger.info('Schema applied');
    },

    async close() {
      await pool.end();
      dbLogger.info('Database pool closed');
    },
  };

  return db;
}
