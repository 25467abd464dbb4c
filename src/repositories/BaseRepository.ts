/**
 * Base Repository Pattern
 *
 * Decouples services from SQL. Every repository is built over a QueryFn,
 * the pool's in production and a recording fake in tests.
 */

import type { QueryFn } from '../db';

export abstract class BaseRepository {
  protected abstract readonly tableName: string;

  constructor(protected readonly execute: QueryFn) {}
}
