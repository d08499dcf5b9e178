import { PgTransaction } from 'drizzle-orm/pg-core';
import { config } from '../config/index.js';
import { findPgError } from '../utils/errors.js';
import type { Db } from './index.js';

// serialization_failure, deadlock_detected
const RETRYABLE = new Set(['40001', '40P01']);

export function isRetryable(err: unknown): boolean {
  const pg = findPgError(err);
  return pg !== null && RETRYABLE.has(pg.code);
}

function backoff(attempt: number): Promise<void> {
  const ms = 10 * 2 ** attempt + Math.floor(Math.random() * 10);
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` as one unit of work. Inside an open transaction `fn` simply joins
 * it; at the top level the whole transaction is retried when the database
 * aborts it for a serialization conflict or deadlock.
 */
export async function withTransaction<T>(
  d: Db,
  fn: (tx: Db) => Promise<T>,
  maxRetries: number = config.DB_TX_MAX_RETRIES,
): Promise<T> {
  if (d instanceof PgTransaction) return fn(d);

  for (let attempt = 0; ; attempt++) {
    try {
      return await d.transaction((tx) => fn(tx));
    } catch (err) {
      if (attempt >= maxRetries || !isRetryable(err)) throw err;
      console.warn(`[db] transaction conflict, retrying (${attempt + 1}/${maxRetries})`);
      await backoff(attempt);
    }
  }
}
