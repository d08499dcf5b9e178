import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type * as schema from './schema/index.js';

/**
 * Any drizzle PostgreSQL handle over this schema: the node-postgres pool in
 * production, PGlite in tests, or an open transaction of either.
 */
export type Db = PgDatabase<PgQueryResultHKT, typeof schema>;

let _db: Db | null = null;

export async function getDb(): Promise<Db> {
  if (_db) return _db;
  const { getPgDb } = await import('./pg.js');
  _db = getPgDb();
  return _db;
}

export function db(): Db {
  if (!_db) throw new Error('Database not initialized. Call getDb() first.');
  return _db;
}
