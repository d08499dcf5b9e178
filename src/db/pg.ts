import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { config } from '../config/index.js';
import * as schema from './schema/index.js';

export function getPgDb() {
  const pool = new pg.Pool({ connectionString: config.DATABASE_URL });
  pool.on('error', (err) => {
    console.error('[db] idle client error:', err.message);
  });
  return drizzle(pool, { schema });
}
