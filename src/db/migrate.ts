import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { sql } from 'drizzle-orm';
import { pgTable, text, timestamp } from 'drizzle-orm/pg-core';
import type { Db } from './index.js';

const BREAKPOINT = '--> statement-breakpoint';

export const MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations/', import.meta.url));

// Bookkeeping table, kept out of the schema barrel.
const schemaMigrations = pgTable('schema_migrations', {
  name: text('name').primaryKey(),
  appliedAt: timestamp('applied_at', { withTimezone: true }).notNull().defaultNow(),
});

export interface Migration {
  name: string;
  statements: string[];
}

export function loadMigrations(dir: string = MIGRATIONS_DIR): Migration[] {
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .map((name) => ({
      name,
      statements: fs
        .readFileSync(path.join(dir, name), 'utf8')
        .split(BREAKPOINT)
        .map((s) => s.trim())
        .filter((s) => s.length > 0),
    }));
}

/**
 * Apply pending migrations in file-name order. Each file runs in its own
 * transaction and is recorded in `schema_migrations`.
 * Returns the names of the files applied by this call.
 */
export async function runMigrations(d: Db, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  await d.execute(sql`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name text PRIMARY KEY,
      applied_at timestamptz NOT NULL DEFAULT now()
    )
  `);

  const applied = await d.select({ name: schemaMigrations.name }).from(schemaMigrations);
  const done = new Set(applied.map((r) => r.name));

  const ran: string[] = [];
  for (const migration of loadMigrations(dir)) {
    if (done.has(migration.name)) continue;
    await d.transaction(async (tx) => {
      for (const statement of migration.statements) {
        await tx.execute(sql.raw(statement));
      }
      await tx.insert(schemaMigrations).values({ name: migration.name });
    });
    console.log(`[db] applied migration ${migration.name}`);
    ran.push(migration.name);
  }
  return ran;
}
