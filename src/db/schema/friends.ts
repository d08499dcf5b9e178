import { pgTable, uuid, timestamp, index, primaryKey, check } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { users } from './users.js';

/**
 * Undirected friendship stored once as an ordered pair. `user_a < user_b` is
 * enforced by the database, so the primary key alone rules out duplicates in
 * either direction.
 */
export const friends = pgTable(
  'friends',
  {
    userA: uuid('user_a')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    userB: uuid('user_b')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ name: 'friends_user_a_user_b_pk', columns: [table.userA, table.userB] }),
    check('friends_user_order', sql`${table.userA} < ${table.userB}`),
    index('idx_friends_user_a_active').on(table.userA).where(sql`${table.deletedAt} is null`),
    index('idx_friends_user_b_active').on(table.userB).where(sql`${table.deletedAt} is null`),
  ],
);
