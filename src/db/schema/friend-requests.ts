import { pgTable, uuid, varchar, timestamp, index, uniqueIndex, check } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { users } from './users.js';

export const friendRequests = pgTable(
  'friend_requests',
  {
    id: uuid('id').primaryKey(),
    fromUserId: uuid('from_user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    toUserId: uuid('to_user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    message: varchar('message', { length: 300 }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    check('friend_request_not_self', sql`${table.fromUserId} <> ${table.toUserId}`),
    // Direction matters: A→B and B→A are distinct rows.
    uniqueIndex('idx_friend_requests_from_user_to_user').on(table.fromUserId, table.toUserId),
    index('idx_friend_requests_to_user').on(table.toUserId),
    index('idx_friend_requests_from_user').on(table.fromUserId),
  ],
);
