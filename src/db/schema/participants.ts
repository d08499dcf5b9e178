import { pgTable, uuid, integer, timestamp, index, primaryKey, check } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { conversations } from './conversations.js';
import { users } from './users.js';
import { messages } from './messages.js';

export const participants = pgTable(
  'participants',
  {
    conversationId: uuid('conversation_id')
      .notNull()
      .references(() => conversations.id, { onDelete: 'cascade' }),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    unreadCount: integer('unread_count').notNull().default(0),
    joinedAt: timestamp('joined_at', { withTimezone: true }).notNull().defaultNow(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
    lastSeenMessageId: uuid('last_seen_message_id').references(() => messages.id, {
      onDelete: 'set null',
    }),
  },
  (table) => [
    // Not filtered by deleted_at: leaving and re-joining reuses the same row.
    primaryKey({
      name: 'participants_conversation_id_user_id_pk',
      columns: [table.conversationId, table.userId],
    }),
    check('unread_count_non_negative', sql`${table.unreadCount} >= 0`),
    index('idx_participants_user_conv_active')
      .on(table.userId, table.conversationId)
      .where(sql`${table.deletedAt} is null`),
    index('idx_participants_conversation')
      .on(table.conversationId)
      .where(sql`${table.deletedAt} is null`),
  ],
);
