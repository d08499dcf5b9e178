import { pgTable, pgEnum, uuid, varchar, timestamp } from 'drizzle-orm/pg-core';
import { users } from './users.js';

export const conversationType = pgEnum('conversation_type', ['direct', 'group']);

export const conversations = pgTable('conversations', {
  id: uuid('id').primaryKey(),
  type: conversationType('type').notNull().default('direct'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

// Payload of the `group` variant. Direct conversations have no row here.
export const groupConversations = pgTable('group_conversations', {
  conversationId: uuid('conversation_id')
    .primaryKey()
    .references(() => conversations.id, { onDelete: 'cascade' }),
  name: varchar('name', { length: 255 }).notNull(),
  createdBy: uuid('created_by')
    .notNull()
    .references(() => users.id, { onDelete: 'cascade' }),
  avatarUrl: varchar('avatar_url', { length: 500 }),
  avatarId: uuid('avatar_id'),
});
