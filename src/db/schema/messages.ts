import {
  pgTable,
  pgEnum,
  uuid,
  text,
  boolean,
  timestamp,
  index,
  foreignKey,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { conversations } from './conversations.js';
import { users } from './users.js';

export const messageType = pgEnum('message_type', ['text', 'image', 'video', 'file', 'system']);

export const messages = pgTable(
  'messages',
  {
    id: uuid('id').primaryKey(),
    conversationId: uuid('conversation_id')
      .notNull()
      .references(() => conversations.id, { onDelete: 'cascade' }),
    senderId: uuid('sender_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    replyToId: uuid('reply_to_id'),
    type: messageType('type').notNull().default('text'),
    content: text('content'),
    fileUrl: text('file_url'),
    isEdited: boolean('is_edited').notNull().default(false),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    // Hard delete of the original nulls the reference; soft delete keeps it.
    foreignKey({
      name: 'fk_message_reply',
      columns: [table.replyToId],
      foreignColumns: [table.id],
    }).onDelete('set null'),
    index('idx_message_conversation')
      .on(table.conversationId, table.createdAt.desc(), table.id.desc())
      .where(sql`${table.deletedAt} is null`),
    index('idx_message_sender').on(table.senderId),
    index('idx_message_reply').on(table.replyToId),
  ],
);
