import { pgTable, uuid, text, timestamp, unique } from 'drizzle-orm/pg-core';
import { conversations } from './conversations.js';
import { messages, messageType } from './messages.js';
import { users } from './users.js';

/** Projection of the newest live message, one row per conversation. */
export const lastMessages = pgTable(
  'last_messages',
  {
    conversationId: uuid('conversation_id')
      .notNull()
      .references(() => conversations.id, { onDelete: 'cascade' }),
    messageId: uuid('message_id')
      .notNull()
      .references(() => messages.id, { onDelete: 'cascade' }),
    senderId: uuid('sender_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    type: messageType('type').notNull(),
    content: text('content'),
    // created_at of the mirrored message, not of this row
    createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [unique('last_messages_conversation_id_unique').on(table.conversationId)],
);
