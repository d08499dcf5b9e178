import { z } from 'zod/v4';
import { and, eq, isNull, desc, sql } from 'drizzle-orm';
import type { Db } from '../db/index.js';
import { conversations, messages } from '../db/schema/index.js';
import { withTransaction } from '../db/transaction.js';
import { config } from '../config/index.js';
import { generateUUIDv7 } from '../utils/id.js';
import {
  AuthorizationError,
  NotFoundError,
  ValidationError,
  translated,
} from '../utils/errors.js';
import { findParticipant, incrementUnread } from './conversations.js';
import {
  recomputeLastMessage,
  refreshLastMessageContent,
  upsertLastMessage,
} from './last-message.js';
import { parseInput } from './users.js';

export { getLastMessage } from './last-message.js';

export type MessageRow = typeof messages.$inferSelect;
export type MessageType = MessageRow['type'];

const ATTACHMENT_TYPES: ReadonlySet<MessageType> = new Set(['image', 'video', 'file']);

export const sendMessageInput = z
  .object({
    conversationId: z.uuid(),
    senderId: z.uuid(),
    type: z.enum(['text', 'image', 'video', 'file', 'system']).default('text'),
    content: z.string().max(4000, 'Message is too long').nullable().optional(),
    fileUrl: z.string().min(1).max(2048).nullable().optional(),
    replyToId: z.uuid().nullable().optional(),
  })
  .superRefine((msg, ctx) => {
    if (ATTACHMENT_TYPES.has(msg.type)) {
      if (!msg.fileUrl) {
        ctx.addIssue({ code: 'custom', message: 'Attachment messages need a file URL' });
      }
    } else if (!msg.content || msg.content.trim().length === 0) {
      ctx.addIssue({ code: 'custom', message: 'Message content cannot be empty' });
    }
  });

export type SendMessageInput = z.input<typeof sendMessageInput>;

export async function getMessage(d: Db, messageId: string): Promise<MessageRow> {
  const [row] = await d
    .select()
    .from(messages)
    .where(and(eq(messages.id, messageId), isNull(messages.deletedAt)))
    .limit(1);
  if (!row) throw new NotFoundError('Message not found', 4101);
  return row;
}

/**
 * Store a message and bring the conversation's derived state along in the
 * same transaction: last-message projection, unread counters and the
 * conversation's activity timestamp.
 */
export async function sendMessage(d: Db, input: SendMessageInput): Promise<MessageRow> {
  const data = parseInput(sendMessageInput, input);
  const conversationId = data.conversationId.toLowerCase();

  return withTransaction(d, async (tx) => {
    const [conversation] = await tx
      .select({ id: conversations.id })
      .from(conversations)
      .where(eq(conversations.id, conversationId))
      .limit(1);
    if (!conversation) throw new NotFoundError('Conversation not found', 3101);

    if (!(await findParticipant(tx, conversationId, data.senderId))) {
      throw new ValidationError('Sender is not a participant of this conversation', 4002);
    }

    if (data.replyToId) {
      const [original] = await tx
        .select({ conversationId: messages.conversationId })
        .from(messages)
        .where(eq(messages.id, data.replyToId))
        .limit(1);
      if (!original) throw new NotFoundError('Replied-to message not found', 4102);
      if (original.conversationId !== conversationId) {
        throw new ValidationError('Cannot reply to a message from another conversation', 4004);
      }
    }

    const now = new Date();
    const [message] = await translated(() =>
      tx
        .insert(messages)
        .values({
          id: generateUUIDv7(now.getTime()),
          conversationId,
          senderId: data.senderId.toLowerCase(),
          replyToId: data.replyToId ?? null,
          type: data.type,
          content: data.content ?? null,
          fileUrl: data.fileUrl ?? null,
          createdAt: now,
          updatedAt: now,
        })
        .returning(),
    );
    if (!message) throw new Error('Message insert returned no row');

    await upsertLastMessage(tx, message);
    // Sending a message also marks the conversation read up to it for the sender.
    await incrementUnread(tx, message.conversationId, message.senderId, message.id);
    await tx
      .update(conversations)
      .set({
        updatedAt: sql`greatest(${conversations.updatedAt}, ${message.createdAt.toISOString()}::timestamptz)`,
      })
      .where(eq(conversations.id, message.conversationId));

    return message;
  });
}

export async function editMessage(
  d: Db,
  messageId: string,
  actingUserId: string,
  newContent: string,
): Promise<MessageRow> {
  return withTransaction(d, async (tx) => {
    const [message] = await tx
      .select()
      .from(messages)
      .where(and(eq(messages.id, messageId), isNull(messages.deletedAt)))
      .limit(1)
      .for('update');
    if (!message) throw new NotFoundError('Message not found', 4101);
    if (message.senderId !== actingUserId.toLowerCase()) {
      throw new AuthorizationError('Only the sender can edit this message', 4201);
    }
    if (message.type !== 'text') {
      throw new ValidationError('Only text messages can be edited', 4005);
    }
    if (newContent.trim().length === 0) {
      throw new ValidationError('Message content cannot be empty', 4005);
    }

    const [updated] = await tx
      .update(messages)
      .set({ content: newContent, isEdited: true, updatedAt: new Date() })
      .where(eq(messages.id, message.id))
      .returning();
    if (!updated) throw new NotFoundError('Message not found', 4101);

    await refreshLastMessageContent(tx, updated);
    return updated;
  });
}

/** Soft delete. Replies keep pointing at the deleted message. */
export async function deleteMessage(d: Db, messageId: string, actingUserId: string): Promise<void> {
  await withTransaction(d, async (tx) => {
    const [message] = await tx
      .select()
      .from(messages)
      .where(and(eq(messages.id, messageId), isNull(messages.deletedAt)))
      .limit(1)
      .for('update');
    if (!message) throw new NotFoundError('Message not found', 4101);
    if (message.senderId !== actingUserId.toLowerCase()) {
      throw new AuthorizationError('Only the sender can delete this message', 4201);
    }

    const now = new Date();
    await tx
      .update(messages)
      .set({ deletedAt: now, updatedAt: now })
      .where(eq(messages.id, message.id));

    await recomputeLastMessage(tx, message.conversationId, message.id);
  });
}

// Cursors

export interface MessageCursor {
  createdAt: Date;
  id: string;
}

const cursorSchema = z.tuple([z.iso.datetime(), z.uuid()]);

export function encodeCursor(cursor: MessageCursor): string {
  return Buffer.from(`${cursor.createdAt.toISOString()}|${cursor.id}`).toString('base64url');
}

export function decodeCursor(raw: string): MessageCursor {
  const parsed = cursorSchema.safeParse(Buffer.from(raw, 'base64url').toString('utf8').split('|'));
  if (!parsed.success) throw new ValidationError('Invalid cursor', 4003);
  const [iso, id] = parsed.data;
  return { createdAt: new Date(iso), id };
}

export interface ListMessagesOptions {
  /** cursor returned as `nextCursor` by the previous page */
  before?: string | null;
  limit?: number;
}

export interface MessagePage {
  messages: MessageRow[];
  nextCursor: string | null;
}

export async function listMessages(
  d: Db,
  conversationId: string,
  { before, limit = config.MESSAGE_PAGE_SIZE }: ListMessagesOptions = {},
): Promise<MessagePage> {
  if (!Number.isInteger(limit) || limit < 1 || limit > 100) {
    throw new ValidationError('Limit must be between 1 and 100', 4006);
  }

  const conditions = [eq(messages.conversationId, conversationId), isNull(messages.deletedAt)];
  if (before) {
    const cursor = decodeCursor(before);
    conditions.push(
      sql`(${messages.createdAt}, ${messages.id}) < (${cursor.createdAt.toISOString()}::timestamptz, ${cursor.id}::uuid)`,
    );
  }

  // One extra row tells whether another page follows.
  const rows = await d
    .select()
    .from(messages)
    .where(and(...conditions))
    .orderBy(desc(messages.createdAt), desc(messages.id))
    .limit(limit + 1);

  const page = rows.slice(0, limit);
  const last = page[page.length - 1];
  return {
    messages: page,
    nextCursor: rows.length > limit && last ? encodeCursor(last) : null,
  };
}

/** Every non-deleted message, newest first, fetched page by page. */
export async function* iterateMessages(
  d: Db,
  conversationId: string,
  pageSize: number = config.MESSAGE_PAGE_SIZE,
): AsyncGenerator<MessageRow, void, undefined> {
  let before: string | null = null;
  do {
    const page: MessagePage = await listMessages(d, conversationId, { before, limit: pageSize });
    yield* page.messages;
    before = page.nextCursor;
  } while (before);
}
