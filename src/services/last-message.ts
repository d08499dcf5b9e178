import { and, eq, isNull, desc, sql } from 'drizzle-orm';
import type { Db } from '../db/index.js';
import { lastMessages, messages } from '../db/schema/index.js';

export type LastMessageRow = typeof lastMessages.$inferSelect;
type MessageRow = typeof messages.$inferSelect;

export async function getLastMessage(d: Db, conversationId: string): Promise<LastMessageRow | null> {
  const [row] = await d
    .select()
    .from(lastMessages)
    .where(eq(lastMessages.conversationId, conversationId))
    .limit(1);
  return row ?? null;
}

/**
 * Point the projection at `message` unless it already mirrors something
 * newer. Ordering is by the message's own (created_at, id), so two sends that
 * commit out of order still converge on the newest one.
 */
export async function upsertLastMessage(d: Db, message: MessageRow): Promise<void> {
  await d
    .insert(lastMessages)
    .values({
      conversationId: message.conversationId,
      messageId: message.id,
      senderId: message.senderId,
      type: message.type,
      content: message.content,
      createdAt: message.createdAt,
      updatedAt: new Date(),
    })
    .onConflictDoUpdate({
      target: lastMessages.conversationId,
      set: {
        messageId: sql`excluded.message_id`,
        senderId: sql`excluded.sender_id`,
        type: sql`excluded.type`,
        content: sql`excluded.content`,
        createdAt: sql`excluded.created_at`,
        updatedAt: sql`excluded.updated_at`,
      },
      setWhere: sql`(${lastMessages.createdAt}, ${lastMessages.messageId}) <= (excluded.created_at, excluded.message_id)`,
    });
}

/** Copy an edited message's content into the projection if it is the mirrored one. */
export async function refreshLastMessageContent(d: Db, message: MessageRow): Promise<boolean> {
  const rows = await d
    .update(lastMessages)
    .set({ content: message.content, updatedAt: new Date() })
    .where(
      and(
        eq(lastMessages.conversationId, message.conversationId),
        eq(lastMessages.messageId, message.id),
      ),
    )
    .returning({ messageId: lastMessages.messageId });
  return rows.length > 0;
}

/**
 * Called after `removedMessageId` was soft-deleted. If the projection
 * mirrors it, re-point it at the newest surviving message, or drop the row
 * when none survives. The projection row is locked first so a concurrent send
 * cannot be overwritten by the older survivor.
 */
export async function recomputeLastMessage(
  d: Db,
  conversationId: string,
  removedMessageId: string,
): Promise<LastMessageRow | null> {
  const [current] = await d
    .select()
    .from(lastMessages)
    .where(eq(lastMessages.conversationId, conversationId))
    .limit(1)
    .for('update');
  if (!current || current.messageId !== removedMessageId) return current ?? null;

  const [survivor] = await d
    .select()
    .from(messages)
    .where(and(eq(messages.conversationId, conversationId), isNull(messages.deletedAt)))
    .orderBy(desc(messages.createdAt), desc(messages.id))
    .limit(1);

  if (!survivor) {
    await d.delete(lastMessages).where(eq(lastMessages.conversationId, conversationId));
    return null;
  }

  const [updated] = await d
    .update(lastMessages)
    .set({
      messageId: survivor.id,
      senderId: survivor.senderId,
      type: survivor.type,
      content: survivor.content,
      createdAt: survivor.createdAt,
      updatedAt: new Date(),
    })
    .where(eq(lastMessages.conversationId, conversationId))
    .returning();
  return updated ?? null;
}
