import { and, eq, ne, inArray, isNull, desc, sql, count as countFn } from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';
import type { Db } from '../db/index.js';
import {
  conversations,
  groupConversations,
  participants,
  lastMessages,
  messages,
  users,
} from '../db/schema/index.js';
import { withTransaction } from '../db/transaction.js';
import { generateUUIDv7 } from '../utils/id.js';
import { ConflictError, NotFoundError, ValidationError, translated } from '../utils/errors.js';
import { requireLiveUsers } from './users.js';
import { canonicalPair } from './friends.js';

export type ConversationRow = typeof conversations.$inferSelect;
export type ParticipantRow = typeof participants.$inferSelect;
export type ConversationType = ConversationRow['type'];

export interface GroupInfo {
  name: string;
  createdBy: string;
  avatarUrl: string | null;
}

export interface LastMessageInfo {
  messageId: string;
  senderId: string;
  type: (typeof lastMessages.$inferSelect)['type'];
  content: string | null;
  createdAt: Date;
}

export interface ParticipantInfo {
  userId: string;
  username: string;
  displayName: string;
  avatarUrl: string | null;
  unreadCount: number;
  lastSeenMessageId: string | null;
  joinedAt: Date;
}

export interface ConversationDetail {
  id: string;
  type: ConversationType;
  group: GroupInfo | null;
  lastMessage: LastMessageInfo | null;
  participants: ParticipantInfo[];
  createdAt: Date;
  updatedAt: Date;
}

const liveParticipant = (conversationId: string, userId: string) =>
  and(
    eq(participants.conversationId, conversationId),
    eq(participants.userId, userId.toLowerCase()),
    isNull(participants.deletedAt),
  );

export async function findParticipant(
  d: Db,
  conversationId: string,
  userId: string,
): Promise<ParticipantRow | null> {
  const [row] = await d
    .select()
    .from(participants)
    .where(liveParticipant(conversationId, userId))
    .limit(1);
  return row ?? null;
}

export async function requireParticipant(
  d: Db,
  conversationId: string,
  userId: string,
): Promise<ParticipantRow> {
  const row = await findParticipant(d, conversationId, userId);
  if (!row) throw new NotFoundError('Conversation not found', 3101);
  return row;
}

async function getConversationRow(d: Db, conversationId: string): Promise<ConversationRow> {
  const [row] = await d
    .select()
    .from(conversations)
    .where(eq(conversations.id, conversationId))
    .limit(1);
  if (!row) throw new NotFoundError('Conversation not found', 3101);
  return row;
}

/** The direct conversation in which both users are still live participants. */
export async function findDirectConversation(
  d: Db,
  userA: string,
  userB: string,
): Promise<ConversationRow | null> {
  const pa = alias(participants, 'pa');
  const pb = alias(participants, 'pb');
  const [row] = await d
    .select({
      id: conversations.id,
      type: conversations.type,
      createdAt: conversations.createdAt,
      updatedAt: conversations.updatedAt,
    })
    .from(conversations)
    .innerJoin(pa, and(eq(pa.conversationId, conversations.id), eq(pa.userId, userA.toLowerCase())))
    .innerJoin(pb, and(eq(pb.conversationId, conversations.id), eq(pb.userId, userB.toLowerCase())))
    .where(and(eq(conversations.type, 'direct'), isNull(pa.deletedAt), isNull(pb.deletedAt)))
    .orderBy(desc(conversations.updatedAt))
    .limit(1);
  return row ?? null;
}

/**
 * At most one live direct conversation per unordered pair. No declarative
 * constraint can express that, so creators of the same pair serialize on a
 * transaction-scoped advisory lock before checking.
 */
export function createDirectConversation(
  d: Db,
  userA: string,
  userB: string,
): Promise<ConversationRow> {
  return directConversation(d, userA, userB, false);
}

/** The pair's live direct conversation, created when there is none. */
export function openDirectConversation(
  d: Db,
  userA: string,
  userB: string,
): Promise<ConversationRow> {
  return directConversation(d, userA, userB, true);
}

async function directConversation(
  d: Db,
  userA: string,
  userB: string,
  reuse: boolean,
): Promise<ConversationRow> {
  const [a, b] = canonicalPair(userA, userB);
  if (a === b) {
    throw new ValidationError('Cannot start a direct conversation with yourself', 3001);
  }

  return withTransaction(d, async (tx) => {
    await requireLiveUsers(tx, [a, b]);
    await tx.execute(sql`select pg_advisory_xact_lock(hashtext(${`direct:${a}:${b}`}))`);

    const existing = await findDirectConversation(tx, a, b);
    if (existing) {
      if (reuse) return existing;
      throw new ConflictError('Direct conversation already exists', 3102);
    }

    const now = new Date();
    const [conversation] = await tx
      .insert(conversations)
      .values({ id: generateUUIDv7(), type: 'direct', createdAt: now, updatedAt: now })
      .returning();
    if (!conversation) throw new Error('Conversation insert returned no row');

    await tx.insert(participants).values([
      { conversationId: conversation.id, userId: a, unreadCount: 0, joinedAt: now },
      { conversationId: conversation.id, userId: b, unreadCount: 0, joinedAt: now },
    ]);
    return conversation;
  });
}

export async function createGroupConversation(
  d: Db,
  creatorId: string,
  name: string,
  memberIds: string[],
): Promise<ConversationRow> {
  const trimmed = name.trim();
  if (trimmed.length === 0 || trimmed.length > 255) {
    throw new ValidationError('Group name must be 1-255 characters', 3002);
  }
  const creator = creatorId.toLowerCase();
  const members = [...new Set([creator, ...memberIds.map((id) => id.toLowerCase())])];

  return withTransaction(d, async (tx) => {
    const now = new Date();
    const [conversation] = await tx
      .insert(conversations)
      .values({ id: generateUUIDv7(), type: 'group', createdAt: now, updatedAt: now })
      .returning();
    if (!conversation) throw new Error('Conversation insert returned no row');

    await tx
      .insert(groupConversations)
      .values({ conversationId: conversation.id, name: trimmed, createdBy: creator });

    // Any unknown member aborts the transaction: no partially created group.
    await requireLiveUsers(tx, members);
    await translated(() =>
      tx.insert(participants).values(
        members.map((userId) => ({
          conversationId: conversation.id,
          userId,
          unreadCount: 0,
          joinedAt: now,
        })),
      ),
    );
    return conversation;
  });
}

/**
 * Join a group. A previous soft-deleted membership is revived in place,
 * since the (conversation, user) key covers removed rows too.
 */
export async function addParticipant(
  d: Db,
  conversationId: string,
  userId: string,
): Promise<ParticipantRow> {
  const user = userId.toLowerCase();
  return withTransaction(d, async (tx) => {
    const conversation = await getConversationRow(tx, conversationId);
    if (conversation.type !== 'group') {
      throw new ValidationError('Participants can only be added to group conversations', 3003);
    }
    await requireLiveUsers(tx, [user]);

    const now = new Date();
    const [row] = await tx
      .insert(participants)
      .values({ conversationId, userId: user, unreadCount: 0, joinedAt: now })
      .onConflictDoUpdate({
        target: [participants.conversationId, participants.userId],
        set: { deletedAt: null, unreadCount: 0, joinedAt: now, lastSeenMessageId: null },
        setWhere: sql`${participants.deletedAt} is not null`,
      })
      .returning();
    if (!row) throw new ConflictError('User is already a participant', 3105);
    return row;
  });
}

/** Soft leave. Repeating it reports NotFoundError. */
export async function removeParticipant(
  d: Db,
  conversationId: string,
  userId: string,
): Promise<void> {
  const rows = await d
    .update(participants)
    .set({ deletedAt: new Date() })
    .where(liveParticipant(conversationId, userId))
    .returning({ userId: participants.userId });
  if (rows.length === 0) {
    throw new NotFoundError('Participant not found', 3103);
  }
}

/**
 * Bump the unread counter of every live participant except the sender.
 * Only meaningful inside the transaction that inserted the message.
 *
 * With `sentMessageId`, the same statement also moves the sender's read
 * marker to that message and recounts the sender's unread messages after it,
 * so all rows are locked in one pass.
 */
export async function incrementUnread(
  d: Db,
  conversationId: string,
  excludingUserId: string,
  sentMessageId?: string,
): Promise<number> {
  const sender = excludingUserId.toLowerCase();

  if (sentMessageId === undefined) {
    const rows = await d
      .update(participants)
      .set({ unreadCount: sql`${participants.unreadCount} + 1` })
      .where(
        and(
          eq(participants.conversationId, conversationId),
          ne(participants.userId, sender),
          isNull(participants.deletedAt),
        ),
      )
      .returning({ userId: participants.userId });
    return rows.length;
  }

  const later = alias(messages, 'later');
  const sent = alias(messages, 'sent');
  const senderUnread = d
    .select({ value: countFn() })
    .from(later)
    .innerJoin(sent, eq(sent.id, sentMessageId))
    .where(
      and(
        eq(later.conversationId, conversationId),
        ne(later.senderId, sender),
        sql`(${later.createdAt}, ${later.id}) > (${sent.createdAt}, ${sent.id})`,
      ),
    );
  const isSender = sql`${participants.userId} = ${sender}::uuid`;

  const rows = await d
    .update(participants)
    .set({
      unreadCount: sql`case when ${isSender} then ${senderUnread} else ${participants.unreadCount} + 1 end`,
      lastSeenMessageId: sql`case when ${isSender} then ${sentMessageId}::uuid else ${participants.lastSeenMessageId} end`,
    })
    .where(and(eq(participants.conversationId, conversationId), isNull(participants.deletedAt)))
    .returning({ userId: participants.userId });
  return rows.filter((r) => r.userId !== sender).length;
}

/**
 * Move the participant's read marker to `messageId`.
 *
 * The counter is written as an absolute value (messages after the marker not
 * sent by this participant) under a row lock, never decremented, so an
 * increment racing with this call cannot be lost.
 */
export async function markRead(
  d: Db,
  conversationId: string,
  userId: string,
  messageId: string,
): Promise<ParticipantRow> {
  const conversation = conversationId.toLowerCase();
  const user = userId.toLowerCase();
  return withTransaction(d, async (tx) => {
    const [participant] = await tx
      .select()
      .from(participants)
      .where(liveParticipant(conversation, user))
      .limit(1)
      .for('update');
    if (!participant) throw new NotFoundError('Participant not found', 3103);

    const [marker] = await tx
      .select({ id: messages.id, conversationId: messages.conversationId })
      .from(messages)
      .where(eq(messages.id, messageId))
      .limit(1);
    if (!marker) throw new NotFoundError('Message not found', 4101);
    if (marker.conversationId !== conversation) {
      throw new ValidationError('Message does not belong to this conversation', 3004);
    }

    const markerRow = alias(messages, 'marker');
    const [unread] = await tx
      .select({ value: countFn() })
      .from(messages)
      .innerJoin(markerRow, eq(markerRow.id, marker.id))
      .where(
        and(
          eq(messages.conversationId, conversation),
          ne(messages.senderId, user),
          sql`(${messages.createdAt}, ${messages.id}) > (${markerRow.createdAt}, ${markerRow.id})`,
        ),
      );

    const [updated] = await tx
      .update(participants)
      .set({ lastSeenMessageId: marker.id, unreadCount: Number(unread?.value ?? 0) })
      .where(liveParticipant(conversation, user))
      .returning();
    if (!updated) throw new NotFoundError('Participant not found', 3103);
    return updated;
  });
}

export async function listParticipants(d: Db, conversationIds: string[]) {
  if (conversationIds.length === 0) return [];
  return d
    .select({
      conversationId: participants.conversationId,
      userId: participants.userId,
      username: users.username,
      displayName: users.displayName,
      avatarUrl: users.avatarUrl,
      unreadCount: participants.unreadCount,
      lastSeenMessageId: participants.lastSeenMessageId,
      joinedAt: participants.joinedAt,
    })
    .from(participants)
    .innerJoin(users, eq(users.id, participants.userId))
    .where(and(inArray(participants.conversationId, conversationIds), isNull(participants.deletedAt)))
    .orderBy(participants.joinedAt, participants.userId);
}

async function loadDetails(d: Db, conversationIds: string[]): Promise<ConversationDetail[]> {
  if (conversationIds.length === 0) return [];

  const rows = await d
    .select({
      conversation: conversations,
      group: {
        name: groupConversations.name,
        createdBy: groupConversations.createdBy,
        avatarUrl: groupConversations.avatarUrl,
      },
      lastMessage: {
        messageId: lastMessages.messageId,
        senderId: lastMessages.senderId,
        type: lastMessages.type,
        content: lastMessages.content,
        createdAt: lastMessages.createdAt,
      },
    })
    .from(conversations)
    .leftJoin(groupConversations, eq(groupConversations.conversationId, conversations.id))
    .leftJoin(lastMessages, eq(lastMessages.conversationId, conversations.id))
    .where(inArray(conversations.id, conversationIds))
    .orderBy(desc(conversations.updatedAt), desc(conversations.id));

  const members = await listParticipants(d, conversationIds);
  const byConversation = new Map<string, ParticipantInfo[]>();
  for (const { conversationId, ...info } of members) {
    const arr = byConversation.get(conversationId) ?? [];
    arr.push(info);
    byConversation.set(conversationId, arr);
  }

  return rows.map((r): ConversationDetail => ({
    id: r.conversation.id,
    type: r.conversation.type,
    group: r.group,
    lastMessage: r.lastMessage,
    participants: byConversation.get(r.conversation.id) ?? [],
    createdAt: r.conversation.createdAt,
    updatedAt: r.conversation.updatedAt,
  }));
}

export async function getConversation(
  d: Db,
  conversationId: string,
  userId: string,
): Promise<ConversationDetail> {
  await requireParticipant(d, conversationId, userId);
  const [detail] = await loadDetails(d, [conversationId]);
  if (!detail) throw new NotFoundError('Conversation not found', 3101);
  return detail;
}

/** Conversations the user currently belongs to, most recently active first. */
export async function listConversations(d: Db, userId: string): Promise<ConversationDetail[]> {
  const memberships = await d
    .select({ conversationId: participants.conversationId })
    .from(participants)
    .where(and(eq(participants.userId, userId.toLowerCase()), isNull(participants.deletedAt)));
  return loadDetails(
    d,
    memberships.map((m) => m.conversationId),
  );
}
