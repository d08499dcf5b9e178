import { and, asc, eq, or, isNull, desc, sql } from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';
import type { Db } from '../db/index.js';
import { friendRequests, friends, users } from '../db/schema/index.js';
import { withTransaction } from '../db/transaction.js';
import { generateUUIDv7 } from '../utils/id.js';
import { ConflictError, NotFoundError, ValidationError, translated } from '../utils/errors.js';
import { findUser } from './users.js';

export type FriendRequestRow = typeof friendRequests.$inferSelect;
export type FriendshipRow = typeof friends.$inferSelect;

/**
 * Order two user ids the way PostgreSQL orders `uuid` values: byte-wise,
 * which for the canonical lowercase text form is plain string order.
 * The `friends_user_order` check uses the same order.
 */
export function canonicalPair(a: string, b: string): [string, string] {
  const x = a.toLowerCase();
  const y = b.toLowerCase();
  return x < y ? [x, y] : [y, x];
}

function pairRequests(a: string, b: string) {
  return or(
    and(eq(friendRequests.fromUserId, a), eq(friendRequests.toUserId, b)),
    and(eq(friendRequests.fromUserId, b), eq(friendRequests.toUserId, a)),
  );
}

export async function findFriendship(
  d: Db,
  userA: string,
  userB: string,
): Promise<FriendshipRow | null> {
  const [a, b] = canonicalPair(userA, userB);
  const [row] = await d
    .select()
    .from(friends)
    .where(and(eq(friends.userA, a), eq(friends.userB, b), isNull(friends.deletedAt)))
    .limit(1);
  return row ?? null;
}

export async function areFriends(d: Db, userA: string, userB: string): Promise<boolean> {
  return (await findFriendship(d, userA, userB)) !== null;
}

export async function sendFriendRequest(
  d: Db,
  fromUserId: string,
  toUserId: string,
  message: string | null = null,
): Promise<FriendRequestRow> {
  const from = fromUserId.toLowerCase();
  const to = toUserId.toLowerCase();
  if (from === to) {
    throw new ValidationError('Cannot send friend request to yourself', 2001);
  }
  if (message !== null && message.length > 300) {
    throw new ValidationError('Friend request message is too long', 2002);
  }

  if (!(await findUser(d, to))) {
    throw new NotFoundError('Receiver user not found', 2101);
  }
  if (await areFriends(d, from, to)) {
    throw new ConflictError('Users are already friends', 2104);
  }

  const [existing] = await d
    .select({ id: friendRequests.id })
    .from(friendRequests)
    .where(and(eq(friendRequests.fromUserId, from), eq(friendRequests.toUserId, to)))
    .limit(1);
  if (existing) {
    throw new ConflictError('Friend request already exists', 2103);
  }

  // A concurrent duplicate still trips the unique index.
  const [row] = await translated(() =>
    d
      .insert(friendRequests)
      .values({ id: generateUUIDv7(), fromUserId: from, toUserId: to, message, createdAt: new Date() })
      .returning(),
  );
  if (!row) throw new Error('Friend request insert returned no row');
  return row;
}

export interface AcceptResult {
  friendship: FriendshipRow;
  /** false when the pair was already friends (a reciprocal accept won the race) */
  created: boolean;
}

export async function acceptFriendRequest(
  d: Db,
  requestId: string,
  actingUserId: string,
): Promise<AcceptResult> {
  const actor = actingUserId.toLowerCase();
  return withTransaction(d, async (tx) => {
    const [request] = await tx
      .select()
      .from(friendRequests)
      .where(eq(friendRequests.id, requestId))
      .limit(1);
    if (!request || request.toUserId !== actor) {
      throw new NotFoundError('Friend request not found', 2102);
    }

    const [userA, userB] = canonicalPair(request.fromUserId, request.toUserId);

    // Lock every pending request of the pair in id order so that crossing
    // accepts queue behind each other instead of deadlocking.
    const pending = await tx
      .select({ id: friendRequests.id })
      .from(friendRequests)
      .where(pairRequests(userA, userB))
      .orderBy(asc(friendRequests.id))
      .for('update');

    if (!pending.some((r) => r.id === request.id)) {
      // The reciprocal accept committed while this one waited for the lock.
      const live = await findFriendship(tx, userA, userB);
      if (!live) throw new NotFoundError('Friend request not found', 2102);
      return { friendship: live, created: false };
    }

    // Only one canonical edge can exist, so every pending request between
    // the pair is resolved by this accept, whichever direction it points.
    await tx.delete(friendRequests).where(pairRequests(userA, userB));

    const now = new Date();
    const [inserted] = await tx
      .insert(friends)
      .values({ userA, userB, createdAt: now })
      .onConflictDoUpdate({
        target: [friends.userA, friends.userB],
        set: { deletedAt: null, createdAt: now },
        setWhere: sql`${friends.deletedAt} is not null`,
      })
      .returning();
    if (inserted) return { friendship: inserted, created: true };

    // Live edge already there: the pair became friends before this request was resolved.
    const existing = await findFriendship(tx, userA, userB);
    if (!existing) throw new ConflictError('Users are already friends', 2104);
    return { friendship: existing, created: false };
  });
}

async function deleteRequestAs(
  d: Db,
  requestId: string,
  actingUserId: string,
  role: 'recipient' | 'sender',
): Promise<void> {
  const actor = actingUserId.toLowerCase();
  const owner =
    role === 'recipient' ? eq(friendRequests.toUserId, actor) : eq(friendRequests.fromUserId, actor);
  const rows = await d
    .delete(friendRequests)
    .where(and(eq(friendRequests.id, requestId), owner))
    .returning({ id: friendRequests.id });
  if (rows.length === 0) {
    throw new NotFoundError('Friend request not found', 2102);
  }
}

/** Recipient declines. Repeating it reports NotFoundError. */
export function rejectFriendRequest(d: Db, requestId: string, actingUserId: string): Promise<void> {
  return deleteRequestAs(d, requestId, actingUserId, 'recipient');
}

/** Sender withdraws a pending request. */
export function cancelFriendRequest(d: Db, requestId: string, actingUserId: string): Promise<void> {
  return deleteRequestAs(d, requestId, actingUserId, 'sender');
}

export async function unfriend(d: Db, userId: string, friendId: string): Promise<void> {
  if (userId.toLowerCase() === friendId.toLowerCase()) {
    throw new ValidationError('Cannot unfriend yourself', 2003);
  }
  const [a, b] = canonicalPair(userId, friendId);
  const rows = await d
    .update(friends)
    .set({ deletedAt: new Date() })
    .where(and(eq(friends.userA, a), eq(friends.userB, b), isNull(friends.deletedAt)))
    .returning({ userA: friends.userA });
  if (rows.length === 0) {
    throw new NotFoundError('Friendship not found', 2105);
  }
}

export interface FriendProfile {
  id: string;
  username: string;
  displayName: string;
  avatarUrl: string | null;
  since: Date;
}

export async function listFriends(d: Db, userId: string): Promise<FriendProfile[]> {
  const me = userId.toLowerCase();
  // The friend is whichever endpoint is not me.
  const friendId = sql<string>`case when ${friends.userA} = ${me} then ${friends.userB} else ${friends.userA} end`;

  return d
    .select({
      id: users.id,
      username: users.username,
      displayName: users.displayName,
      avatarUrl: users.avatarUrl,
      since: friends.createdAt,
    })
    .from(friends)
    .innerJoin(users, eq(users.id, friendId))
    .where(
      and(
        or(eq(friends.userA, me), eq(friends.userB, me)),
        isNull(friends.deletedAt),
        isNull(users.deletedAt),
      ),
    )
    .orderBy(users.displayName);
}

export interface FriendRequestView {
  id: string;
  direction: 'incoming' | 'outgoing';
  message: string | null;
  createdAt: Date;
  user: { id: string; username: string; displayName: string; avatarUrl: string | null };
}

export async function listFriendRequests(d: Db, userId: string): Promise<FriendRequestView[]> {
  const me = userId.toLowerCase();
  const counterpart = alias(users, 'counterpart');
  const rows = await d
    .select({
      id: friendRequests.id,
      fromUserId: friendRequests.fromUserId,
      message: friendRequests.message,
      createdAt: friendRequests.createdAt,
      user: {
        id: counterpart.id,
        username: counterpart.username,
        displayName: counterpart.displayName,
        avatarUrl: counterpart.avatarUrl,
      },
    })
    .from(friendRequests)
    .innerJoin(
      counterpart,
      sql`${counterpart.id} = case when ${friendRequests.fromUserId} = ${me} then ${friendRequests.toUserId} else ${friendRequests.fromUserId} end`,
    )
    .where(
      and(
        or(eq(friendRequests.fromUserId, me), eq(friendRequests.toUserId, me)),
        isNull(counterpart.deletedAt),
      ),
    )
    .orderBy(desc(friendRequests.createdAt), desc(friendRequests.id));

  return rows.map((r): FriendRequestView => ({
    id: r.id,
    direction: r.fromUserId === me ? 'outgoing' : 'incoming',
    message: r.message,
    createdAt: r.createdAt,
    user: r.user,
  }));
}
