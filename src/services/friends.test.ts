import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { createTestDb, makeUser, type TestDb } from '../testing/db.js';
import { friendRequests, friends } from '../db/schema/index.js';
import {
  acceptFriendRequest,
  areFriends,
  canonicalPair,
  cancelFriendRequest,
  listFriendRequests,
  listFriends,
  rejectFriendRequest,
  sendFriendRequest,
  unfriend,
} from './friends.js';
import type { UserRow } from './users.js';
import { generateUUIDv7 } from '../utils/id.js';

describe('canonicalPair', () => {
  it('orders ids the same way whatever the argument order', () => {
    const a = '0190c3e2-0000-7000-8000-000000000001';
    const b = '0190C3E2-0000-7000-8000-000000000002';
    expect(canonicalPair(a, b)).toEqual([a, b.toLowerCase()]);
    expect(canonicalPair(b, a)).toEqual([a, b.toLowerCase()]);
  });
});

describe('friends', () => {
  let t: TestDb;

  beforeAll(async () => {
    t = await createTestDb();
  });

  afterAll(async () => {
    await t.close();
  });

  async function pair(): Promise<[UserRow, UserRow]> {
    return [await makeUser(t.db, 'f'), await makeUser(t.db, 'g')];
  }

  async function requestsBetween(x: UserRow, y: UserRow) {
    const rows = await t.db.select().from(friendRequests);
    return rows.filter(
      (r) =>
        (r.fromUserId === x.id && r.toUserId === y.id) || (r.fromUserId === y.id && r.toUserId === x.id),
    );
  }

  async function edgesBetween(x: UserRow, y: UserRow) {
    const [a, b] = canonicalPair(x.id, y.id);
    const rows = await t.db.select().from(friends);
    return rows.filter((r) => r.userA === a && r.userB === b);
  }

  it('validates the request before inserting', async () => {
    const [a] = await pair();
    await expect(sendFriendRequest(t.db, a.id, a.id)).rejects.toMatchObject({ kind: 'validation', code: 2001 });
    await expect(sendFriendRequest(t.db, a.id, generateUUIDv7())).rejects.toMatchObject({
      kind: 'not_found',
      code: 2101,
    });
    await expect(sendFriendRequest(t.db, a.id, a.id, 'x'.repeat(301))).rejects.toMatchObject({ code: 2001 });
  });

  it('rejects an overlong message', async () => {
    const [a, b] = await pair();
    await expect(sendFriendRequest(t.db, a.id, b.id, 'x'.repeat(301))).rejects.toMatchObject({
      kind: 'validation',
      code: 2002,
    });
  });

  it('rejects a duplicate request in the same direction', async () => {
    const [a, b] = await pair();
    await sendFriendRequest(t.db, a.id, b.id, 'hi');
    await expect(sendFriendRequest(t.db, a.id, b.id)).rejects.toMatchObject({ kind: 'conflict', code: 2103 });
  });

  it('stores one canonical edge whoever sent and accepted', async () => {
    for (const senderFirst of [true, false]) {
      const [x, y] = await pair();
      const [from, to] = senderFirst ? [x, y] : [y, x];
      const request = await sendFriendRequest(t.db, from.id, to.id);
      const { friendship, created } = await acceptFriendRequest(t.db, request.id, to.id);

      const [a, b] = canonicalPair(x.id, y.id);
      expect(created).toBe(true);
      expect(friendship.userA).toBe(a);
      expect(friendship.userB).toBe(b);
      expect(friendship.userA < friendship.userB).toBe(true);
      expect(await areFriends(t.db, x.id, y.id)).toBe(true);
      expect(await areFriends(t.db, y.id, x.id)).toBe(true);
    }
  });

  it('only lets the recipient accept', async () => {
    const [a, b] = await pair();
    const request = await sendFriendRequest(t.db, a.id, b.id);
    await expect(acceptFriendRequest(t.db, request.id, a.id)).rejects.toMatchObject({
      kind: 'not_found',
      code: 2102,
    });
  });

  it('resolves reciprocal requests with a single accept', async () => {
    const [a, b] = await pair();
    const ab = await sendFriendRequest(t.db, a.id, b.id);
    const ba = await sendFriendRequest(t.db, b.id, a.id);

    await acceptFriendRequest(t.db, ab.id, b.id);

    expect(await edgesBetween(a, b)).toHaveLength(1);
    expect(await requestsBetween(a, b)).toHaveLength(0);
    await expect(acceptFriendRequest(t.db, ba.id, a.id)).rejects.toMatchObject({ code: 2102 });
  });

  it('reports an existing live edge as already friends on accept', async () => {
    const [a, b] = await pair();
    const [userA, userB] = canonicalPair(a.id, b.id);
    await t.db.insert(friends).values({ userA, userB, createdAt: new Date() });
    const [pending] = await t.db
      .insert(friendRequests)
      .values({ id: generateUUIDv7(), fromUserId: a.id, toUserId: b.id, message: null, createdAt: new Date() })
      .returning();
    if (!pending) throw new Error('request insert returned no row');

    const result = await acceptFriendRequest(t.db, pending.id, b.id);

    expect(result.created).toBe(false);
    expect(result.friendship).toMatchObject({ userA, userB, deletedAt: null });
    expect(await edgesBetween(a, b)).toHaveLength(1);
    expect(await requestsBetween(a, b)).toHaveLength(0);
  });

  it('refuses a request between friends', async () => {
    const [a, b] = await pair();
    const request = await sendFriendRequest(t.db, a.id, b.id);
    await acceptFriendRequest(t.db, request.id, b.id);
    await expect(sendFriendRequest(t.db, b.id, a.id)).rejects.toMatchObject({ kind: 'conflict', code: 2104 });
  });

  it('lets the recipient reject and the sender cancel', async () => {
    const [a, b] = await pair();
    const first = await sendFriendRequest(t.db, a.id, b.id);
    await expect(rejectFriendRequest(t.db, first.id, a.id)).rejects.toMatchObject({ code: 2102 });
    await rejectFriendRequest(t.db, first.id, b.id);
    await expect(rejectFriendRequest(t.db, first.id, b.id)).rejects.toMatchObject({ code: 2102 });

    const second = await sendFriendRequest(t.db, a.id, b.id);
    await expect(cancelFriendRequest(t.db, second.id, b.id)).rejects.toMatchObject({ code: 2102 });
    await cancelFriendRequest(t.db, second.id, a.id);
    expect(await requestsBetween(a, b)).toHaveLength(0);
    expect(await areFriends(t.db, a.id, b.id)).toBe(false);
  });

  it('soft-deletes on unfriend and revives the same edge later', async () => {
    const [a, b] = await pair();
    await acceptFriendRequest(t.db, (await sendFriendRequest(t.db, a.id, b.id)).id, b.id);

    await unfriend(t.db, b.id, a.id);
    expect(await areFriends(t.db, a.id, b.id)).toBe(false);
    const [removed] = await edgesBetween(a, b);
    expect(removed?.deletedAt).toBeInstanceOf(Date);
    await expect(unfriend(t.db, a.id, b.id)).rejects.toMatchObject({ kind: 'not_found', code: 2105 });

    const { created } = await acceptFriendRequest(t.db, (await sendFriendRequest(t.db, b.id, a.id)).id, a.id);
    expect(created).toBe(true);
    const edges = await edgesBetween(a, b);
    expect(edges).toHaveLength(1);
    expect(edges[0]?.deletedAt).toBeNull();
  });

  it('refuses to unfriend yourself', async () => {
    const [a] = await pair();
    await expect(unfriend(t.db, a.id, a.id)).rejects.toMatchObject({ kind: 'validation', code: 2003 });
  });

  it('lists friends and pending requests from either side', async () => {
    const me = await makeUser(t.db, 'me');
    const friend = await makeUser(t.db, 'pal');
    const incoming = await makeUser(t.db, 'in');
    const outgoing = await makeUser(t.db, 'out');

    await acceptFriendRequest(t.db, (await sendFriendRequest(t.db, friend.id, me.id)).id, me.id);
    const inReq = await sendFriendRequest(t.db, incoming.id, me.id, 'hello');
    const outReq = await sendFriendRequest(t.db, me.id, outgoing.id);

    const list = await listFriends(t.db, me.id);
    expect(list.map((f) => f.id)).toEqual([friend.id]);
    expect(list[0]?.username).toBe(friend.username);

    const requests = await listFriendRequests(t.db, me.id);
    expect(requests.map((r) => [r.id, r.direction, r.user.id])).toEqual([
      [outReq.id, 'outgoing', outgoing.id],
      [inReq.id, 'incoming', incoming.id],
    ]);
    expect(requests[1]?.message).toBe('hello');
  });
});
