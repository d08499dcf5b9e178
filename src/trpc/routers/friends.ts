import { z } from 'zod/v4';
import { router, protectedProcedure } from '../init.js';
import {
  acceptFriendRequest,
  cancelFriendRequest,
  listFriendRequests,
  listFriends,
  rejectFriendRequest,
  sendFriendRequest,
  unfriend,
} from '../../services/friends.js';
import { formatFriend, formatFriendRequest, formatFriendRequestView } from '../../utils/format.js';

const requestInput = z.object({ request_id: z.uuid() });

export const friendsRouter = router({
  list: protectedProcedure.query(async ({ ctx }) => {
    const rows = await listFriends(ctx.db, ctx.user.id);
    return rows.map(formatFriend);
  }),

  requests: protectedProcedure.query(async ({ ctx }) => {
    const rows = await listFriendRequests(ctx.db, ctx.user.id);
    return rows.map(formatFriendRequestView);
  }),

  send_request: protectedProcedure
    .input(z.object({ user_id: z.uuid(), message: z.string().nullable().optional() }))
    .mutation(async ({ ctx, input }) => {
      const request = await sendFriendRequest(ctx.db, ctx.user.id, input.user_id, input.message ?? null);
      return formatFriendRequest(request);
    }),

  accept: protectedProcedure.input(requestInput).mutation(async ({ ctx, input }) => {
    const { friendship, created } = await acceptFriendRequest(ctx.db, input.request_id, ctx.user.id);
    return {
      user_a: friendship.userA,
      user_b: friendship.userB,
      created_at: friendship.createdAt.toISOString(),
      created,
    };
  }),

  reject: protectedProcedure.input(requestInput).mutation(async ({ ctx, input }) => {
    await rejectFriendRequest(ctx.db, input.request_id, ctx.user.id);
    return { success: true };
  }),

  cancel: protectedProcedure.input(requestInput).mutation(async ({ ctx, input }) => {
    await cancelFriendRequest(ctx.db, input.request_id, ctx.user.id);
    return { success: true };
  }),

  remove: protectedProcedure
    .input(z.object({ user_id: z.uuid() }))
    .mutation(async ({ ctx, input }) => {
      await unfriend(ctx.db, ctx.user.id, input.user_id);
      return { success: true };
    }),
});
