import { z } from 'zod/v4';
import { router, protectedProcedure } from '../init.js';
import { deleteUser, getUser, updateUser } from '../../services/users.js';
import { formatUser } from '../../utils/format.js';

export const usersRouter = router({
  get: protectedProcedure
    .input(z.object({ user_id: z.uuid() }))
    .query(async ({ ctx, input }) => {
      const user = formatUser(await getUser(ctx.db, input.user_id));
      // Contact details are only shown to their owner.
      if (user.id !== ctx.user.id.toLowerCase()) {
        return { ...user, email: null, phone: null };
      }
      return user;
    }),

  update: protectedProcedure
    .input(
      z.object({
        username: z.string().optional(),
        email: z.string().optional(),
        display_name: z.string().optional(),
        avatar_url: z.string().nullable().optional(),
        avatar_id: z.string().nullable().optional(),
        bio: z.string().nullable().optional(),
        phone: z.string().nullable().optional(),
      }),
    )
    .mutation(async ({ ctx, input }) => {
      const user = await updateUser(ctx.db, ctx.user.id, {
        username: input.username,
        email: input.email,
        displayName: input.display_name,
        avatarUrl: input.avatar_url,
        avatarId: input.avatar_id,
        bio: input.bio,
        phone: input.phone,
      });
      return formatUser(user);
    }),

  delete: protectedProcedure.mutation(async ({ ctx }) => {
    await deleteUser(ctx.db, ctx.user.id);
    return { success: true };
  }),
});
