import { z } from 'zod/v4';
import { router, storeProcedure, protectedProcedure } from '../init.js';
import { createUser, getUser, verifyCredentials } from '../../services/users.js';
import { signAccessToken } from '../../utils/jwt.js';
import { apiError } from '../../utils/errors.js';
import { formatUser } from '../../utils/format.js';

export const authRouter = router({
  register: storeProcedure
    .input(
      z.object({
        username: z.string(),
        email: z.string(),
        password: z.string(),
        display_name: z.string(),
        phone: z.string().optional(),
      }),
    )
    .mutation(async ({ ctx, input }) => {
      const user = await createUser(ctx.db, {
        username: input.username,
        email: input.email,
        password: input.password,
        displayName: input.display_name,
        phone: input.phone,
      });
      const token = await signAccessToken({ sub: user.id, role: user.role });
      return { token, user: formatUser(user) };
    }),

  login: storeProcedure
    .input(z.object({ username: z.string().min(1), password: z.string().min(1) }))
    .mutation(async ({ ctx, input }) => {
      const user = await verifyCredentials(ctx.db, input.username, input.password);
      if (!user) {
        throw apiError('UNAUTHORIZED', 1000, 'Invalid credentials');
      }
      const token = await signAccessToken({ sub: user.id, role: user.role });
      return { token, user: formatUser(user) };
    }),

  me: protectedProcedure.query(async ({ ctx }) => {
    return formatUser(await getUser(ctx.db, ctx.user.id));
  }),
});
