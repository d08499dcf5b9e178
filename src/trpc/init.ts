import { initTRPC, TRPCError } from '@trpc/server';
import type { Context } from './context.js';
import { StoreError, toTRPCError } from '../utils/errors.js';

function appErrorFields(cause: unknown): { app_code: number | null; app_error: string | null } {
  if (!(cause instanceof Object)) return { app_code: null, app_error: null };
  const code: unknown = Reflect.get(cause, 'app_code');
  const message: unknown = Reflect.get(cause, 'app_error');
  return {
    app_code: typeof code === 'number' ? code : null,
    app_error: typeof message === 'string' ? message : null,
  };
}

const t = initTRPC.context<Context>().create({
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        ...appErrorFields(error.cause),
      },
    };
  },
});

export const router = t.router;
export const publicProcedure = t.procedure;
export const middleware = t.middleware;
export const createCallerFactory = t.createCallerFactory;

// Store errors become tRPC errors carrying their numeric code.
const storeErrors = middleware(async ({ next, path }) => {
  const result = await next();
  if (!result.ok) {
    const cause = result.error.cause;
    if (cause instanceof StoreError) {
      throw toTRPCError(cause);
    }
    if (result.error.code === 'INTERNAL_SERVER_ERROR') {
      console.error(`[trpc] ${path} failed:`, result.error.cause ?? result.error);
    }
  }
  return result;
});

const authMiddleware = middleware(async ({ ctx, next }) => {
  if (!ctx.user) {
    throw new TRPCError({ code: 'UNAUTHORIZED', message: 'Authentication required' });
  }
  return next({ ctx: { ...ctx, user: ctx.user } });
});

export const storeProcedure = publicProcedure.use(storeErrors);
export const protectedProcedure = storeProcedure.use(authMiddleware);
