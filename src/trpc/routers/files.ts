import { z } from 'zod/v4';
import { router, protectedProcedure } from '../init.js';
import { deleteFile, getFile, listFilesByUploader } from '../../services/files.js';
import { formatFile } from '../../utils/format.js';

export const filesRouter = router({
  get: protectedProcedure
    .input(z.object({ file_id: z.uuid() }))
    .query(async ({ ctx, input }) => {
      return formatFile(await getFile(ctx.db, input.file_id));
    }),

  list_mine: protectedProcedure.query(async ({ ctx }) => {
    const rows = await listFilesByUploader(ctx.db, ctx.user.id);
    return rows.map((row) => formatFile(row));
  }),

  delete: protectedProcedure
    .input(z.object({ file_id: z.uuid() }))
    .mutation(async ({ ctx, input }) => {
      await deleteFile(ctx.db, ctx.storage, input.file_id, ctx.user.id);
      return { success: true };
    }),
});
