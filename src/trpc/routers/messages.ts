import { z } from 'zod/v4';
import { router, protectedProcedure } from '../init.js';
import { requireParticipant } from '../../services/conversations.js';
import {
  deleteMessage,
  editMessage,
  getLastMessage,
  listMessages,
  sendMessage,
} from '../../services/messages.js';
import { formatLastMessage, formatMessage } from '../../utils/format.js';

export const messagesRouter = router({
  list: protectedProcedure
    .input(
      z.object({
        conversation_id: z.uuid(),
        before: z.string().optional(),
        limit: z.number().int().min(1).max(100).optional(),
      }),
    )
    .query(async ({ ctx, input }) => {
      await requireParticipant(ctx.db, input.conversation_id, ctx.user.id);
      const page = await listMessages(ctx.db, input.conversation_id, {
        before: input.before,
        limit: input.limit,
      });
      return { messages: page.messages.map(formatMessage), next_cursor: page.nextCursor };
    }),

  last: protectedProcedure
    .input(z.object({ conversation_id: z.uuid() }))
    .query(async ({ ctx, input }) => {
      await requireParticipant(ctx.db, input.conversation_id, ctx.user.id);
      const last = await getLastMessage(ctx.db, input.conversation_id);
      return last ? formatLastMessage(last) : null;
    }),

  send: protectedProcedure
    .input(
      z.object({
        conversation_id: z.uuid(),
        type: z.enum(['text', 'image', 'video', 'file']).optional(),
        content: z.string().optional(),
        file_url: z.string().optional(),
        reply_to: z.uuid().optional(),
      }),
    )
    .mutation(async ({ ctx, input }) => {
      const message = await sendMessage(ctx.db, {
        conversationId: input.conversation_id,
        senderId: ctx.user.id,
        type: input.type,
        content: input.content,
        fileUrl: input.file_url,
        replyToId: input.reply_to,
      });
      return formatMessage(message);
    }),

  edit: protectedProcedure
    .input(z.object({ message_id: z.uuid(), content: z.string() }))
    .mutation(async ({ ctx, input }) => {
      return formatMessage(await editMessage(ctx.db, input.message_id, ctx.user.id, input.content));
    }),

  delete: protectedProcedure
    .input(z.object({ message_id: z.uuid() }))
    .mutation(async ({ ctx, input }) => {
      await deleteMessage(ctx.db, input.message_id, ctx.user.id);
      return { success: true };
    }),
});
