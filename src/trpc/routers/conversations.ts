import { z } from 'zod/v4';
import { router, protectedProcedure } from '../init.js';
import {
  addParticipant,
  createGroupConversation,
  getConversation,
  listConversations,
  markRead,
  openDirectConversation,
  removeParticipant,
  requireParticipant,
} from '../../services/conversations.js';
import { AuthorizationError } from '../../utils/errors.js';
import { formatConversationDetail, formatParticipant } from '../../utils/format.js';

const conversationInput = z.object({ conversation_id: z.uuid() });

export const conversationsRouter = router({
  list: protectedProcedure.query(async ({ ctx }) => {
    const rows = await listConversations(ctx.db, ctx.user.id);
    return rows.map(formatConversationDetail);
  }),

  get: protectedProcedure.input(conversationInput).query(async ({ ctx, input }) => {
    return formatConversationDetail(await getConversation(ctx.db, input.conversation_id, ctx.user.id));
  }),

  /** Returns the existing direct conversation with the user, creating it when there is none. */
  open_direct: protectedProcedure
    .input(z.object({ user_id: z.uuid() }))
    .mutation(async ({ ctx, input }) => {
      const conversation = await openDirectConversation(ctx.db, ctx.user.id, input.user_id);
      return formatConversationDetail(await getConversation(ctx.db, conversation.id, ctx.user.id));
    }),

  create_group: protectedProcedure
    .input(z.object({ name: z.string(), member_ids: z.array(z.uuid()).max(100) }))
    .mutation(async ({ ctx, input }) => {
      const conversation = await createGroupConversation(ctx.db, ctx.user.id, input.name, input.member_ids);
      return formatConversationDetail(await getConversation(ctx.db, conversation.id, ctx.user.id));
    }),

  add_participant: protectedProcedure
    .input(z.object({ conversation_id: z.uuid(), user_id: z.uuid() }))
    .mutation(async ({ ctx, input }) => {
      await requireParticipant(ctx.db, input.conversation_id, ctx.user.id);
      return formatParticipant(await addParticipant(ctx.db, input.conversation_id, input.user_id));
    }),

  remove_participant: protectedProcedure
    .input(z.object({ conversation_id: z.uuid(), user_id: z.uuid() }))
    .mutation(async ({ ctx, input }) => {
      await requireParticipant(ctx.db, input.conversation_id, ctx.user.id);
      if (input.user_id.toLowerCase() !== ctx.user.id.toLowerCase()) {
        const detail = await getConversation(ctx.db, input.conversation_id, ctx.user.id);
        if (detail.group?.createdBy !== ctx.user.id.toLowerCase()) {
          throw new AuthorizationError('Only the group creator can remove other participants', 3201);
        }
      }
      await removeParticipant(ctx.db, input.conversation_id, input.user_id);
      return { success: true };
    }),

  mark_read: protectedProcedure
    .input(z.object({ conversation_id: z.uuid(), message_id: z.uuid() }))
    .mutation(async ({ ctx, input }) => {
      const participant = await markRead(ctx.db, input.conversation_id, ctx.user.id, input.message_id);
      return formatParticipant(participant);
    }),
});
