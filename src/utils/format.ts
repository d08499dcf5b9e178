import type { UserRow } from '../services/users.js';
import type { FriendProfile, FriendRequestRow, FriendRequestView } from '../services/friends.js';
import type {
  ConversationDetail,
  ConversationRow,
  ParticipantInfo,
  ParticipantRow,
} from '../services/conversations.js';
import type { MessageRow } from '../services/messages.js';
import type { LastMessageRow } from '../services/last-message.js';
import type { FileRow } from '../services/files.js';

// API shapes are snake_case; rows come out of drizzle in camelCase.

export function formatUser(row: UserRow) {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    role: row.role,
    display_name: row.displayName,
    avatar_url: row.avatarUrl,
    avatar_id: row.avatarId,
    bio: row.bio,
    phone: row.phone,
    created_at: row.createdAt.toISOString(),
    updated_at: row.updatedAt.toISOString(),
  };
}

export function formatFriend(row: FriendProfile) {
  return {
    id: row.id,
    username: row.username,
    display_name: row.displayName,
    avatar_url: row.avatarUrl,
    since: row.since.toISOString(),
  };
}

export function formatFriendRequest(row: FriendRequestRow) {
  return {
    id: row.id,
    from_user_id: row.fromUserId,
    to_user_id: row.toUserId,
    message: row.message,
    created_at: row.createdAt.toISOString(),
  };
}

export function formatFriendRequestView(row: FriendRequestView) {
  return {
    id: row.id,
    direction: row.direction,
    message: row.message,
    created_at: row.createdAt.toISOString(),
    user: {
      id: row.user.id,
      username: row.user.username,
      display_name: row.user.displayName,
      avatar_url: row.user.avatarUrl,
    },
  };
}

export function formatConversation(row: ConversationRow) {
  return {
    id: row.id,
    type: row.type,
    created_at: row.createdAt.toISOString(),
    updated_at: row.updatedAt.toISOString(),
  };
}

export function formatParticipant(row: ParticipantRow) {
  return {
    conversation_id: row.conversationId,
    user_id: row.userId,
    unread_count: row.unreadCount,
    last_seen_message_id: row.lastSeenMessageId,
    joined_at: row.joinedAt.toISOString(),
  };
}

function formatParticipantInfo(row: ParticipantInfo) {
  return {
    user_id: row.userId,
    username: row.username,
    display_name: row.displayName,
    avatar_url: row.avatarUrl,
    unread_count: row.unreadCount,
    last_seen_message_id: row.lastSeenMessageId,
    joined_at: row.joinedAt.toISOString(),
  };
}

export function formatLastMessage(row: Pick<LastMessageRow, 'messageId' | 'senderId' | 'type' | 'content' | 'createdAt'>) {
  return {
    message_id: row.messageId,
    sender_id: row.senderId,
    type: row.type,
    content: row.content,
    created_at: row.createdAt.toISOString(),
  };
}

export function formatConversationDetail(row: ConversationDetail) {
  return {
    id: row.id,
    type: row.type,
    name: row.group?.name ?? null,
    avatar_url: row.group?.avatarUrl ?? null,
    created_by: row.group?.createdBy ?? null,
    last_message: row.lastMessage ? formatLastMessage(row.lastMessage) : null,
    participants: row.participants.map(formatParticipantInfo),
    created_at: row.createdAt.toISOString(),
    updated_at: row.updatedAt.toISOString(),
  };
}

export function formatMessage(row: MessageRow) {
  return {
    id: row.id,
    conversation_id: row.conversationId,
    sender_id: row.senderId,
    reply_to_id: row.replyToId,
    type: row.type,
    content: row.content,
    file_url: row.fileUrl,
    is_edited: row.isEdited,
    created_at: row.createdAt.toISOString(),
    updated_at: row.updatedAt.toISOString(),
  };
}

export function formatFile(row: FileRow, url?: string) {
  return {
    id: row.id,
    filename: row.filename,
    original_filename: row.originalFilename,
    mime_type: row.mimeType,
    file_size: row.fileSize,
    uploaded_by: row.uploadedBy,
    created_at: row.createdAt.toISOString(),
    ...(url !== undefined && { url }),
  };
}
