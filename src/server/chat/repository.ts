import { getDatabaseAdminClient } from "@/config/database";
import type {
  AttachmentRecord,
  ChatStore,
  ConversationMemberRecord,
  ConversationRecord,
  CreateConversationInput,
  CreateMessageInput,
  MemberRole,
  MessageCursor,
  MessagePage,
  MessageRecord,
  ReactionKey,
  ReactionRecord,
  ReadMarkerRecord,
} from "@/ports/chat-store";
import type { DatabaseClient, DatabaseError, DatabaseResult } from "@/ports/database";

import { ConflictError, NotFoundError } from "./types";

const CONVERSATIONS_TABLE = "chat_conversations";
const MEMBERS_TABLE = "chat_conversation_members";
const MESSAGES_TABLE = "chat_messages";
const REACTIONS_TABLE = "chat_message_reactions";

const CONVERSATION_COLUMNS = "id, kind, title, created_by, created_at, last_activity_at, archived_at";
const MEMBER_COLUMNS =
  "conversation_id, user_id, role, joined_at, last_read_message_id, last_read_message_at, last_read_at";
const MESSAGE_COLUMNS =
  "id, conversation_id, sender_id, body, attachments, parent_id, client_message_id, created_at, edited_at, deleted_at";
const REACTION_COLUMNS = "message_id, user_id, emoji, created_at";

const UNIQUE_VIOLATION = "23505";
const FOREIGN_KEY_VIOLATION = "23503";

export type ChatConversationRow = {
  id: string;
  kind: "direct" | "group";
  title: string | null;
  created_by: string;
  created_at: string;
  last_activity_at: string;
  archived_at: string | null;
};

export type ChatConversationMemberRow = {
  conversation_id: string;
  user_id: string;
  role: MemberRole;
  joined_at: string;
  last_read_message_id: number | string | null;
  last_read_message_at: string | null;
  last_read_at: string | null;
};

export type ChatMessageRow = {
  id: number | string;
  conversation_id: string;
  sender_id: string;
  body: string | null;
  attachments: AttachmentRecord[] | null;
  parent_id: number | string | null;
  client_message_id: string | null;
  created_at: string;
  edited_at: string | null;
  deleted_at: string | null;
};

export type ChatMessageReactionRow = {
  message_id: number | string;
  user_id: string;
  emoji: string;
  created_at: string;
};

type ReadMarkerRow = {
  message_id: number | string;
  message_created_at: string;
  read_at: string;
  advanced: boolean;
};

function wrapDatabaseError(context: string, error: DatabaseError): Error {
  const message = context ? `${context}: ${error.message}` : error.message;
  if (error.code === UNIQUE_VIOLATION) {
    return new ConflictError(message, "duplicate");
  }
  if (error.code === FOREIGN_KEY_VIOLATION) {
    return new NotFoundError(message, "reference_not_found");
  }
  return new Error(message, { cause: error });
}

function expectResult<T>(result: DatabaseResult<T>, context: string): T {
  if (result.error) {
    throw wrapDatabaseError(context, result.error);
  }
  if (result.data === null || result.data === undefined) {
    throw new Error(`${context}: missing result data`);
  }
  return result.data;
}

function expectArrayResult<T>(result: DatabaseResult<T[]>, context: string): T[] {
  if (result.error) {
    throw wrapDatabaseError(context, result.error);
  }
  return result.data ?? [];
}

function expectMaybeResult<T>(result: DatabaseResult<T | null>, context: string): T | null {
  if (result.error) {
    throw wrapDatabaseError(context, result.error);
  }
  return result.data ?? null;
}

// bigint columns arrive as strings when they exceed the JSON safe range
function toId(value: number | string): number {
  return typeof value === "number" ? value : Number.parseInt(value, 10);
}

function toOptionalId(value: number | string | null): number | null {
  return value === null ? null : toId(value);
}

function quoteFilterValue(value: string): string {
  return `"${value.replace(/"/g, '\\"')}"`;
}

export function directConversationKey(userA: string, userB: string): string {
  return [userA, userB].sort().join(":");
}

function toConversation(row: ChatConversationRow): ConversationRecord {
  return {
    id: row.id,
    kind: row.kind,
    title: row.title,
    createdBy: row.created_by,
    createdAt: row.created_at,
    lastActivityAt: row.last_activity_at,
    archivedAt: row.archived_at,
  };
}

function toMember(row: ChatConversationMemberRow): ConversationMemberRecord {
  return {
    conversationId: row.conversation_id,
    userId: row.user_id,
    role: row.role,
    joinedAt: row.joined_at,
    lastReadMessageId: toOptionalId(row.last_read_message_id),
    lastReadMessageAt: row.last_read_message_at,
    lastReadAt: row.last_read_at,
  };
}

function toMessage(row: ChatMessageRow): MessageRecord {
  return {
    id: toId(row.id),
    conversationId: row.conversation_id,
    senderId: row.sender_id,
    body: row.body,
    attachments: Array.isArray(row.attachments) ? row.attachments : [],
    parentId: toOptionalId(row.parent_id),
    clientMessageId: row.client_message_id,
    createdAt: row.created_at,
    editedAt: row.edited_at,
    deletedAt: row.deleted_at,
  };
}

function toReaction(row: ChatMessageReactionRow): ReactionRecord {
  return {
    messageId: toId(row.message_id),
    userId: row.user_id,
    emoji: row.emoji,
    createdAt: row.created_at,
  };
}

/**
 * ChatStore over PostgREST. Conversation creation, read-marker advancement, unread
 * counting and the conversation activity timestamp live in SQL (see supabase/migrations).
 */
export class SupabaseChatStore implements ChatStore {
  constructor(private readonly db: DatabaseClient) {}

  async createConversation(input: CreateConversationInput) {
    const others = input.memberIds.filter((id) => id !== input.createdBy);
    const [first, second] = others;
    const directKey =
      input.kind === "direct" && first && !second
        ? directConversationKey(input.createdBy, first)
        : null;
    const result = await this.db.rpc<ChatConversationRow[]>("chat_create_conversation", {
      p_kind: input.kind,
      p_title: input.title,
      p_created_by: input.createdBy,
      p_direct_key: directKey,
      p_member_ids: [input.createdBy, ...others],
    });
    const [row] = expectArrayResult(result, "chat_create_conversation");
    if (!row) {
      throw new Error("chat_create_conversation: no conversation returned");
    }
    const conversation = toConversation(row);
    return { conversation, members: await this.listMembers(conversation.id) };
  }

  async findDirectConversation(userA: string, userB: string): Promise<ConversationRecord | null> {
    const result = await this.db
      .from(CONVERSATIONS_TABLE)
      .select<ChatConversationRow>(CONVERSATION_COLUMNS)
      .eq("kind", "direct")
      .eq("direct_key", directConversationKey(userA, userB))
      .maybeSingle();
    const row = expectMaybeResult(result, "chat_conversations.find_direct");
    return row ? toConversation(row) : null;
  }

  async getConversation(conversationId: string): Promise<ConversationRecord> {
    const result = await this.db
      .from(CONVERSATIONS_TABLE)
      .select<ChatConversationRow>(CONVERSATION_COLUMNS)
      .eq("id", conversationId)
      .maybeSingle();
    const row = expectMaybeResult(result, "chat_conversations.get");
    if (!row) {
      throw new NotFoundError("Conversation not found.", "conversation_not_found");
    }
    return toConversation(row);
  }

  async listConversationsForUser(userId: string, options: { limit: number; offset: number }) {
    const result = await this.db
      .from(CONVERSATIONS_TABLE)
      .select<ChatConversationRow>(`${CONVERSATION_COLUMNS}, ${MEMBERS_TABLE}!inner(user_id)`, {
        count: "exact",
      })
      .eq(`${MEMBERS_TABLE}.user_id`, userId)
      .order("last_activity_at", { ascending: false })
      .order("created_at", { ascending: false })
      .range(options.offset, options.offset + options.limit - 1)
      .fetch();
    const rows = expectArrayResult(result, "chat_conversations.list_for_user");
    return {
      conversations: rows.map(toConversation),
      total: result.count ?? rows.length,
    };
  }

  async listConversationIdsForUser(userId: string): Promise<string[]> {
    const result = await this.db
      .from(MEMBERS_TABLE)
      .select<Pick<ChatConversationMemberRow, "conversation_id">>("conversation_id")
      .eq("user_id", userId)
      .fetch();
    return expectArrayResult(result, "chat_conversation_members.ids_for_user").map(
      (row) => row.conversation_id,
    );
  }

  async updateConversation(
    conversationId: string,
    patch: { title?: string | null; archived?: boolean },
  ): Promise<ConversationRecord> {
    const values: Record<string, unknown> = {};
    if (patch.title !== undefined) values.title = patch.title;
    if (patch.archived !== undefined) {
      values.archived_at = patch.archived ? new Date().toISOString() : null;
    }
    if (!Object.keys(values).length) {
      return this.getConversation(conversationId);
    }
    const result = await this.db
      .from(CONVERSATIONS_TABLE)
      .update(values)
      .eq("id", conversationId)
      .select<ChatConversationRow>(CONVERSATION_COLUMNS)
      .maybeSingle();
    const row = expectMaybeResult(result, "chat_conversations.update");
    if (!row) {
      throw new NotFoundError("Conversation not found.", "conversation_not_found");
    }
    return toConversation(row);
  }

  async addMembers(
    conversationId: string,
    members: Array<{ userId: string; role: MemberRole }>,
  ): Promise<ConversationMemberRecord[]> {
    if (!members.length) return [];
    const result = await this.db
      .from(MEMBERS_TABLE)
      .upsert(
        members.map((member) => ({
          conversation_id: conversationId,
          user_id: member.userId,
          role: member.role,
        })),
        { onConflict: "conversation_id,user_id", ignoreDuplicates: true },
      )
      .select<ChatConversationMemberRow>(MEMBER_COLUMNS)
      .fetch();
    return expectArrayResult(result, "chat_conversation_members.insert").map(toMember);
  }

  async removeMember(conversationId: string, userId: string): Promise<boolean> {
    const result = await this.db
      .from(MEMBERS_TABLE)
      .delete()
      .eq("conversation_id", conversationId)
      .eq("user_id", userId)
      .select<Pick<ChatConversationMemberRow, "user_id">>("user_id")
      .fetch();
    return expectArrayResult(result, "chat_conversation_members.delete").length > 0;
  }

  async listMembers(conversationId: string): Promise<ConversationMemberRecord[]> {
    const result = await this.db
      .from(MEMBERS_TABLE)
      .select<ChatConversationMemberRow>(MEMBER_COLUMNS)
      .eq("conversation_id", conversationId)
      .order("joined_at", { ascending: true })
      .fetch();
    return expectArrayResult(result, "chat_conversation_members.list").map(toMember);
  }

  async getMember(conversationId: string, userId: string): Promise<ConversationMemberRecord | null> {
    const result = await this.db
      .from(MEMBERS_TABLE)
      .select<ChatConversationMemberRow>(MEMBER_COLUMNS)
      .eq("conversation_id", conversationId)
      .eq("user_id", userId)
      .maybeSingle();
    const row = expectMaybeResult(result, "chat_conversation_members.get");
    return row ? toMember(row) : null;
  }

  private async findByClientMessageId(input: CreateMessageInput): Promise<MessageRecord | null> {
    if (!input.clientMessageId) return null;
    const result = await this.db
      .from(MESSAGES_TABLE)
      .select<ChatMessageRow>(MESSAGE_COLUMNS)
      .eq("conversation_id", input.conversationId)
      .eq("sender_id", input.senderId)
      .eq("client_message_id", input.clientMessageId)
      .maybeSingle();
    const row = expectMaybeResult(result, "chat_messages.find_by_client_id");
    return row ? toMessage(row) : null;
  }

  async createMessage(input: CreateMessageInput) {
    const existing = await this.findByClientMessageId(input);
    if (existing) {
      return { message: existing, created: false };
    }
    if (input.parentId !== null) {
      const parent = await this.getMessage(input.parentId).catch((error: unknown) => {
        if (error instanceof NotFoundError) return null;
        throw error;
      });
      if (!parent || parent.conversationId !== input.conversationId) {
        throw new NotFoundError("Parent message not found.", "parent_not_found");
      }
    }
    const result = await this.db
      .from(MESSAGES_TABLE)
      .insert({
        conversation_id: input.conversationId,
        sender_id: input.senderId,
        body: input.body,
        attachments: input.attachments,
        parent_id: input.parentId,
        client_message_id: input.clientMessageId,
      })
      .select<ChatMessageRow>(MESSAGE_COLUMNS)
      .single();
    if (result.error?.code === UNIQUE_VIOLATION) {
      const raced = await this.findByClientMessageId(input);
      if (raced) return { message: raced, created: false };
    }
    return { message: toMessage(expectResult(result, "chat_messages.insert")), created: true };
  }

  async getMessage(messageId: number): Promise<MessageRecord> {
    const result = await this.db
      .from(MESSAGES_TABLE)
      .select<ChatMessageRow>(MESSAGE_COLUMNS)
      .eq("id", messageId)
      .maybeSingle();
    const row = expectMaybeResult(result, "chat_messages.get");
    if (!row) {
      throw new NotFoundError("Message not found.", "message_not_found");
    }
    return toMessage(row);
  }

  async editMessage(messageId: number, body: string | null): Promise<MessageRecord> {
    const result = await this.db
      .from(MESSAGES_TABLE)
      .update({ body, edited_at: new Date().toISOString() })
      .eq("id", messageId)
      .is("deleted_at", null)
      .select<ChatMessageRow>(MESSAGE_COLUMNS)
      .maybeSingle();
    const row = expectMaybeResult(result, "chat_messages.edit");
    if (row) return toMessage(row);
    const current = await this.getMessage(messageId);
    if (current.deletedAt) {
      throw new ConflictError("Deleted messages cannot be edited.", "message_deleted");
    }
    throw new Error("chat_messages.edit: update matched no rows");
  }

  async softDeleteMessage(messageId: number) {
    const result = await this.db
      .from(MESSAGES_TABLE)
      .update({ deleted_at: new Date().toISOString() })
      .eq("id", messageId)
      .is("deleted_at", null)
      .select<ChatMessageRow>(MESSAGE_COLUMNS)
      .maybeSingle();
    const row = expectMaybeResult(result, "chat_messages.soft_delete");
    if (!row) {
      return { message: await this.getMessage(messageId), deleted: false };
    }
    const cleanup = await this.db
      .from(REACTIONS_TABLE)
      .delete()
      .eq("message_id", messageId)
      .select<Pick<ChatMessageReactionRow, "message_id">>("message_id")
      .fetch();
    expectArrayResult(cleanup, "chat_message_reactions.clear");
    return { message: toMessage(row), deleted: true };
  }

  async listMessages(
    conversationId: string,
    options: { limit: number; before?: MessageCursor | null; after?: MessageCursor | null },
  ): Promise<MessagePage> {
    const ascending = Boolean(options.after);
    let query = this.db
      .from(MESSAGES_TABLE)
      .select<ChatMessageRow>(MESSAGE_COLUMNS)
      .eq("conversation_id", conversationId);
    if (options.before) {
      const at = quoteFilterValue(options.before.createdAt);
      query = query.or(
        `created_at.lt.${at},and(created_at.eq.${at},id.lt.${options.before.id})`,
      );
    }
    if (options.after) {
      const at = quoteFilterValue(options.after.createdAt);
      query = query.or(
        `created_at.gt.${at},and(created_at.eq.${at},id.gt.${options.after.id})`,
      );
    }
    const result = await query
      .order("created_at", { ascending })
      .order("id", { ascending })
      .limit(options.limit + 1)
      .fetch();
    const rows = expectArrayResult(result, "chat_messages.list");
    const page = rows.slice(0, options.limit).map(toMessage);
    return {
      messages: ascending ? page.reverse() : page,
      hasMore: rows.length > options.limit,
    };
  }

  async latestMessage(conversationId: string): Promise<MessageRecord | null> {
    const result = await this.db
      .from(MESSAGES_TABLE)
      .select<ChatMessageRow>(MESSAGE_COLUMNS)
      .eq("conversation_id", conversationId)
      .order("created_at", { ascending: false })
      .order("id", { ascending: false })
      .limit(1)
      .maybeSingle();
    const row = expectMaybeResult(result, "chat_messages.latest");
    return row ? toMessage(row) : null;
  }

  async advanceReadMarker(params: { conversationId: string; userId: string; messageId: number }) {
    const result = await this.db.rpc<ReadMarkerRow[]>("chat_advance_read_marker", {
      p_conversation_id: params.conversationId,
      p_user_id: params.userId,
      p_message_id: params.messageId,
    });
    const [row] = expectArrayResult(result, "chat_advance_read_marker");
    if (!row) {
      throw new NotFoundError("Message not found in this conversation.", "message_not_found");
    }
    const marker: ReadMarkerRecord = {
      conversationId: params.conversationId,
      userId: params.userId,
      messageId: toId(row.message_id),
      messageCreatedAt: row.message_created_at,
      readAt: row.read_at,
    };
    return { marker, advanced: row.advanced };
  }

  async countUnread(conversationId: string, userId: string): Promise<number> {
    const result = await this.db.rpc<number>("chat_count_unread", {
      p_conversation_id: conversationId,
      p_user_id: userId,
    });
    if (result.error) {
      throw wrapDatabaseError("chat_count_unread", result.error);
    }
    return typeof result.data === "number" ? result.data : 0;
  }

  async addReaction(key: ReactionKey) {
    await this.getMessage(key.messageId);
    const result = await this.db
      .from(REACTIONS_TABLE)
      .insert({ message_id: key.messageId, user_id: key.userId, emoji: key.emoji })
      .select<ChatMessageReactionRow>(REACTION_COLUMNS)
      .single();
    if (result.error?.code === UNIQUE_VIOLATION) {
      const existing = await this.db
        .from(REACTIONS_TABLE)
        .select<ChatMessageReactionRow>(REACTION_COLUMNS)
        .eq("message_id", key.messageId)
        .eq("user_id", key.userId)
        .eq("emoji", key.emoji)
        .single();
      return {
        reaction: toReaction(expectResult(existing, "chat_message_reactions.get")),
        added: false,
      };
    }
    return {
      reaction: toReaction(expectResult(result, "chat_message_reactions.insert")),
      added: true,
    };
  }

  async removeReaction(key: ReactionKey): Promise<boolean> {
    await this.getMessage(key.messageId);
    const result = await this.db
      .from(REACTIONS_TABLE)
      .delete()
      .eq("message_id", key.messageId)
      .eq("user_id", key.userId)
      .eq("emoji", key.emoji)
      .select<Pick<ChatMessageReactionRow, "message_id">>("message_id")
      .fetch();
    return expectArrayResult(result, "chat_message_reactions.delete").length > 0;
  }

  async listReactions(messageIds: number[]): Promise<ReactionRecord[]> {
    const uniqueIds = Array.from(new Set(messageIds));
    if (!uniqueIds.length) return [];
    const result = await this.db
      .from(REACTIONS_TABLE)
      .select<ChatMessageReactionRow>(REACTION_COLUMNS)
      .in("message_id", uniqueIds)
      .order("created_at", { ascending: true })
      .fetch();
    return expectArrayResult(result, "chat_message_reactions.list").map(toReaction);
  }
}

export function createSupabaseChatStore(): SupabaseChatStore {
  return new SupabaseChatStore(getDatabaseAdminClient());
}
