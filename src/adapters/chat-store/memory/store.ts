import { randomUUID } from "node:crypto";

import type {
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
import { ConflictError, NotFoundError } from "@/server/chat/types";
import { compareOrderingKey } from "@/server/chat/utils";

type InMemoryChatStoreOptions = {
  now?: () => Date;
};

function memberKey(conversationId: string, userId: string): string {
  return `${conversationId}:${userId}`;
}

function reactionKey(key: ReactionKey): string {
  return `${key.messageId}:${key.userId}:${key.emoji}`;
}

function cursorOf(message: MessageRecord): MessageCursor {
  return { createdAt: message.createdAt, id: message.id };
}

/**
 * Process-local ChatStore. Records are copied on the way in and out so callers never
 * hold references into the store.
 */
export class InMemoryChatStore implements ChatStore {
  private readonly now: () => Date;
  private readonly conversations = new Map<string, ConversationRecord>();
  private readonly members = new Map<string, ConversationMemberRecord>();
  private readonly messages = new Map<number, MessageRecord>();
  private readonly reactions = new Map<string, ReactionRecord>();
  private nextMessageId = 1;

  constructor(options: InMemoryChatStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private requireConversation(conversationId: string): ConversationRecord {
    const conversation = this.conversations.get(conversationId);
    if (!conversation) {
      throw new NotFoundError("Conversation not found.", "conversation_not_found");
    }
    return conversation;
  }

  private requireMessage(messageId: number): MessageRecord {
    const message = this.messages.get(messageId);
    if (!message) {
      throw new NotFoundError("Message not found.", "message_not_found");
    }
    return message;
  }

  private membersOf(conversationId: string): ConversationMemberRecord[] {
    return Array.from(this.members.values())
      .filter((member) => member.conversationId === conversationId)
      .sort((a, b) => a.joinedAt.localeCompare(b.joinedAt) || a.userId.localeCompare(b.userId))
      .map((member) => ({ ...member }));
  }

  async createConversation(input: CreateConversationInput) {
    const [peer] = input.memberIds.filter((id) => id !== input.createdBy);
    if (input.kind === "direct" && peer && (await this.findDirectConversation(input.createdBy, peer))) {
      throw new ConflictError("A direct conversation already exists for this pair.", "duplicate");
    }
    const createdAt = this.timestamp();
    const conversation: ConversationRecord = {
      id: randomUUID(),
      kind: input.kind,
      title: input.title,
      createdBy: input.createdBy,
      createdAt,
      lastActivityAt: createdAt,
      archivedAt: null,
    };
    this.conversations.set(conversation.id, conversation);
    const ids = [input.createdBy, ...input.memberIds.filter((id) => id !== input.createdBy)];
    const members = await this.addMembers(
      conversation.id,
      ids.map((userId): { userId: string; role: MemberRole } => ({
        userId,
        role: input.kind === "group" && userId === input.createdBy ? "owner" : "member",
      })),
    );
    return { conversation: { ...conversation }, members };
  }

  async findDirectConversation(userA: string, userB: string): Promise<ConversationRecord | null> {
    for (const conversation of this.conversations.values()) {
      if (conversation.kind !== "direct") continue;
      const ids = this.membersOf(conversation.id).map((member) => member.userId);
      if (ids.length === 2 && ids.includes(userA) && ids.includes(userB)) {
        return { ...conversation };
      }
    }
    return null;
  }

  async getConversation(conversationId: string): Promise<ConversationRecord> {
    return { ...this.requireConversation(conversationId) };
  }

  async listConversationsForUser(userId: string, options: { limit: number; offset: number }) {
    const owned = Array.from(this.conversations.values())
      .filter((conversation) => this.members.has(memberKey(conversation.id, userId)))
      .sort(
        (a, b) =>
          b.lastActivityAt.localeCompare(a.lastActivityAt) || b.createdAt.localeCompare(a.createdAt),
      );
    return {
      conversations: owned
        .slice(options.offset, options.offset + options.limit)
        .map((conversation) => ({ ...conversation })),
      total: owned.length,
    };
  }

  async listConversationIdsForUser(userId: string): Promise<string[]> {
    return Array.from(this.members.values())
      .filter((member) => member.userId === userId)
      .map((member) => member.conversationId);
  }

  async updateConversation(
    conversationId: string,
    patch: { title?: string | null; archived?: boolean },
  ): Promise<ConversationRecord> {
    const conversation = this.requireConversation(conversationId);
    if (patch.title !== undefined) {
      conversation.title = patch.title;
    }
    if (patch.archived !== undefined) {
      conversation.archivedAt = patch.archived ? conversation.archivedAt ?? this.timestamp() : null;
    }
    return { ...conversation };
  }

  async addMembers(
    conversationId: string,
    members: Array<{ userId: string; role: MemberRole }>,
  ): Promise<ConversationMemberRecord[]> {
    this.requireConversation(conversationId);
    const joinedAt = this.timestamp();
    const added: ConversationMemberRecord[] = [];
    members.forEach(({ userId, role }) => {
      const key = memberKey(conversationId, userId);
      if (this.members.has(key)) return;
      const record: ConversationMemberRecord = {
        conversationId,
        userId,
        role,
        joinedAt,
        lastReadMessageId: null,
        lastReadMessageAt: null,
        lastReadAt: null,
      };
      this.members.set(key, record);
      added.push({ ...record });
    });
    return added;
  }

  async removeMember(conversationId: string, userId: string): Promise<boolean> {
    this.requireConversation(conversationId);
    return this.members.delete(memberKey(conversationId, userId));
  }

  async listMembers(conversationId: string): Promise<ConversationMemberRecord[]> {
    this.requireConversation(conversationId);
    return this.membersOf(conversationId);
  }

  async getMember(conversationId: string, userId: string): Promise<ConversationMemberRecord | null> {
    const member = this.members.get(memberKey(conversationId, userId));
    return member ? { ...member } : null;
  }

  async createMessage(input: CreateMessageInput) {
    const conversation = this.requireConversation(input.conversationId);
    if (input.clientMessageId) {
      for (const existing of this.messages.values()) {
        if (
          existing.conversationId === input.conversationId &&
          existing.senderId === input.senderId &&
          existing.clientMessageId === input.clientMessageId
        ) {
          return { message: { ...existing }, created: false };
        }
      }
    }
    if (input.parentId !== null) {
      const parent = this.messages.get(input.parentId);
      if (!parent || parent.conversationId !== input.conversationId) {
        throw new NotFoundError("Parent message not found.", "parent_not_found");
      }
    }
    const createdAt = this.timestamp();
    const message: MessageRecord = {
      id: this.nextMessageId++,
      conversationId: input.conversationId,
      senderId: input.senderId,
      body: input.body,
      attachments: input.attachments.map((attachment) => ({ ...attachment })),
      parentId: input.parentId,
      clientMessageId: input.clientMessageId,
      createdAt,
      editedAt: null,
      deletedAt: null,
    };
    this.messages.set(message.id, message);
    conversation.lastActivityAt = createdAt;
    return { message: { ...message }, created: true };
  }

  async getMessage(messageId: number): Promise<MessageRecord> {
    return { ...this.requireMessage(messageId) };
  }

  async editMessage(messageId: number, body: string | null): Promise<MessageRecord> {
    const message = this.requireMessage(messageId);
    if (message.deletedAt) {
      throw new ConflictError("Deleted messages cannot be edited.", "message_deleted");
    }
    message.body = body;
    message.editedAt = this.timestamp();
    return { ...message };
  }

  async softDeleteMessage(messageId: number) {
    const message = this.requireMessage(messageId);
    if (message.deletedAt) {
      return { message: { ...message }, deleted: false };
    }
    message.deletedAt = this.timestamp();
    Array.from(this.reactions.entries()).forEach(([key, reaction]) => {
      if (reaction.messageId === messageId) this.reactions.delete(key);
    });
    return { message: { ...message }, deleted: true };
  }

  async listMessages(
    conversationId: string,
    options: { limit: number; before?: MessageCursor | null; after?: MessageCursor | null },
  ): Promise<MessagePage> {
    this.requireConversation(conversationId);
    const { before, after } = options;
    const matching = Array.from(this.messages.values())
      .filter((message) => message.conversationId === conversationId)
      .filter((message) => !before || compareOrderingKey(cursorOf(message), before) < 0)
      .filter((message) => !after || compareOrderingKey(cursorOf(message), after) > 0)
      .sort((a, b) => compareOrderingKey(cursorOf(b), cursorOf(a)));
    const page = after ? matching.slice(-options.limit) : matching.slice(0, options.limit);
    return {
      messages: page.map((message) => ({ ...message })),
      hasMore: matching.length > options.limit,
    };
  }

  async latestMessage(conversationId: string): Promise<MessageRecord | null> {
    let latest: MessageRecord | null = null;
    for (const message of this.messages.values()) {
      if (message.conversationId !== conversationId) continue;
      if (!latest || compareOrderingKey(cursorOf(message), cursorOf(latest)) > 0) {
        latest = message;
      }
    }
    return latest ? { ...latest } : null;
  }

  async advanceReadMarker(params: { conversationId: string; userId: string; messageId: number }) {
    const member = this.members.get(memberKey(params.conversationId, params.userId));
    if (!member) {
      throw new NotFoundError("Membership not found.", "member_not_found");
    }
    const message = this.requireMessage(params.messageId);
    if (message.conversationId !== params.conversationId) {
      throw new NotFoundError("Message not found in this conversation.", "message_not_found");
    }
    const current =
      member.lastReadMessageId !== null && member.lastReadMessageAt !== null
        ? { id: member.lastReadMessageId, createdAt: member.lastReadMessageAt }
        : null;
    const advanced = !current || compareOrderingKey(cursorOf(message), current) > 0;
    if (advanced) {
      member.lastReadMessageId = message.id;
      member.lastReadMessageAt = message.createdAt;
      member.lastReadAt = this.timestamp();
    }
    const marker: ReadMarkerRecord = {
      conversationId: member.conversationId,
      userId: member.userId,
      messageId: member.lastReadMessageId ?? message.id,
      messageCreatedAt: member.lastReadMessageAt ?? message.createdAt,
      readAt: member.lastReadAt ?? this.timestamp(),
    };
    return { marker, advanced };
  }

  async countUnread(conversationId: string, userId: string): Promise<number> {
    const member = this.members.get(memberKey(conversationId, userId));
    if (!member) return 0;
    const marker =
      member.lastReadMessageId !== null && member.lastReadMessageAt !== null
        ? { id: member.lastReadMessageId, createdAt: member.lastReadMessageAt }
        : null;
    let count = 0;
    for (const message of this.messages.values()) {
      if (message.conversationId !== conversationId) continue;
      if (message.senderId === userId || message.deletedAt) continue;
      if (marker && compareOrderingKey(cursorOf(message), marker) <= 0) continue;
      count += 1;
    }
    return count;
  }

  async addReaction(key: ReactionKey) {
    this.requireMessage(key.messageId);
    const id = reactionKey(key);
    const existing = this.reactions.get(id);
    if (existing) {
      return { reaction: { ...existing }, added: false };
    }
    const reaction: ReactionRecord = { ...key, createdAt: this.timestamp() };
    this.reactions.set(id, reaction);
    return { reaction: { ...reaction }, added: true };
  }

  async removeReaction(key: ReactionKey): Promise<boolean> {
    this.requireMessage(key.messageId);
    return this.reactions.delete(reactionKey(key));
  }

  async listReactions(messageIds: number[]): Promise<ReactionRecord[]> {
    if (!messageIds.length) return [];
    const wanted = new Set(messageIds);
    return Array.from(this.reactions.values())
      .filter((reaction) => wanted.has(reaction.messageId))
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map((reaction) => ({ ...reaction }));
  }
}
