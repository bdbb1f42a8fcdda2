import type {
  ChatConversation,
  ChatMember,
  ChatMessage,
  ChatPresenceEntry,
  ChatServerEvent,
} from "@/lib/chat/events";
import type { ChatAttachmentInput } from "@/lib/chat/frames";
import { KeyedQueue } from "@/lib/chat/keyed-queue";
import type {
  ChatStore,
  ConversationMemberRecord,
  ConversationRecord,
  MessageRecord,
  ReadMarkerRecord,
} from "@/ports/chat-store";
import type { BroadcastOptions, ChatBroadcaster } from "@/ports/realtime";
import type { ConnectionRegistry } from "@/server/realtime/connection-registry";
import type { PresenceTracker } from "@/server/realtime/presence-tracker";

import {
  AuthorizationError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from "./types";
import {
  buildReactionSummaries,
  decodeCursor,
  encodeCursor,
  sanitizeAttachments,
  sanitizeBody,
  sanitizeReactionEmoji,
  sanitizeTitle,
  toChatConversation,
  toChatMember,
  toChatMessage,
  uniqueIds,
} from "./utils";

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 100;
export const MAX_GROUP_MEMBERS = 256;

export type ChatServiceDependencies = {
  store: ChatStore;
  broadcaster: ChatBroadcaster;
  registry: ConnectionRegistry;
  presence: PresenceTracker;
};

export type CreateConversationParams = {
  kind: "direct" | "group";
  memberIds: string[];
  title?: string | null;
};

export type SendMessageParams = {
  conversationId: string;
  body?: string | null;
  attachments?: ChatAttachmentInput[] | null;
  parentId?: number | null;
  clientMessageId?: string | null;
};

export type ConversationSummary = ChatConversation & {
  lastMessage: ChatMessage | null;
  unreadCount: number;
};

export type MessageListResult = {
  messages: ChatMessage[];
  hasMore: boolean;
  nextCursor: string | null;
};

export type ReadResult = {
  conversationId: string;
  marker: ReadMarkerRecord | null;
  applied: boolean;
};

type Membership = {
  conversation: ConversationRecord;
  member: ConversationMemberRecord;
};

function clampLimit(value: number | undefined, fallback: number, max: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(1, Math.min(max, Math.floor(value)));
}

export class ChatService {
  private readonly store: ChatStore;
  private readonly broadcaster: ChatBroadcaster;
  private readonly registry: ConnectionRegistry;
  private readonly presence: PresenceTracker;
  private readonly ordering = new KeyedQueue();

  constructor(deps: ChatServiceDependencies) {
    this.store = deps.store;
    this.broadcaster = deps.broadcaster;
    this.registry = deps.registry;
    this.presence = deps.presence;
  }

  // Connection lifecycle ----------------------------------------------------

  /** Subscribes a freshly activated connection to all of the user's conversations. */
  async connect(
    userId: string,
    connectionId: string,
  ): Promise<{ conversations: string[]; unread: Record<string, number> }> {
    const conversations = await this.store.listConversationIdsForUser(userId);
    conversations.forEach((conversationId) => this.registry.subscribe(connectionId, conversationId));
    const unread = await this.unreadCountsFor(userId, conversations);
    return { conversations, unread };
  }

  // Conversations ------------------------------------------------------------

  async createConversation(
    actorId: string,
    params: CreateConversationParams,
  ): Promise<{ conversation: ChatConversation; created: boolean }> {
    const others = uniqueIds(params.memberIds).filter((id) => id !== actorId);
    if (params.kind === "direct") {
      const [peer, extra] = others;
      if (!peer || extra) {
        throw new ValidationError("A direct conversation needs exactly one other participant.");
      }
      const existing = await this.store.findDirectConversation(actorId, peer);
      if (existing) {
        return { conversation: await this.describe(existing), created: false };
      }
      try {
        return await this.openConversation(actorId, "direct", [peer], null);
      } catch (error) {
        if (!(error instanceof ConflictError)) throw error;
        const raced = await this.store.findDirectConversation(actorId, peer);
        if (!raced) throw error;
        return { conversation: await this.describe(raced), created: false };
      }
    }
    if (!others.length) {
      throw new ValidationError("A group conversation needs at least one other participant.");
    }
    if (others.length + 1 > MAX_GROUP_MEMBERS) {
      throw new ValidationError(`A group can have at most ${MAX_GROUP_MEMBERS} members.`);
    }
    return this.openConversation(actorId, "group", others, sanitizeTitle(params.title));
  }

  async listConversations(
    userId: string,
    options: { limit?: number; offset?: number } = {},
  ): Promise<{ conversations: ConversationSummary[]; total: number }> {
    const limit = clampLimit(options.limit, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
    const offset = Math.max(0, Math.floor(options.offset ?? 0));
    const page = await this.store.listConversationsForUser(userId, { limit, offset });
    const conversations = await Promise.all(
      page.conversations.map(async (conversation) => {
        const [members, latest, unreadCount] = await Promise.all([
          this.store.listMembers(conversation.id),
          this.store.latestMessage(conversation.id),
          this.store.countUnread(conversation.id, userId),
        ]);
        const lastMessage = latest ? (await this.hydrate([latest]))[0] ?? null : null;
        return { ...toChatConversation(conversation, members), lastMessage, unreadCount };
      }),
    );
    return { conversations, total: page.total };
  }

  async getConversation(userId: string, conversationId: string): Promise<ChatConversation> {
    const { conversation } = await this.requireMember(conversationId, userId);
    return this.describe(conversation);
  }

  async updateConversation(
    actorId: string,
    conversationId: string,
    patch: { title?: string | null; archived?: boolean },
  ): Promise<ChatConversation> {
    const { conversation, member } = await this.requireMember(conversationId, actorId);
    if (patch.title !== undefined && conversation.kind === "direct") {
      throw new ConflictError("Direct conversations cannot be renamed.", "direct_immutable");
    }
    if (conversation.kind === "group" && member.role !== "owner") {
      throw new AuthorizationError("Only the conversation owner can change it.");
    }
    if (conversation.archivedAt && patch.archived !== false) {
      throw new ConflictError("This conversation is archived.", "conversation_archived");
    }
    const updated = await this.store.updateConversation(conversationId, {
      ...(patch.title !== undefined ? { title: sanitizeTitle(patch.title) } : {}),
      ...(patch.archived !== undefined ? { archived: patch.archived } : {}),
    });
    const view = await this.describe(updated);
    const archivedNow = !conversation.archivedAt && Boolean(updated.archivedAt);
    await this.safeBroadcast(
      conversationId,
      {
        type: "chat.session",
        conversationId,
        action: archivedNow ? "archived" : "updated",
        actorId,
        conversation: view,
      },
      { audience: "members" },
    );
    return view;
  }

  async listMembers(userId: string, conversationId: string): Promise<ChatMember[]> {
    await this.requireMember(conversationId, userId);
    const members = await this.store.listMembers(conversationId);
    return members.map(toChatMember);
  }

  async addMembers(actorId: string, conversationId: string, userIds: string[]): Promise<ChatMember[]> {
    const { conversation, member } = await this.requireMember(conversationId, actorId);
    this.assertMutableGroup(conversation);
    if (member.role !== "owner") {
      throw new AuthorizationError("Only the conversation owner can add members.");
    }
    const candidates = uniqueIds(userIds);
    if (!candidates.length) {
      throw new ValidationError("Provide at least one user to add.");
    }
    const current = await this.store.listMembers(conversationId);
    if (current.length + candidates.length > MAX_GROUP_MEMBERS) {
      throw new ValidationError(`A group can have at most ${MAX_GROUP_MEMBERS} members.`);
    }
    const added = await this.store.addMembers(
      conversationId,
      candidates.map((userId) => ({ userId, role: "member" as const })),
    );
    if (!added.length) return [];
    const addedIds = added.map((record) => record.userId);
    this.broadcaster.membershipChanged(conversationId, { added: addedIds });
    await this.safeBroadcast(
      conversationId,
      {
        type: "chat.session",
        conversationId,
        action: "members.added",
        actorId,
        userIds: addedIds,
        conversation: await this.describe(conversation),
      },
      { audience: "members" },
    );
    return added.map(toChatMember);
  }

  async removeMember(actorId: string, conversationId: string, targetId: string): Promise<boolean> {
    const { conversation, member } = await this.requireMember(conversationId, actorId);
    this.assertMutableGroup(conversation);
    if (actorId === targetId) {
      if (member.role === "owner") {
        throw new ConflictError("The owner cannot leave the conversation.", "owner_cannot_leave");
      }
    } else if (member.role !== "owner") {
      throw new AuthorizationError("Only the conversation owner can remove members.");
    }
    const target = await this.store.getMember(conversationId, targetId);
    if (!target) {
      throw new NotFoundError("User is not a member of this conversation.", "member_not_found");
    }
    const removed = await this.store.removeMember(conversationId, targetId);
    if (!removed) return false;
    this.presence.setTyping(conversationId, targetId, false);
    this.broadcaster.membershipChanged(conversationId, { removed: [targetId] });
    await this.safeBroadcast(
      conversationId,
      {
        type: "chat.session",
        conversationId,
        action: "members.removed",
        actorId,
        userIds: [targetId],
        conversation: await this.describe(conversation),
      },
      { audience: "members", extraUserIds: [targetId] },
    );
    return true;
  }

  // Messages ----------------------------------------------------------------

  async sendMessage(
    actorId: string,
    params: SendMessageParams,
  ): Promise<{ message: ChatMessage; created: boolean }> {
    const body = sanitizeBody(params.body ?? "");
    const attachments = sanitizeAttachments(params.attachments);
    if (!body && !attachments.length) {
      throw new ValidationError("A message needs text or at least one attachment.");
    }
    const { conversation } = await this.requireMember(params.conversationId, actorId);
    if (conversation.archivedAt) {
      throw new ConflictError("This conversation is archived.", "conversation_archived");
    }
    const { message, created, delivery } = await this.ordering.run(conversation.id, async () => {
      const result = await this.store.createMessage({
        conversationId: conversation.id,
        senderId: actorId,
        body: body || null,
        attachments,
        parentId: params.parentId ?? null,
        clientMessageId: params.clientMessageId?.trim() || null,
      });
      if (!result.created) {
        return { ...result, delivery: null };
      }
      const view = toChatMessage(result.message);
      return {
        ...result,
        delivery: this.safeBroadcast(conversation.id, {
          type: "chat.message",
          conversationId: conversation.id,
          message: view,
        }),
      };
    });
    if (created) {
      this.presence.setTyping(conversation.id, actorId, false);
      await this.store
        .advanceReadMarker({ conversationId: conversation.id, userId: actorId, messageId: message.id })
        .catch((error: unknown) => {
          console.warn("chat.service.sender_read_failed", {
            conversationId: conversation.id,
            messageId: message.id,
            error: error instanceof Error ? error.message : String(error),
          });
        });
    }
    await delivery;
    if (created) {
      await this.pushUnreadToMembers(conversation.id, actorId);
    }
    const [view] = await this.hydrate([message]);
    return { message: view ?? toChatMessage(message), created };
  }

  async listMessages(
    userId: string,
    conversationId: string,
    options: { limit?: number; before?: string | null; after?: string | null } = {},
  ): Promise<MessageListResult> {
    await this.requireMember(conversationId, userId);
    const before = decodeCursor(options.before);
    const after = decodeCursor(options.after);
    if (before && after) {
      throw new ValidationError("Use either before or after, not both.");
    }
    const limit = clampLimit(options.limit, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
    const page = await this.store.listMessages(conversationId, { limit, before, after });
    const messages = await this.hydrate(page.messages);
    const oldest = page.messages[page.messages.length - 1];
    return {
      messages,
      hasMore: page.hasMore,
      nextCursor:
        page.hasMore && !after && oldest
          ? encodeCursor({ createdAt: oldest.createdAt, id: oldest.id })
          : null,
    };
  }

  async editMessage(actorId: string, messageId: number, rawBody: string): Promise<ChatMessage> {
    const { message, conversation } = await this.requireMessageAuthority(messageId, actorId);
    if (message.deletedAt) {
      throw new ConflictError("Deleted messages cannot be edited.", "message_deleted");
    }
    const body = sanitizeBody(rawBody);
    if (!body && !message.attachments.length) {
      throw new ValidationError("A message needs text or at least one attachment.");
    }
    const { view, delivery } = await this.ordering.run(conversation.id, async () => {
      const edited = await this.store.editMessage(messageId, body || null);
      const [hydrated] = await this.hydrate([edited]);
      const current = hydrated ?? toChatMessage(edited);
      return {
        view: current,
        delivery: this.safeBroadcast(conversation.id, {
          type: "chat.message.update",
          conversationId: conversation.id,
          message: current,
        }),
      };
    });
    await delivery;
    return view;
  }

  async deleteMessage(
    actorId: string,
    messageId: number,
  ): Promise<{ message: ChatMessage; applied: boolean }> {
    const { conversation } = await this.requireMessageAuthority(messageId, actorId);
    const { message, deleted, delivery } = await this.ordering.run(conversation.id, async () => {
      const result = await this.store.softDeleteMessage(messageId);
      if (!result.deleted) return { ...result, delivery: null };
      return {
        ...result,
        delivery: this.safeBroadcast(conversation.id, {
          type: "chat.message.delete",
          conversationId: conversation.id,
          messageId,
          deletedAt: result.message.deletedAt ?? new Date().toISOString(),
          deletedBy: actorId,
        }),
      };
    });
    await delivery;
    if (deleted) {
      await this.pushUnreadToMembers(conversation.id);
    }
    return { message: toChatMessage(message), applied: deleted };
  }

  // Read markers --------------------------------------------------------------

  async markRead(
    userId: string,
    messageId: number,
    conversationId?: string | null,
  ): Promise<ReadResult> {
    const message = await this.store.getMessage(messageId);
    if (conversationId && message.conversationId !== conversationId) {
      throw new ValidationError("Message does not belong to this conversation.");
    }
    await this.requireMember(message.conversationId, userId);
    return this.advance(userId, message);
  }

  async markAllRead(userId: string, conversationId: string): Promise<ReadResult> {
    await this.requireMember(conversationId, userId);
    const latest = await this.store.latestMessage(conversationId);
    if (!latest) {
      return { conversationId, marker: null, applied: false };
    }
    return this.advance(userId, latest);
  }

  async unreadCounts(userId: string): Promise<Record<string, number>> {
    const conversations = await this.store.listConversationIdsForUser(userId);
    return this.unreadCountsFor(userId, conversations);
  }

  // Reactions ------------------------------------------------------------------

  async addReaction(userId: string, messageId: number, rawEmoji: string): Promise<boolean> {
    return this.mutateReaction(userId, messageId, rawEmoji, "added");
  }

  async removeReaction(userId: string, messageId: number, rawEmoji: string): Promise<boolean> {
    return this.mutateReaction(userId, messageId, rawEmoji, "removed");
  }

  // Ephemeral signals -------------------------------------------------------

  async setTyping(userId: string, conversationId: string, isTyping: boolean): Promise<boolean> {
    await this.requireMember(conversationId, userId);
    return this.presence.setTyping(conversationId, userId, isTyping);
  }

  /** Clears every typing state of `userId` once none of their connections is left. */
  releaseTyping(userId: string): void {
    if (this.registry.connectionCount(userId) > 0) return;
    for (const conversationId of this.presence.userStatus(userId).typingIn) {
      this.presence.setTyping(conversationId, userId, false);
    }
  }

  async subscribe(
    connectionId: string,
    userId: string,
    conversationId: string,
  ): Promise<ChatPresenceEntry[]> {
    await this.requireMember(conversationId, userId);
    this.registry.subscribe(connectionId, conversationId);
    return this.presence.snapshot(conversationId);
  }

  unsubscribe(connectionId: string, conversationId: string): boolean {
    return this.registry.unsubscribe(connectionId, conversationId);
  }

  // Internals -------------------------------------------------------------------

  private async openConversation(
    actorId: string,
    kind: "direct" | "group",
    others: string[],
    title: string | null,
  ): Promise<{ conversation: ChatConversation; created: boolean }> {
    const { conversation, members } = await this.store.createConversation({
      kind,
      title,
      createdBy: actorId,
      memberIds: others,
    });
    const view = toChatConversation(conversation, members);
    const memberIds = members.map((member) => member.userId);
    this.broadcaster.membershipChanged(conversation.id, { added: memberIds });
    await this.safeBroadcast(
      conversation.id,
      {
        type: "chat.session",
        conversationId: conversation.id,
        action: "created",
        actorId,
        userIds: memberIds,
        conversation: view,
      },
      { audience: "members" },
    );
    return { conversation: view, created: true };
  }

  private async requireMember(conversationId: string, userId: string): Promise<Membership> {
    const conversation = await this.store.getConversation(conversationId);
    const member = await this.store.getMember(conversationId, userId);
    if (!member) {
      throw new AuthorizationError("You are not a member of this conversation.", "not_a_member");
    }
    return { conversation, member };
  }

  private async requireMessageAuthority(
    messageId: number,
    actorId: string,
  ): Promise<Membership & { message: MessageRecord }> {
    const message = await this.store.getMessage(messageId);
    const membership = await this.requireMember(message.conversationId, actorId);
    if (membership.conversation.archivedAt) {
      throw new ConflictError("This conversation is archived.", "conversation_archived");
    }
    const isSender = message.senderId === actorId;
    const isOwner = membership.conversation.kind === "group" && membership.member.role === "owner";
    if (!isSender && !isOwner) {
      throw new AuthorizationError("Only the sender or the conversation owner can change this message.");
    }
    return { ...membership, message };
  }

  private assertMutableGroup(conversation: ConversationRecord): void {
    if (conversation.kind === "direct") {
      throw new ConflictError("Direct conversation membership is fixed.", "direct_immutable");
    }
    if (conversation.archivedAt) {
      throw new ConflictError("This conversation is archived.", "conversation_archived");
    }
  }

  private async advance(userId: string, message: MessageRecord): Promise<ReadResult> {
    const { marker, advanced } = await this.store.advanceReadMarker({
      conversationId: message.conversationId,
      userId,
      messageId: message.id,
    });
    if (advanced) {
      await this.safeBroadcast(message.conversationId, {
        type: "chat.read",
        conversationId: message.conversationId,
        userId,
        messageId: marker.messageId,
        readAt: marker.readAt,
      });
      await this.pushUnread(message.conversationId, [userId]);
    }
    return { conversationId: message.conversationId, marker, applied: advanced };
  }

  private async mutateReaction(
    userId: string,
    messageId: number,
    rawEmoji: string,
    action: "added" | "removed",
  ): Promise<boolean> {
    const emoji = sanitizeReactionEmoji(rawEmoji);
    if (!emoji) {
      throw new ValidationError("Reactions must be an emoji or a :shortcode:.");
    }
    const message = await this.store.getMessage(messageId);
    await this.requireMember(message.conversationId, userId);
    if (message.deletedAt) {
      throw new ConflictError("Deleted messages cannot be reacted to.", "message_deleted");
    }
    const conversationId = message.conversationId;
    const { changed, delivery } = await this.ordering.run(conversationId, async () => {
      const key = { messageId, userId, emoji };
      const mutated =
        action === "added"
          ? (await this.store.addReaction(key)).added
          : await this.store.removeReaction(key);
      if (!mutated) return { changed: false, delivery: null };
      const summaries = buildReactionSummaries(await this.store.listReactions([messageId]));
      return {
        changed: true,
        delivery: this.safeBroadcast(conversationId, {
          type: "chat.reaction",
          conversationId,
          messageId,
          emoji,
          action,
          userId,
          reactions: summaries.get(messageId) ?? [],
        }),
      };
    });
    await delivery;
    return changed;
  }

  private async hydrate(messages: MessageRecord[]): Promise<ChatMessage[]> {
    if (!messages.length) return [];
    const summaries = buildReactionSummaries(
      await this.store.listReactions(messages.map((message) => message.id)),
    );
    return messages.map((message) => toChatMessage(message, summaries.get(message.id) ?? []));
  }

  private async describe(conversation: ConversationRecord): Promise<ChatConversation> {
    return toChatConversation(conversation, await this.store.listMembers(conversation.id));
  }

  private async unreadCountsFor(
    userId: string,
    conversationIds: string[],
  ): Promise<Record<string, number>> {
    const counts = await Promise.all(
      conversationIds.map(
        async (conversationId) =>
          [conversationId, await this.store.countUnread(conversationId, userId)] as const,
      ),
    );
    return Object.fromEntries(counts);
  }

  private async pushUnreadToMembers(conversationId: string, exceptUserId?: string): Promise<void> {
    try {
      const members = await this.store.listMembers(conversationId);
      await this.pushUnread(
        conversationId,
        members.map((member) => member.userId).filter((userId) => userId !== exceptUserId),
      );
    } catch (error) {
      console.warn("chat.service.unread_push_failed", {
        conversationId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /** Sends fresh per-conversation unread counts to the connected users among `userIds`. */
  private async pushUnread(conversationId: string, userIds: string[]): Promise<void> {
    const connected = userIds.filter((userId) => this.registry.connectionCount(userId) > 0);
    await Promise.all(
      connected.map(async (userId) => {
        try {
          const count = await this.store.countUnread(conversationId, userId);
          await this.broadcaster.notifyUsers([userId], {
            type: "chat.unread",
            conversationId,
            count,
          });
        } catch (error) {
          console.warn("chat.service.unread_push_failed", {
            conversationId,
            userId,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }),
    );
  }

  /** Live delivery never fails the mutation that produced it. */
  private async safeBroadcast(
    conversationId: string,
    event: ChatServerEvent,
    options?: BroadcastOptions,
  ): Promise<void> {
    try {
      await this.broadcaster.broadcast(conversationId, event, options);
    } catch (error) {
      console.error("chat.service.broadcast_failed", {
        conversationId,
        event: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
