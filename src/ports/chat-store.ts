export type ConversationKind = "direct" | "group";

export type MemberRole = "owner" | "member";

export type ConversationRecord = {
  id: string;
  kind: ConversationKind;
  title: string | null;
  createdBy: string;
  createdAt: string;
  lastActivityAt: string;
  archivedAt: string | null;
};

export type ConversationMemberRecord = {
  conversationId: string;
  userId: string;
  role: MemberRole;
  joinedAt: string;
  lastReadMessageId: number | null;
  lastReadMessageAt: string | null;
  lastReadAt: string | null;
};

export type AttachmentRecord = {
  reference: string;
  contentType: string;
  size: number;
  name: string | null;
};

export type MessageRecord = {
  id: number;
  conversationId: string;
  senderId: string;
  body: string | null;
  attachments: AttachmentRecord[];
  parentId: number | null;
  clientMessageId: string | null;
  createdAt: string;
  editedAt: string | null;
  deletedAt: string | null;
};

export type ReactionRecord = {
  messageId: number;
  userId: string;
  emoji: string;
  createdAt: string;
};

/** Ordering key of a message: `(createdAt, id)`. */
export type MessageCursor = {
  createdAt: string;
  id: number;
};

export type MessagePage = {
  messages: MessageRecord[];
  hasMore: boolean;
};

export type ReadMarkerRecord = {
  conversationId: string;
  userId: string;
  messageId: number;
  messageCreatedAt: string;
  readAt: string;
};

export type CreateConversationInput = {
  kind: ConversationKind;
  title: string | null;
  createdBy: string;
  memberIds: string[];
};

export type CreateMessageInput = {
  conversationId: string;
  senderId: string;
  body: string | null;
  attachments: AttachmentRecord[];
  parentId: number | null;
  clientMessageId: string | null;
};

export type ReactionKey = {
  messageId: number;
  userId: string;
  emoji: string;
};

/**
 * Durable chat state. Every operation is its own transaction; failures surface as
 * NotFoundError, ConflictError or AuthorizationError from `@/server/chat/types`.
 */
export interface ChatStore {
  createConversation(
    input: CreateConversationInput,
  ): Promise<{ conversation: ConversationRecord; members: ConversationMemberRecord[] }>;
  findDirectConversation(userA: string, userB: string): Promise<ConversationRecord | null>;
  getConversation(conversationId: string): Promise<ConversationRecord>;
  listConversationsForUser(
    userId: string,
    options: { limit: number; offset: number },
  ): Promise<{ conversations: ConversationRecord[]; total: number }>;
  listConversationIdsForUser(userId: string): Promise<string[]>;
  updateConversation(
    conversationId: string,
    patch: { title?: string | null; archived?: boolean },
  ): Promise<ConversationRecord>;

  addMembers(
    conversationId: string,
    members: Array<{ userId: string; role: MemberRole }>,
  ): Promise<ConversationMemberRecord[]>;
  removeMember(conversationId: string, userId: string): Promise<boolean>;
  listMembers(conversationId: string): Promise<ConversationMemberRecord[]>;
  getMember(conversationId: string, userId: string): Promise<ConversationMemberRecord | null>;

  createMessage(input: CreateMessageInput): Promise<{ message: MessageRecord; created: boolean }>;
  getMessage(messageId: number): Promise<MessageRecord>;
  editMessage(messageId: number, body: string | null): Promise<MessageRecord>;
  softDeleteMessage(messageId: number): Promise<{ message: MessageRecord; deleted: boolean }>;
  listMessages(
    conversationId: string,
    options: { limit: number; before?: MessageCursor | null; after?: MessageCursor | null },
  ): Promise<MessagePage>;
  latestMessage(conversationId: string): Promise<MessageRecord | null>;

  /** Moves the marker only when `messageId` is ahead of the stored one by ordering key. */
  advanceReadMarker(params: {
    conversationId: string;
    userId: string;
    messageId: number;
  }): Promise<{ marker: ReadMarkerRecord; advanced: boolean }>;
  countUnread(conversationId: string, userId: string): Promise<number>;

  addReaction(key: ReactionKey): Promise<{ reaction: ReactionRecord; added: boolean }>;
  removeReaction(key: ReactionKey): Promise<boolean>;
  listReactions(messageIds: number[]): Promise<ReactionRecord[]>;
}
