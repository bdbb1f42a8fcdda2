import { z } from "zod";

export const chatConversationKindSchema = z.enum(["direct", "group"]);
export const chatMemberRoleSchema = z.enum(["owner", "member"]);

export const chatAttachmentSchema = z.object({
  reference: z.string(),
  contentType: z.string(),
  size: z.number().int().nonnegative(),
  name: z.string().nullable(),
});

export const chatReactionSummarySchema = z.object({
  emoji: z.string(),
  count: z.number().int().nonnegative(),
  userIds: z.array(z.string()),
});

export const chatMessageSchema = z.object({
  id: z.number().int().positive(),
  conversationId: z.string(),
  senderId: z.string(),
  body: z.string().nullable(),
  attachments: z.array(chatAttachmentSchema),
  parentId: z.number().int().positive().nullable(),
  clientMessageId: z.string().nullable(),
  createdAt: z.string(),
  editedAt: z.string().nullable(),
  deletedAt: z.string().nullable(),
  reactions: z.array(chatReactionSummarySchema),
});

export const chatMemberSchema = z.object({
  userId: z.string(),
  role: chatMemberRoleSchema,
  joinedAt: z.string(),
  lastReadMessageId: z.number().int().positive().nullable(),
  lastReadAt: z.string().nullable(),
});

export const chatConversationSchema = z.object({
  id: z.string(),
  kind: chatConversationKindSchema,
  title: z.string().nullable(),
  createdBy: z.string(),
  createdAt: z.string(),
  lastActivityAt: z.string(),
  archivedAt: z.string().nullable(),
  members: z.array(chatMemberSchema),
});

export const chatPresenceEntrySchema = z.object({
  userId: z.string(),
  online: z.boolean(),
  typing: z.boolean(),
});

export const chatReadyEventSchema = z.object({
  type: z.literal("chat.ready"),
  connectionId: z.string(),
  userId: z.string(),
  conversations: z.array(z.string()),
  unread: z.record(z.number().int().nonnegative()),
  heartbeatIntervalMs: z.number().int().positive(),
});

export const chatMessageEventSchema = z.object({
  type: z.literal("chat.message"),
  conversationId: z.string(),
  message: chatMessageSchema,
});

export const chatMessageUpdatedEventSchema = z.object({
  type: z.literal("chat.message.update"),
  conversationId: z.string(),
  message: chatMessageSchema,
});

export const chatMessageDeletedEventSchema = z.object({
  type: z.literal("chat.message.delete"),
  conversationId: z.string(),
  messageId: z.number().int().positive(),
  deletedAt: z.string(),
  deletedBy: z.string(),
});

export const chatReadEventSchema = z.object({
  type: z.literal("chat.read"),
  conversationId: z.string(),
  userId: z.string(),
  messageId: z.number().int().positive(),
  readAt: z.string(),
});

export const chatReactionEventSchema = z.object({
  type: z.literal("chat.reaction"),
  conversationId: z.string(),
  messageId: z.number().int().positive(),
  emoji: z.string(),
  action: z.enum(["added", "removed"]),
  userId: z.string(),
  reactions: z.array(chatReactionSummarySchema),
});

export const chatUnreadEventSchema = z.object({
  type: z.literal("chat.unread"),
  conversationId: z.string(),
  count: z.number().int().min(0),
});

export const chatTypingEventSchema = z.object({
  type: z.literal("chat.typing"),
  conversationId: z.string(),
  userId: z.string(),
  isTyping: z.boolean(),
});

export const chatPresenceEventSchema = z.object({
  type: z.literal("chat.presence"),
  userId: z.string(),
  status: z.enum(["online", "offline"]),
  at: z.string(),
});

export const chatSessionActionSchema = z.enum([
  "created",
  "updated",
  "archived",
  "members.added",
  "members.removed",
]);

export const chatSessionEventSchema = z.object({
  type: z.literal("chat.session"),
  conversationId: z.string(),
  action: chatSessionActionSchema,
  actorId: z.string(),
  userIds: z.array(z.string()).optional(),
  conversation: chatConversationSchema,
});

export const chatAckEventSchema = z.object({
  type: z.literal("chat.ack"),
  requestId: z.string().nullable(),
  action: z.string(),
  applied: z.boolean(),
  message: chatMessageSchema.optional(),
  presence: z.array(chatPresenceEntrySchema).optional(),
});

export const chatPongEventSchema = z.object({
  type: z.literal("chat.pong"),
  requestId: z.string().nullable(),
  at: z.string(),
});

export const chatErrorEventSchema = z.object({
  type: z.literal("chat.error"),
  requestId: z.string().nullable(),
  error: z.object({
    code: z.string(),
    message: z.string(),
  }),
});

export const chatServerEventSchema = z.discriminatedUnion("type", [
  chatReadyEventSchema,
  chatMessageEventSchema,
  chatMessageUpdatedEventSchema,
  chatMessageDeletedEventSchema,
  chatReadEventSchema,
  chatReactionEventSchema,
  chatUnreadEventSchema,
  chatTypingEventSchema,
  chatPresenceEventSchema,
  chatSessionEventSchema,
  chatAckEventSchema,
  chatPongEventSchema,
  chatErrorEventSchema,
]);

export type ChatConversationKind = z.infer<typeof chatConversationKindSchema>;
export type ChatAttachment = z.infer<typeof chatAttachmentSchema>;
export type ChatReactionSummary = z.infer<typeof chatReactionSummarySchema>;
export type ChatMessage = z.infer<typeof chatMessageSchema>;
export type ChatMember = z.infer<typeof chatMemberSchema>;
export type ChatConversation = z.infer<typeof chatConversationSchema>;
export type ChatPresenceEntry = z.infer<typeof chatPresenceEntrySchema>;
export type ChatSessionAction = z.infer<typeof chatSessionActionSchema>;
export type ChatReadyEventPayload = z.infer<typeof chatReadyEventSchema>;
export type ChatMessageEventPayload = z.infer<typeof chatMessageEventSchema>;
export type ChatMessageUpdatedEventPayload = z.infer<typeof chatMessageUpdatedEventSchema>;
export type ChatMessageDeletedEventPayload = z.infer<typeof chatMessageDeletedEventSchema>;
export type ChatReadEventPayload = z.infer<typeof chatReadEventSchema>;
export type ChatReactionEventPayload = z.infer<typeof chatReactionEventSchema>;
export type ChatUnreadEventPayload = z.infer<typeof chatUnreadEventSchema>;
export type ChatTypingEventPayload = z.infer<typeof chatTypingEventSchema>;
export type ChatPresenceEventPayload = z.infer<typeof chatPresenceEventSchema>;
export type ChatSessionEventPayload = z.infer<typeof chatSessionEventSchema>;
export type ChatAckEventPayload = z.infer<typeof chatAckEventSchema>;
export type ChatPongEventPayload = z.infer<typeof chatPongEventSchema>;
export type ChatErrorEventPayload = z.infer<typeof chatErrorEventSchema>;
export type ChatServerEvent = z.infer<typeof chatServerEventSchema>;
export type ChatServerEventType = ChatServerEvent["type"];
