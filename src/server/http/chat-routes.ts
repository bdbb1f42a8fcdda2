import { Hono } from "hono";
import { z } from "zod";

import {
  chatConversationSchema,
  chatMemberSchema,
  chatMessageSchema,
} from "@/lib/chat/events";
import type { ChatService } from "@/server/chat/service";
import { ValidationError } from "@/server/chat/types";
import { parseJsonBody, parseQuery, validatedJson } from "@/server/validation/http";
import {
  addMembersRequestSchema,
  conversationIdParamSchema,
  createConversationRequestSchema,
  editMessageRequestSchema,
  listConversationsQuerySchema,
  listMessagesQuerySchema,
  messageIdParamSchema,
  reactionRequestSchema,
  readRequestSchema,
  sendMessageRequestSchema,
  updateConversationRequestSchema,
} from "@/server/validation/schemas/chat";

import type { ChatHttpEnv } from "./auth";

const conversationSummarySchema = chatConversationSchema.extend({
  lastMessage: chatMessageSchema.nullable(),
  unreadCount: z.number().int().min(0),
});

const conversationResponseSchema = z.object({
  success: z.literal(true),
  conversation: chatConversationSchema,
});

const createConversationResponseSchema = conversationResponseSchema.extend({
  created: z.boolean(),
});

const conversationListResponseSchema = z.object({
  success: z.literal(true),
  conversations: z.array(conversationSummarySchema),
  total: z.number().int().min(0),
});

const membersResponseSchema = z.object({
  success: z.literal(true),
  conversationId: z.string(),
  members: z.array(chatMemberSchema),
});

const removeMemberResponseSchema = z.object({
  success: z.literal(true),
  conversationId: z.string(),
  userId: z.string(),
  removed: z.boolean(),
});

const messageResponseSchema = z.object({
  success: z.literal(true),
  message: chatMessageSchema,
});

const sendMessageResponseSchema = messageResponseSchema.extend({
  created: z.boolean(),
});

const deleteMessageResponseSchema = messageResponseSchema.extend({
  applied: z.boolean(),
});

const historyResponseSchema = z.object({
  success: z.literal(true),
  conversationId: z.string(),
  messages: z.array(chatMessageSchema),
  hasMore: z.boolean(),
  nextCursor: z.string().nullable(),
});

const readResponseSchema = z.object({
  success: z.literal(true),
  conversationId: z.string(),
  messageId: z.number().int().nullable(),
  readAt: z.string().nullable(),
  applied: z.boolean(),
});

const unreadResponseSchema = z.object({
  success: z.literal(true),
  unread: z.record(z.string(), z.number().int().min(0)),
  total: z.number().int().min(0),
});

const reactionResponseSchema = z.object({
  success: z.literal(true),
  messageId: z.number().int(),
  emoji: z.string(),
  changed: z.boolean(),
});

function conversationIdFrom(raw: string): string {
  const parsed = conversationIdParamSchema.safeParse(raw.trim());
  if (!parsed.success) {
    throw new ValidationError("Conversation id must be a UUID.");
  }
  return parsed.data;
}

function messageIdFrom(raw: string): number {
  const parsed = messageIdParamSchema.safeParse(raw.trim());
  if (!parsed.success) {
    throw new ValidationError("Message id must be a positive integer.");
  }
  return parsed.data;
}

/** REST surface over ChatService, mounted under `/chat` behind bearer auth. */
export function createChatRoutes(service: ChatService): Hono<ChatHttpEnv> {
  const routes = new Hono<ChatHttpEnv>();

  routes.post("/conversations", async (c) => {
    const parsed = await parseJsonBody(c.req.raw, createConversationRequestSchema);
    if (!parsed.success) return parsed.response;
    const { conversation, created } = await service.createConversation(c.get("userId"), parsed.data);
    return validatedJson(
      createConversationResponseSchema,
      { success: true, conversation, created },
      { status: created ? 201 : 200 },
    );
  });

  routes.get("/conversations", async (c) => {
    const query = parseQuery(c.req.url, listConversationsQuerySchema);
    if (!query.success) return query.response;
    const { conversations, total } = await service.listConversations(c.get("userId"), query.data);
    return validatedJson(conversationListResponseSchema, { success: true, conversations, total });
  });

  routes.get("/conversations/:id", async (c) => {
    const conversation = await service.getConversation(
      c.get("userId"),
      conversationIdFrom(c.req.param("id")),
    );
    return validatedJson(conversationResponseSchema, { success: true, conversation });
  });

  routes.put("/conversations/:id", async (c) => {
    const conversationId = conversationIdFrom(c.req.param("id"));
    const parsed = await parseJsonBody(c.req.raw, updateConversationRequestSchema);
    if (!parsed.success) return parsed.response;
    const conversation = await service.updateConversation(c.get("userId"), conversationId, parsed.data);
    return validatedJson(conversationResponseSchema, { success: true, conversation });
  });

  routes.get("/conversations/:id/members", async (c) => {
    const conversationId = conversationIdFrom(c.req.param("id"));
    const members = await service.listMembers(c.get("userId"), conversationId);
    return validatedJson(membersResponseSchema, { success: true, conversationId, members });
  });

  routes.post("/conversations/:id/members", async (c) => {
    const conversationId = conversationIdFrom(c.req.param("id"));
    const parsed = await parseJsonBody(c.req.raw, addMembersRequestSchema);
    if (!parsed.success) return parsed.response;
    const members = await service.addMembers(c.get("userId"), conversationId, parsed.data.userIds);
    return validatedJson(membersResponseSchema, { success: true, conversationId, members });
  });

  routes.delete("/conversations/:id/members/:userId", async (c) => {
    const conversationId = conversationIdFrom(c.req.param("id"));
    const userId = c.req.param("userId").trim();
    const removed = await service.removeMember(c.get("userId"), conversationId, userId);
    return validatedJson(removeMemberResponseSchema, {
      success: true,
      conversationId,
      userId,
      removed,
    });
  });

  routes.post("/conversations/:id/messages", async (c) => {
    const conversationId = conversationIdFrom(c.req.param("id"));
    const parsed = await parseJsonBody(c.req.raw, sendMessageRequestSchema);
    if (!parsed.success) return parsed.response;
    const { message, created } = await service.sendMessage(c.get("userId"), {
      conversationId,
      ...parsed.data,
    });
    return validatedJson(
      sendMessageResponseSchema,
      { success: true, message, created },
      { status: created ? 201 : 200 },
    );
  });

  routes.get("/conversations/:id/messages", async (c) => {
    const conversationId = conversationIdFrom(c.req.param("id"));
    const query = parseQuery(c.req.url, listMessagesQuerySchema);
    if (!query.success) return query.response;
    const page = await service.listMessages(c.get("userId"), conversationId, query.data);
    return validatedJson(historyResponseSchema, { success: true, conversationId, ...page });
  });

  routes.post("/conversations/:id/read-all", async (c) => {
    const conversationId = conversationIdFrom(c.req.param("id"));
    const result = await service.markAllRead(c.get("userId"), conversationId);
    return validatedJson(readResponseSchema, {
      success: true,
      conversationId: result.conversationId,
      messageId: result.marker?.messageId ?? null,
      readAt: result.marker?.readAt ?? null,
      applied: result.applied,
    });
  });

  routes.put("/messages/:messageId", async (c) => {
    const messageId = messageIdFrom(c.req.param("messageId"));
    const parsed = await parseJsonBody(c.req.raw, editMessageRequestSchema);
    if (!parsed.success) return parsed.response;
    const message = await service.editMessage(c.get("userId"), messageId, parsed.data.body);
    return validatedJson(messageResponseSchema, { success: true, message });
  });

  routes.delete("/messages/:messageId", async (c) => {
    const messageId = messageIdFrom(c.req.param("messageId"));
    const { message, applied } = await service.deleteMessage(c.get("userId"), messageId);
    return validatedJson(deleteMessageResponseSchema, { success: true, message, applied });
  });

  routes.post("/messages/:messageId/read", async (c) => {
    const messageId = messageIdFrom(c.req.param("messageId"));
    const parsed = await parseJsonBody(c.req.raw, readRequestSchema);
    if (!parsed.success) return parsed.response;
    const result = await service.markRead(c.get("userId"), messageId, parsed.data?.conversationId);
    return validatedJson(readResponseSchema, {
      success: true,
      conversationId: result.conversationId,
      messageId: result.marker?.messageId ?? null,
      readAt: result.marker?.readAt ?? null,
      applied: result.applied,
    });
  });

  routes.post("/messages/:messageId/reactions", async (c) => {
    const messageId = messageIdFrom(c.req.param("messageId"));
    const parsed = await parseJsonBody(c.req.raw, reactionRequestSchema);
    if (!parsed.success) return parsed.response;
    const changed = await service.addReaction(c.get("userId"), messageId, parsed.data.emoji);
    return validatedJson(reactionResponseSchema, {
      success: true,
      messageId,
      emoji: parsed.data.emoji,
      changed,
    });
  });

  routes.delete("/messages/:messageId/reactions/:emoji", async (c) => {
    const messageId = messageIdFrom(c.req.param("messageId"));
    const emoji = c.req.param("emoji");
    const changed = await service.removeReaction(c.get("userId"), messageId, emoji);
    return validatedJson(reactionResponseSchema, { success: true, messageId, emoji, changed });
  });

  routes.get("/unread", async (c) => {
    const unread = await service.unreadCounts(c.get("userId"));
    const total = Object.values(unread).reduce((sum, count) => sum + count, 0);
    return validatedJson(unreadResponseSchema, { success: true, unread, total });
  });

  return routes;
}
