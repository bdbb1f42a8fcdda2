import { Hono } from "hono";
import { z } from "zod";

import type { ChatRuntime } from "@/server/realtime/runtime";
import { ValidationError } from "@/server/chat/types";
import { validatedJson } from "@/server/validation/http";
import { conversationIdParamSchema } from "@/server/validation/schemas/chat";

import type { ChatHttpEnv } from "./auth";

const gatewayStatusSchema = z.object({
  connections: z.number().int().min(0),
  onlineUsers: z.number().int().min(0),
  activeConversations: z.number().int().min(0),
  timestamp: z.string(),
});

const userStatusSchema = z.object({
  userId: z.string(),
  online: z.boolean(),
  connectionCount: z.number().int().min(0),
  typingIn: z.array(z.string()),
  conversations: z.array(z.string()),
  timestamp: z.string(),
});

const conversationOnlineSchema = z.object({
  conversationId: z.string(),
  online: z.array(z.string()),
  typing: z.array(z.string()),
  timestamp: z.string(),
});

/** Read-only views over the registry and presence tracker, mounted under `/ws`. */
export function createStatusRoutes(
  runtime: Pick<ChatRuntime, "registry" | "presence" | "service">,
): Hono<ChatHttpEnv> {
  const { registry, presence, service } = runtime;
  const routes = new Hono<ChatHttpEnv>();

  routes.get("/status", (c) => {
    const stats = registry.stats();
    return validatedJson(gatewayStatusSchema, {
      connections: stats.connections,
      onlineUsers: registry.onlineUserIds().length,
      activeConversations: stats.activeConversations,
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/users/:userId/status", (c) => {
    const status = presence.userStatus(c.req.param("userId").trim());
    return validatedJson(userStatusSchema, { ...status, timestamp: new Date().toISOString() });
  });

  routes.get("/conversations/:conversationId/online", async (c) => {
    const parsed = conversationIdParamSchema.safeParse(c.req.param("conversationId").trim());
    if (!parsed.success) {
      throw new ValidationError("Conversation id must be a UUID.");
    }
    const conversationId = parsed.data;
    await service.getConversation(c.get("userId"), conversationId);
    const online = registry
      .subscribersOf(conversationId)
      .filter((userId) => registry.isOnline(userId))
      .sort();
    return validatedJson(conversationOnlineSchema, {
      conversationId,
      online,
      typing: presence.typingIn(conversationId),
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
