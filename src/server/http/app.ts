import { Hono } from "hono";

import type { ChatRuntime } from "@/server/realtime/runtime";
import { errorToResponse, returnError } from "@/server/validation/http";

import { requireBearerAuth, type ChatHttpEnv } from "./auth";
import { createChatRoutes } from "./chat-routes";
import { createStatusRoutes } from "./status-routes";

export type HttpRuntime = Pick<ChatRuntime, "resolver" | "service" | "registry" | "presence">;

export function createHttpApp(runtime: HttpRuntime): Hono<ChatHttpEnv> {
  const app = new Hono<ChatHttpEnv>();
  const auth = requireBearerAuth(runtime.resolver);

  const chat = new Hono<ChatHttpEnv>();
  chat.get("/health", (c) =>
    c.json({
      status: "ok",
      connections: runtime.registry.stats().connections,
      timestamp: new Date().toISOString(),
    }),
  );
  chat.use("*", auth);
  chat.route("/", createChatRoutes(runtime.service));

  const status = new Hono<ChatHttpEnv>();
  status.use("*", auth);
  status.route("/", createStatusRoutes(runtime));

  app.route("/chat", chat);
  app.route("/ws", status);

  app.notFound(() => returnError(404, "not_found", "Route not found."));
  app.onError((error) => errorToResponse(error, "chat.http.unhandled"));

  return app;
}
