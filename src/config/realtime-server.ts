import { getAuthServerVendor, getCredentialResolver } from "@/config/auth-server";
import { getChatStore, getChatStoreVendor } from "@/config/chat-store";
import { serverEnv, type ServerEnv } from "@/lib/env/server";
import { createChatRuntime, type ChatRuntime, type ChatRuntimeConfig } from "@/server/realtime/runtime";

let runtime: ChatRuntime | null = null;

export function chatRuntimeConfigFromEnv(env: ServerEnv = serverEnv): ChatRuntimeConfig {
  return {
    offlineGraceMs: env.CHAT_OFFLINE_GRACE_MS,
    typingTtlMs: env.CHAT_TYPING_TTL_MS,
    membersCacheTtlMs: env.CHAT_MEMBERS_CACHE_TTL_MS,
    idleTimeoutMs: env.CHAT_IDLE_TIMEOUT_MS,
    heartbeatIntervalMs: env.CHAT_HEARTBEAT_INTERVAL_MS,
    maxProtocolViolations: env.CHAT_MAX_PROTOCOL_VIOLATIONS,
    maxBufferedBytes: env.CHAT_MAX_BUFFERED_BYTES,
    maxFrameBytes: env.CHAT_MAX_FRAME_BYTES,
  };
}

export function getChatRuntime(): ChatRuntime {
  if (!runtime) {
    runtime = createChatRuntime({
      store: getChatStore(),
      resolver: getCredentialResolver(),
      config: chatRuntimeConfigFromEnv(),
    });
    console.info("chat.runtime.ready", {
      store: getChatStoreVendor(),
      auth: getAuthServerVendor(),
    });
  }
  return runtime;
}
