import type { CredentialResolver } from "@/ports/auth";
import type { ChatStore } from "@/ports/chat-store";
import { ChatService } from "@/server/chat/service";

import { ConnectionRegistry } from "./connection-registry";
import { ConversationRouter } from "./conversation-router";
import { ChatGateway, type ChatGatewayOptions } from "./gateway";
import { PresenceTracker } from "./presence-tracker";

export type ChatRuntimeConfig = ChatGatewayOptions & {
  offlineGraceMs: number;
  typingTtlMs: number;
  membersCacheTtlMs: number;
};

export type ChatRuntime = {
  store: ChatStore;
  resolver: CredentialResolver;
  registry: ConnectionRegistry;
  presence: PresenceTracker;
  router: ConversationRouter;
  service: ChatService;
  gateway: ChatGateway;
  dispose(): Promise<void>;
};

function logRelayFailure(scope: string, context: Record<string, unknown>) {
  return (error: unknown) => {
    console.warn(scope, {
      ...context,
      error: error instanceof Error ? error.message : String(error),
    });
  };
}

/** Wires the registry, presence, router, service and gateway around one store. */
export function createChatRuntime(params: {
  store: ChatStore;
  resolver: CredentialResolver;
  config: ChatRuntimeConfig;
}): ChatRuntime {
  const { store, resolver, config } = params;
  const registry = new ConnectionRegistry({ offlineGraceMs: config.offlineGraceMs });
  const router = new ConversationRouter({
    registry,
    store,
    membersCacheTtlMs: config.membersCacheTtlMs,
  });
  const presence = new PresenceTracker({
    registry,
    typingTtlMs: config.typingTtlMs,
    membersOf: (conversationId) => router.membersOf(conversationId),
  });
  const service = new ChatService({ store, broadcaster: router, registry, presence });
  const gateway = new ChatGateway({ registry, service, resolver, options: config });

  const detachTyping = presence.onTypingChange((transition) => {
    void router
      .broadcast(transition.conversationId, {
        type: "chat.typing",
        conversationId: transition.conversationId,
        userId: transition.userId,
        isTyping: transition.isTyping,
      })
      .catch(logRelayFailure("chat.runtime.typing_relay_failed", { ...transition }));
  });

  const detachPresence = presence.onPresenceChange((transition) => {
    void store
      .listConversationIdsForUser(transition.userId)
      .then((conversationIds) =>
        router.broadcastPresence(transition.userId, transition.status, conversationIds, transition.at),
      )
      .catch(logRelayFailure("chat.runtime.presence_relay_failed", { ...transition }));
  });

  return {
    store,
    resolver,
    registry,
    presence,
    router,
    service,
    gateway,
    async dispose() {
      detachTyping();
      detachPresence();
      await gateway.close();
      presence.dispose();
      registry.dispose();
    },
  };
}
