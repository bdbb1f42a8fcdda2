import { InMemoryChatStore } from "@/adapters/chat-store/memory/store";
import { serverEnv } from "@/lib/env/server";
import type { ChatStore } from "@/ports/chat-store";
import { createSupabaseChatStore } from "@/server/chat/repository";

let store: ChatStore | null = null;

function resolveChatStore(vendor: string): ChatStore {
  switch (vendor) {
    case "supabase":
    case "":
      return createSupabaseChatStore();
    case "memory":
      return new InMemoryChatStore();
    default:
      console.warn("chat.store.vendor_unknown", { vendor, fallback: "supabase" });
      return createSupabaseChatStore();
  }
}

export function getChatStore(): ChatStore {
  if (!store) {
    store = resolveChatStore(serverEnv.CHAT_STORE_VENDOR);
  }
  return store;
}

export function getChatStoreVendor(): string {
  return serverEnv.CHAT_STORE_VENDOR || "supabase";
}
