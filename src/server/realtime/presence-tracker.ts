import type { ChatPresenceEntry } from "@/lib/chat/events";
import { debugLog } from "@/lib/debug";

import type { ConnectionRegistry, PresenceListener } from "./connection-registry";

export type TypingTransition = {
  conversationId: string;
  userId: string;
  isTyping: boolean;
  expired: boolean;
};

export type TypingListener = (transition: TypingTransition) => void;

export type UserPresenceStatus = {
  userId: string;
  online: boolean;
  connectionCount: number;
  typingIn: string[];
  conversations: string[];
};

export type PresenceTrackerOptions = {
  registry: ConnectionRegistry;
  typingTtlMs: number;
  membersOf: (conversationId: string) => Promise<ReadonlySet<string>>;
};

export class PresenceTracker {
  private readonly registry: ConnectionRegistry;
  private readonly typingTtlMs: number;
  private readonly membersOf: PresenceTrackerOptions["membersOf"];
  private readonly typing = new Map<string, Map<string, ReturnType<typeof setTimeout>>>();
  private readonly listeners = new Set<TypingListener>();
  private readonly detachRegistry: () => void;

  constructor(options: PresenceTrackerOptions) {
    this.registry = options.registry;
    this.typingTtlMs = options.typingTtlMs;
    this.membersOf = options.membersOf;
    this.detachRegistry = this.registry.onPresenceChange((transition) => {
      if (transition.status === "offline") {
        this.clearUser(transition.userId);
      }
    });
  }

  /** Returns true when the typing state actually changed. */
  setTyping(conversationId: string, userId: string, isTyping: boolean): boolean {
    let typers = this.typing.get(conversationId);
    const existing = typers?.get(userId);
    if (!isTyping) {
      if (!existing || !typers) return false;
      clearTimeout(existing);
      this.forget(typers, conversationId, userId);
      this.emit({ conversationId, userId, isTyping: false, expired: false });
      return true;
    }
    if (existing) clearTimeout(existing);
    if (!typers) {
      typers = new Map();
      this.typing.set(conversationId, typers);
    }
    const owner = typers;
    const timer = setTimeout(() => {
      if (owner.get(userId) !== timer) return;
      this.forget(owner, conversationId, userId);
      this.emit({ conversationId, userId, isTyping: false, expired: true });
    }, this.typingTtlMs);
    timer.unref?.();
    typers.set(userId, timer);
    if (existing) return false;
    this.emit({ conversationId, userId, isTyping: true, expired: false });
    return true;
  }

  isTyping(conversationId: string, userId: string): boolean {
    return this.typing.get(conversationId)?.has(userId) ?? false;
  }

  typingIn(conversationId: string): string[] {
    const typers = this.typing.get(conversationId);
    return typers ? Array.from(typers.keys()).sort() : [];
  }

  async snapshot(conversationId: string): Promise<ChatPresenceEntry[]> {
    const members = await this.membersOf(conversationId);
    return Array.from(members)
      .sort()
      .map((userId) => ({
        userId,
        online: this.registry.isOnline(userId),
        typing: this.isTyping(conversationId, userId),
      }));
  }

  userStatus(userId: string): UserPresenceStatus {
    const typingIn: string[] = [];
    this.typing.forEach((typers, conversationId) => {
      if (typers.has(userId)) typingIn.push(conversationId);
    });
    return {
      userId,
      online: this.registry.isOnline(userId),
      connectionCount: this.registry.connectionCount(userId),
      typingIn: typingIn.sort(),
      conversations: this.registry.subscriptionsOfUser(userId).sort(),
    };
  }

  onTypingChange(listener: TypingListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  onPresenceChange(listener: PresenceListener): () => void {
    return this.registry.onPresenceChange(listener);
  }

  dispose(): void {
    this.detachRegistry();
    this.typing.forEach((typers) => typers.forEach((timer) => clearTimeout(timer)));
    this.typing.clear();
    this.listeners.clear();
  }

  private clearUser(userId: string): void {
    Array.from(this.typing.keys()).forEach((conversationId) => {
      this.setTyping(conversationId, userId, false);
    });
  }

  private forget(
    typers: Map<string, ReturnType<typeof setTimeout>>,
    conversationId: string,
    userId: string,
  ): void {
    typers.delete(userId);
    if (typers.size === 0 && this.typing.get(conversationId) === typers) {
      this.typing.delete(conversationId);
    }
  }

  private emit(transition: TypingTransition): void {
    debugLog("chat.presence", "typing", transition);
    this.listeners.forEach((listener) => {
      try {
        listener(transition);
      } catch (error) {
        console.error("chat.presence.listener_failed", {
          conversationId: transition.conversationId,
          userId: transition.userId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });
  }
}
