import { debugLog } from "@/lib/debug";
import type { ConnectionHandle } from "@/ports/realtime";
import { ConflictError } from "@/server/chat/types";

export type PresenceStatus = "online" | "offline";

export type PresenceTransition = {
  userId: string;
  status: PresenceStatus;
  at: string;
};

export type PresenceListener = (transition: PresenceTransition) => void;

export type ConnectionSnapshot = {
  id: string;
  userId: string;
  subscriptions: string[];
  connectedAt: string;
  lastSeenAt: string;
};

export type RegistryStats = {
  connections: number;
  users: number;
  activeConversations: number;
};

export type ConnectionRegistryOptions = {
  offlineGraceMs: number;
  now?: () => number;
};

type ConnectionEntry = {
  handle: ConnectionHandle;
  subscriptions: Set<string>;
  connectedAt: number;
  lastSeenAt: number;
};

/**
 * Live connections by id and by user, with their conversation subscriptions.
 * Going offline is debounced by `offlineGraceMs` so a quick reconnect never flaps.
 */
export class ConnectionRegistry {
  private readonly offlineGraceMs: number;
  private readonly now: () => number;
  private readonly connections = new Map<string, ConnectionEntry>();
  private readonly byUser = new Map<string, Set<string>>();
  private readonly byConversation = new Map<string, Set<string>>();
  private readonly offlineTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly listeners = new Set<PresenceListener>();

  constructor(options: ConnectionRegistryOptions) {
    this.offlineGraceMs = options.offlineGraceMs;
    this.now = options.now ?? Date.now;
  }

  register(handle: ConnectionHandle): void {
    if (this.connections.has(handle.id)) {
      throw new ConflictError(`Connection ${handle.id} is already registered.`, "connection_exists");
    }
    const at = this.now();
    this.connections.set(handle.id, {
      handle,
      subscriptions: new Set(),
      connectedAt: at,
      lastSeenAt: at,
    });
    let owned = this.byUser.get(handle.userId);
    if (!owned) {
      owned = new Set();
      this.byUser.set(handle.userId, owned);
    }
    owned.add(handle.id);
    if (owned.size > 1) return;

    const pending = this.offlineTimers.get(handle.userId);
    if (pending) {
      clearTimeout(pending);
      this.offlineTimers.delete(handle.userId);
      debugLog("chat.registry", "reconnected within grace window", handle.userId);
      return;
    }
    this.emit({ userId: handle.userId, status: "online", at: new Date(at).toISOString() });
  }

  unregister(connectionId: string): boolean {
    const entry = this.connections.get(connectionId);
    if (!entry) return false;
    this.connections.delete(connectionId);
    entry.subscriptions.forEach((conversationId) => {
      this.removeSubscriber(conversationId, connectionId);
    });
    const userId = entry.handle.userId;
    const owned = this.byUser.get(userId);
    owned?.delete(connectionId);
    if (owned && owned.size === 0) {
      this.byUser.delete(userId);
      this.scheduleOffline(userId);
    }
    return true;
  }

  get(connectionId: string): ConnectionHandle | null {
    return this.connections.get(connectionId)?.handle ?? null;
  }

  connectionsFor(userId: string): ConnectionHandle[] {
    const owned = this.byUser.get(userId);
    if (!owned) return [];
    return Array.from(owned, (id) => this.connections.get(id)?.handle).filter(
      (handle): handle is ConnectionHandle => Boolean(handle),
    );
  }

  subscribedConnectionsFor(userId: string, conversationId: string): ConnectionHandle[] {
    const subscribers = this.byConversation.get(conversationId);
    if (!subscribers) return [];
    return this.connectionsFor(userId).filter((handle) => subscribers.has(handle.id));
  }

  connectionCount(userId: string): number {
    return this.byUser.get(userId)?.size ?? 0;
  }

  isOnline(userId: string): boolean {
    return this.connectionCount(userId) > 0 || this.offlineTimers.has(userId);
  }

  subscribe(connectionId: string, conversationId: string): boolean {
    const entry = this.connections.get(connectionId);
    if (!entry || entry.subscriptions.has(conversationId)) return false;
    entry.subscriptions.add(conversationId);
    let subscribers = this.byConversation.get(conversationId);
    if (!subscribers) {
      subscribers = new Set();
      this.byConversation.set(conversationId, subscribers);
    }
    subscribers.add(connectionId);
    return true;
  }

  unsubscribe(connectionId: string, conversationId: string): boolean {
    const entry = this.connections.get(connectionId);
    if (!entry || !entry.subscriptions.delete(conversationId)) return false;
    this.removeSubscriber(conversationId, connectionId);
    return true;
  }

  subscriptionsOf(connectionId: string): string[] {
    const entry = this.connections.get(connectionId);
    return entry ? Array.from(entry.subscriptions) : [];
  }

  subscriptionsOfUser(userId: string): string[] {
    const conversations = new Set<string>();
    this.connectionsFor(userId).forEach((handle) => {
      this.subscriptionsOf(handle.id).forEach((conversationId) => conversations.add(conversationId));
    });
    return Array.from(conversations);
  }

  subscribersOf(conversationId: string): string[] {
    const subscribers = this.byConversation.get(conversationId);
    if (!subscribers) return [];
    const users = new Set<string>();
    subscribers.forEach((connectionId) => {
      const entry = this.connections.get(connectionId);
      if (entry) users.add(entry.handle.userId);
    });
    return Array.from(users);
  }

  touch(connectionId: string): void {
    const entry = this.connections.get(connectionId);
    if (entry) entry.lastSeenAt = this.now();
  }

  snapshot(connectionId: string): ConnectionSnapshot | null {
    const entry = this.connections.get(connectionId);
    if (!entry) return null;
    return {
      id: entry.handle.id,
      userId: entry.handle.userId,
      subscriptions: Array.from(entry.subscriptions),
      connectedAt: new Date(entry.connectedAt).toISOString(),
      lastSeenAt: new Date(entry.lastSeenAt).toISOString(),
    };
  }

  onlineUserIds(): string[] {
    const users = new Set<string>(this.byUser.keys());
    this.offlineTimers.forEach((_timer, userId) => users.add(userId));
    return Array.from(users).sort();
  }

  activeConversationIds(): string[] {
    return Array.from(this.byConversation.keys()).sort();
  }

  stats(): RegistryStats {
    return {
      connections: this.connections.size,
      users: this.byUser.size,
      activeConversations: this.byConversation.size,
    };
  }

  onPresenceChange(listener: PresenceListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.offlineTimers.forEach((timer) => clearTimeout(timer));
    this.offlineTimers.clear();
    this.listeners.clear();
    this.connections.clear();
    this.byUser.clear();
    this.byConversation.clear();
  }

  private removeSubscriber(conversationId: string, connectionId: string): void {
    const subscribers = this.byConversation.get(conversationId);
    if (!subscribers) return;
    subscribers.delete(connectionId);
    if (subscribers.size === 0) {
      this.byConversation.delete(conversationId);
    }
  }

  private scheduleOffline(userId: string): void {
    const existing = this.offlineTimers.get(userId);
    if (existing) clearTimeout(existing);
    const timer = setTimeout(() => {
      this.offlineTimers.delete(userId);
      if (this.connectionCount(userId) > 0) return;
      this.emit({ userId, status: "offline", at: new Date(this.now()).toISOString() });
    }, this.offlineGraceMs);
    timer.unref?.();
    this.offlineTimers.set(userId, timer);
  }

  private emit(transition: PresenceTransition): void {
    debugLog("chat.registry", "presence", transition);
    this.listeners.forEach((listener) => {
      try {
        listener(transition);
      } catch (error) {
        console.error("chat.registry.listener_failed", {
          userId: transition.userId,
          status: transition.status,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });
  }
}
