import type { ChatServerEvent } from "@/lib/chat/events";
import { KeyedQueue } from "@/lib/chat/keyed-queue";
import { debugLog } from "@/lib/debug";
import type { ChatStore } from "@/ports/chat-store";
import type {
  BroadcastOptions,
  ChatBroadcaster,
  ConnectionHandle,
  DeliveryReport,
} from "@/ports/realtime";
import { DeliveryError } from "@/server/chat/types";

import type { ConnectionRegistry, PresenceStatus } from "./connection-registry";

export const DELIVERY_FAILED_CLOSE_CODE = 1011;

export type ConversationRouterOptions = {
  registry: ConnectionRegistry;
  store: Pick<ChatStore, "listMembers">;
  membersCacheTtlMs: number;
  now?: () => number;
};

type CachedMembers = {
  members: ReadonlySet<string>;
  expiresAt: number;
};

function emptyReport(): DeliveryReport {
  return { delivered: 0, failed: 0 };
}

function summarize(results: boolean[]): DeliveryReport {
  return results.reduce<DeliveryReport>((report, ok) => {
    if (ok) report.delivered += 1;
    else report.failed += 1;
    return report;
  }, emptyReport());
}

/**
 * Resolves conversation audiences and fans events out to live connections. Events for
 * one conversation are resolved and dispatched in the order they were submitted.
 */
export class ConversationRouter implements ChatBroadcaster {
  private readonly registry: ConnectionRegistry;
  private readonly store: Pick<ChatStore, "listMembers">;
  private readonly membersCacheTtlMs: number;
  private readonly now: () => number;
  private readonly queue = new KeyedQueue();
  private readonly cache = new Map<string, CachedMembers>();
  private readonly inflight = new Map<string, Promise<ReadonlySet<string>>>();

  constructor(options: ConversationRouterOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.membersCacheTtlMs = options.membersCacheTtlMs;
    this.now = options.now ?? Date.now;
  }

  membersOf(conversationId: string): Promise<ReadonlySet<string>> {
    const cached = this.cache.get(conversationId);
    if (cached) {
      if (cached.expiresAt > this.now()) return Promise.resolve(cached.members);
      this.cache.delete(conversationId);
    }
    const pending = this.inflight.get(conversationId);
    if (pending) return pending;

    const lookup: Promise<ReadonlySet<string>> = this.store
      .listMembers(conversationId)
      .then((rows) => {
        const members: ReadonlySet<string> = new Set(rows.map((row) => row.userId));
        // an invalidation while in flight detaches this lookup; its result is stale
        if (this.inflight.get(conversationId) === lookup) {
          this.cache.set(conversationId, {
            members,
            expiresAt: this.now() + this.membersCacheTtlMs,
          });
        }
        return members;
      })
      .finally(() => {
        if (this.inflight.get(conversationId) === lookup) {
          this.inflight.delete(conversationId);
        }
      });
    this.inflight.set(conversationId, lookup);
    return lookup;
  }

  invalidate(conversationId: string): void {
    this.cache.delete(conversationId);
    this.inflight.delete(conversationId);
  }

  stats(): { cachedConversations: number; pendingLookups: number } {
    return { cachedConversations: this.cache.size, pendingLookups: this.inflight.size };
  }

  async broadcast(
    conversationId: string,
    event: ChatServerEvent,
    options: BroadcastOptions = {},
  ): Promise<DeliveryReport> {
    const audience = options.audience ?? "subscribers";
    const extraUserIds = options.extraUserIds ? Array.from(options.extraUserIds) : [];
    const writes = await this.queue.run(conversationId, async () => {
      const members = await this.membersOf(conversationId);
      const targets = new Map<string, ConnectionHandle>();
      members.forEach((userId) => {
        const handles =
          audience === "members"
            ? this.registry.connectionsFor(userId)
            : this.registry.subscribedConnectionsFor(userId, conversationId);
        handles.forEach((handle) => targets.set(handle.id, handle));
      });
      extraUserIds.forEach((userId) => {
        this.registry.connectionsFor(userId).forEach((handle) => targets.set(handle.id, handle));
      });
      debugLog("chat.router", "dispatch", {
        conversationId,
        type: event.type,
        audience,
        targets: targets.size,
      });
      return Array.from(targets.values(), (handle) => this.write(handle, event));
    });
    return summarize(await Promise.all(writes));
  }

  async notifyUsers(userIds: Iterable<string>, event: ChatServerEvent): Promise<DeliveryReport> {
    const targets = new Map<string, ConnectionHandle>();
    for (const userId of userIds) {
      this.registry.connectionsFor(userId).forEach((handle) => targets.set(handle.id, handle));
    }
    if (!targets.size) return emptyReport();
    const writes = Array.from(targets.values(), (handle) => this.write(handle, event));
    return summarize(await Promise.all(writes));
  }

  membershipChanged(
    conversationId: string,
    change: { added?: string[]; removed?: string[] },
  ): void {
    this.invalidate(conversationId);
    change.added?.forEach((userId) => {
      this.registry.connectionsFor(userId).forEach((handle) => {
        this.registry.subscribe(handle.id, conversationId);
      });
    });
    change.removed?.forEach((userId) => {
      this.registry.connectionsFor(userId).forEach((handle) => {
        this.registry.unsubscribe(handle.id, conversationId);
      });
    });
  }

  /** Tells every co-member of `userId` across `conversationIds` about a presence change. */
  async broadcastPresence(
    userId: string,
    status: PresenceStatus,
    conversationIds: string[],
    at: string = new Date(this.now()).toISOString(),
  ): Promise<DeliveryReport> {
    const memberSets = await Promise.all(conversationIds.map((id) => this.membersOf(id)));
    const audience = new Set<string>();
    memberSets.forEach((members) => members.forEach((member) => audience.add(member)));
    audience.delete(userId);
    return this.notifyUsers(audience, { type: "chat.presence", userId, status, at });
  }

  private async write(handle: ConnectionHandle, event: ChatServerEvent): Promise<boolean> {
    try {
      await handle.deliver(event);
      return true;
    } catch (error) {
      const failure =
        error instanceof DeliveryError
          ? error
          : new DeliveryError(handle.id, "Write to connection failed.", { cause: error });
      console.warn("chat.router.delivery_failed", {
        connectionId: handle.id,
        userId: handle.userId,
        event: event.type,
        error: failure.message,
      });
      this.registry.unregister(handle.id);
      handle.terminate(DELIVERY_FAILED_CLOSE_CODE, "delivery failed");
      return false;
    }
  }
}
