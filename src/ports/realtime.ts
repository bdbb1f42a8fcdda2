import type { ChatServerEvent } from "@/lib/chat/events";

/**
 * Transport-side view of one WebSocket. The gateway owns the protocol; adapters only
 * move strings and lifecycle signals.
 */
export interface RealtimeSocket {
  send(data: string): Promise<void>;
  close(code: number, reason: string): void;
  ping(): void;
  bufferedAmount(): number;
}

/** A live, registered connection that fan-out can write to. */
export interface ConnectionHandle {
  readonly id: string;
  readonly userId: string;
  deliver(event: ChatServerEvent): Promise<void>;
  terminate(code: number, reason: string): void;
}

export type DeliveryReport = {
  delivered: number;
  failed: number;
};

export type BroadcastAudience = "subscribers" | "members";

export type BroadcastOptions = {
  audience?: BroadcastAudience;
  extraUserIds?: Iterable<string>;
};

/** Live delivery seam shared by the WebSocket gateway and the REST routes. */
export interface ChatBroadcaster {
  broadcast(
    conversationId: string,
    event: ChatServerEvent,
    options?: BroadcastOptions,
  ): Promise<DeliveryReport>;
  notifyUsers(userIds: Iterable<string>, event: ChatServerEvent): Promise<DeliveryReport>;
  membershipChanged(
    conversationId: string,
    change: { added?: string[]; removed?: string[] },
  ): void;
}
