import { vi } from "vitest";

import { InMemoryChatStore } from "@/adapters/chat-store/memory/store";
import { chatServerEventSchema, type ChatServerEvent } from "@/lib/chat/events";
import type { CredentialResolver } from "@/ports/auth";
import type { RealtimeSocket } from "@/ports/realtime";
import { AuthenticationError } from "@/server/chat/types";
import { ChatConnection } from "@/server/realtime/connection";
import { createChatRuntime, type ChatRuntime, type ChatRuntimeConfig } from "@/server/realtime/runtime";

export const TEST_CONFIG: ChatRuntimeConfig = {
  offlineGraceMs: 5_000,
  typingTtlMs: 6_000,
  membersCacheTtlMs: 30_000,
  idleTimeoutMs: 60_000,
  heartbeatIntervalMs: 25_000,
  maxProtocolViolations: 3,
  maxBufferedBytes: 1_024,
  maxFrameBytes: 65_536,
};

type EventOf<T extends ChatServerEvent["type"]> = Extract<ChatServerEvent, { type: T }>;

/** Records every frame written to it, parsed back through the outbound schema. */
export class FakeSocket implements RealtimeSocket {
  readonly sent: ChatServerEvent[] = [];
  closed: { code: number; reason: string } | null = null;
  pings = 0;
  buffered = 0;
  failWrites = false;

  send(data: string): Promise<void> {
    if (this.failWrites) {
      return Promise.reject(new Error("socket write failed"));
    }
    this.sent.push(chatServerEventSchema.parse(JSON.parse(data)));
    return Promise.resolve();
  }

  close(code: number, reason: string): void {
    this.closed = { code, reason };
  }

  ping(): void {
    this.pings += 1;
  }

  bufferedAmount(): number {
    return this.buffered;
  }

  events<T extends ChatServerEvent["type"]>(type: T): EventOf<T>[] {
    return this.sent.filter((event): event is EventOf<T> => event.type === type);
  }
}

/** Accepts `token-<userId>` and rejects everything else. */
export const tokenResolver: CredentialResolver = {
  async resolve(token) {
    if (!token.startsWith("token-") || token.length <= "token-".length) {
      throw new AuthenticationError("Invalid or expired token.", "invalid_token");
    }
    const userId = token.slice("token-".length);
    return { userId, email: `${userId}@example.com` };
  },
};

export function bearer(userId: string): Record<string, string> {
  return { Authorization: `Bearer token-${userId}` };
}

export type TestClient = {
  userId: string;
  socket: FakeSocket;
  connection: ChatConnection;
};

export type ChatHarness = {
  store: InMemoryChatStore;
  runtime: ChatRuntime;
  connect(userId: string, token?: string | null): Promise<TestClient>;
  /** Sends a raw frame and waits until it, and everything before it, has been handled. */
  sendFrame(client: TestClient, frame: unknown): Promise<void>;
  dispose(): Promise<void>;
};

export function createChatHarness(config: Partial<ChatRuntimeConfig> = {}): ChatHarness {
  const store = new InMemoryChatStore();
  const runtime = createChatRuntime({
    store,
    resolver: tokenResolver,
    config: { ...TEST_CONFIG, ...config },
  });
  const clients: TestClient[] = [];

  return {
    store,
    runtime,
    async connect(userId, token = `token-${userId}`) {
      const socket = new FakeSocket();
      const connection = new ChatConnection({
        socket,
        registry: runtime.registry,
        service: runtime.service,
        resolver: tokenResolver,
        options: { ...TEST_CONFIG, ...config },
      });
      await connection.open(token);
      const client = { userId, socket, connection };
      clients.push(client);
      return client;
    },
    async sendFrame(client, frame) {
      client.connection.receive(typeof frame === "string" ? frame : JSON.stringify(frame));
      await client.connection.idle();
    },
    async dispose() {
      clients.forEach((client) => client.connection.terminate(1000, "test finished"));
      await runtime.dispose();
    },
  };
}

/** Lets fire-and-forget relays (typing, presence) run to completion. */
export async function flush(): Promise<void> {
  if (vi.isFakeTimers()) {
    await vi.advanceTimersByTimeAsync(0);
    return;
  }
  await new Promise<void>((resolve) => setImmediate(resolve));
}
