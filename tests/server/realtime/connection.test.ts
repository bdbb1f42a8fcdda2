import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CLOSE_CODES } from "@/server/realtime/connection";

import { createChatHarness, flush, type ChatHarness } from "../../support/chat-harness";

const UNKNOWN_CONVERSATION = "0b7a4c2e-5d1f-4e8a-9c3b-6a2d1e0f9b87";

describe("ChatConnection", () => {
  let harness: ChatHarness;

  beforeEach(() => {
    harness = createChatHarness();
  });

  afterEach(async () => {
    await harness.dispose();
    vi.useRealTimers();
  });

  async function groupOf(ownerId: string, memberIds: string[]): Promise<string> {
    const { conversation } = await harness.runtime.service.createConversation(ownerId, {
      kind: "group",
      memberIds,
      title: "Night shift",
    });
    return conversation.id;
  }

  it("closes with 4401 after reporting a rejected token", async () => {
    const client = await harness.connect("mallory", "bogus");

    expect(client.socket.sent).toEqual([
      {
        type: "chat.error",
        requestId: null,
        error: { code: "invalid_token", message: "Invalid or expired token." },
      },
    ]);
    expect(client.socket.closed).toEqual({ code: CLOSE_CODES.unauthorized, reason: "unauthorized" });
    expect(client.connection.state).toBe("closed");
    expect(harness.runtime.registry.connectionCount("mallory")).toBe(0);
  });

  it("announces itself with subscriptions and unread counts", async () => {
    const conversationId = await groupOf("alice", ["bob"]);
    await harness.runtime.service.sendMessage("alice", { conversationId, body: "welcome" });

    const bob = await harness.connect("bob");

    expect(bob.connection.state).toBe("active");
    expect(bob.socket.events("chat.ready")).toEqual([
      {
        type: "chat.ready",
        connectionId: bob.connection.id,
        userId: "bob",
        conversations: [conversationId],
        unread: { [conversationId]: 1 },
        heartbeatIntervalMs: 25_000,
      },
    ]);
    expect(harness.runtime.registry.subscriptionsOf(bob.connection.id)).toEqual([conversationId]);
  });

  it("answers a ping with a pong carrying the request id", async () => {
    const alice = await harness.connect("alice");
    await harness.sendFrame(alice, { type: "ping", requestId: "p-1" });

    expect(alice.socket.events("chat.pong")).toEqual([
      { type: "chat.pong", requestId: "p-1", at: expect.any(String) },
    ]);
  });

  it("acknowledges a send after fanning it out, and acks a retry without a second delivery", async () => {
    const conversationId = await groupOf("alice", ["bob"]);
    const alice = await harness.connect("alice");
    const bob = await harness.connect("bob");
    const frame = {
      type: "message.send",
      requestId: "s-1",
      conversationId,
      body: "hello",
      clientMessageId: "client-1",
    };

    await harness.sendFrame(alice, frame);
    await harness.sendFrame(alice, { ...frame, requestId: "s-2" });

    const acks = alice.socket.events("chat.ack");
    expect(acks.map((ack) => [ack.requestId, ack.action, ack.applied])).toEqual([
      ["s-1", "message.send", true],
      ["s-2", "message.send", false],
    ]);
    expect(acks[0]?.message).toMatchObject({ senderId: "alice", body: "hello", clientMessageId: "client-1" });
    expect(acks[1]?.message?.id).toBe(acks[0]?.message?.id);

    const ordered = alice.socket.sent
      .filter((event) => event.type !== "chat.presence")
      .map((event) => event.type);
    expect(ordered).toEqual(["chat.ready", "chat.message", "chat.ack", "chat.ack"]);
    expect(bob.socket.events("chat.message")).toHaveLength(1);
  });

  it("reports service errors on the frame without closing", async () => {
    const alice = await harness.connect("alice");
    await harness.sendFrame(alice, {
      type: "typing",
      requestId: "t-1",
      conversationId: UNKNOWN_CONVERSATION,
      isTyping: true,
    });

    expect(alice.socket.events("chat.error")).toEqual([
      {
        type: "chat.error",
        requestId: "t-1",
        error: { code: "conversation_not_found", message: "Conversation not found." },
      },
    ]);
    expect(alice.connection.state).toBe("active");
  });

  it("closes with 1008 once invalid frames reach the limit", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const alice = await harness.connect("alice");

    await harness.sendFrame(alice, "not json");
    await harness.sendFrame(alice, { type: "typing" });
    expect(alice.connection.state).toBe("active");
    await harness.sendFrame(alice, "still not json");

    const errors = alice.socket.events("chat.error");
    expect(errors.map((event) => event.error.code)).toEqual(["invalid_frame", "invalid_frame", "invalid_frame"]);
    expect(errors[0]?.error.message).toBe("Frame is not valid JSON.");
    expect(alice.socket.closed).toEqual({ code: CLOSE_CODES.policyViolation, reason: "too many invalid frames" });
    expect(harness.runtime.registry.get(alice.connection.id)).toBeNull();
    expect(warn).toHaveBeenCalledWith(
      "chat.connection.protocol_violations",
      expect.objectContaining({ userId: "alice", violations: 3 }),
    );
  });

  it("pings on the heartbeat and closes an idle connection with 4408", async () => {
    vi.useFakeTimers();
    const alice = await harness.connect("alice");

    vi.advanceTimersByTime(30_000);
    expect(alice.socket.pings).toBe(1);
    await harness.sendFrame(alice, { type: "ping" });

    vi.advanceTimersByTime(59_999);
    expect(alice.connection.state).toBe("active");
    expect(alice.socket.pings).toBe(3);

    vi.advanceTimersByTime(1);
    expect(alice.socket.closed).toEqual({ code: CLOSE_CODES.idleTimeout, reason: "idle timeout" });
    expect(alice.connection.state).toBe("closed");
  });

  it("drops a slow consumer without failing the sender", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const conversationId = await groupOf("alice", ["bob"]);
    await harness.connect("alice");
    const bob = await harness.connect("bob");
    await flush();
    bob.socket.buffered = 4_096;

    const { created } = await harness.runtime.service.sendMessage("alice", { conversationId, body: "hello?" });

    expect(created).toBe(true);
    expect(bob.socket.closed).toEqual({ code: CLOSE_CODES.internalError, reason: "delivery failed" });
    expect(bob.connection.state).toBe("closed");
    expect(warn).toHaveBeenCalledWith(
      "chat.router.delivery_failed",
      expect.objectContaining({ connectionId: bob.connection.id, event: "chat.message" }),
    );
  });

  it("stops typing when the socket goes away", async () => {
    const conversationId = await groupOf("alice", ["bob"]);
    const alice = await harness.connect("alice");
    const bob = await harness.connect("bob");

    await harness.sendFrame(bob, { type: "typing", requestId: "t-1", conversationId, isTyping: true });
    await flush();
    bob.connection.handleSocketClosed();
    await flush();

    expect(alice.socket.events("chat.typing")).toEqual([
      { type: "chat.typing", conversationId, userId: "bob", isTyping: true },
      { type: "chat.typing", conversationId, userId: "bob", isTyping: false },
    ]);
    expect(bob.socket.events("chat.ack")).toEqual([
      { type: "chat.ack", requestId: "t-1", action: "typing", applied: true },
    ]);
  });

  it("keeps typing alive while another device of the same user stays connected", async () => {
    const conversationId = await groupOf("alice", ["bob"]);
    const alice = await harness.connect("alice");
    const phone = await harness.connect("bob");
    const laptop = await harness.connect("bob");

    await harness.sendFrame(phone, { type: "typing", requestId: "t-1", conversationId, isTyping: true });
    await harness.sendFrame(laptop, { type: "typing", requestId: "t-2", conversationId, isTyping: true });
    phone.connection.handleSocketClosed();
    await flush();

    expect(harness.runtime.presence.typingIn(conversationId)).toEqual(["bob"]);

    laptop.connection.handleSocketClosed();
    await flush();

    expect(harness.runtime.presence.typingIn(conversationId)).toEqual([]);
    expect(alice.socket.events("chat.typing").map((event) => event.isTyping)).toEqual([true, false]);
  });
});
