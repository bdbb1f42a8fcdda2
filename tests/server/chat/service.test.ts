import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  AuthorizationError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from "@/server/chat/types";

import { createChatHarness, flush, type ChatHarness } from "../../support/chat-harness";

describe("ChatService", () => {
  let harness: ChatHarness;

  beforeEach(() => {
    harness = createChatHarness();
  });

  afterEach(async () => {
    await harness.dispose();
    vi.useRealTimers();
  });

  async function createGroup(ownerId: string, memberIds: string[]): Promise<string> {
    const { conversation } = await harness.runtime.service.createConversation(ownerId, {
      kind: "group",
      memberIds,
      title: "Night shift",
    });
    return conversation.id;
  }

  async function createDirect(userId: string, peerId: string): Promise<string> {
    const { conversation } = await harness.runtime.service.createConversation(userId, {
      kind: "direct",
      memberIds: [peerId],
    });
    return conversation.id;
  }

  describe("conversations", () => {
    it("rejects direct conversations without exactly one peer", async () => {
      const { service } = harness.runtime;
      await expect(
        service.createConversation("alice", { kind: "direct", memberIds: ["alice"] }),
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(
        service.createConversation("alice", { kind: "direct", memberIds: ["bob", "carol"] }),
      ).rejects.toThrow("A direct conversation needs exactly one other participant.");
    });

    it("summarizes conversations with their last message and unread count", async () => {
      const { service } = harness.runtime;
      const conversationId = await createGroup("alice", ["bob"]);
      await service.sendMessage("alice", { conversationId, body: "one" });
      await service.sendMessage("alice", { conversationId, body: "two" });

      const page = await service.listConversations("bob");
      expect(page.total).toBe(1);
      expect(page.conversations[0]).toMatchObject({
        id: conversationId,
        kind: "group",
        title: "Night shift",
        unreadCount: 2,
        lastMessage: { body: "two", senderId: "alice" },
      });
    });

    it("hides conversations from outsiders", async () => {
      const conversationId = await createGroup("alice", ["bob"]);
      await expect(harness.runtime.service.getConversation("mallory", conversationId)).rejects.toMatchObject({
        code: "not_a_member",
        status: 403,
      });
    });

    it("lets only the owner change a group and blocks sends once archived", async () => {
      const { service } = harness.runtime;
      const conversationId = await createGroup("alice", ["bob"]);
      const bob = await harness.connect("bob");

      await expect(service.updateConversation("bob", conversationId, { title: "Mine" })).rejects.toBeInstanceOf(
        AuthorizationError,
      );

      const archived = await service.updateConversation("alice", conversationId, { archived: true });
      expect(archived.archivedAt).not.toBeNull();
      expect(bob.socket.events("chat.session").map((event) => event.action)).toEqual(["archived"]);

      await expect(service.sendMessage("alice", { conversationId, body: "hello?" })).rejects.toMatchObject({
        code: "conversation_archived",
      });
    });

    it("refuses to rename a direct conversation", async () => {
      const conversationId = await createDirect("alice", "bob");
      await expect(
        harness.runtime.service.updateConversation("bob", conversationId, { title: "Us" }),
      ).rejects.toMatchObject({ code: "direct_immutable", status: 409 });
    });
  });

  describe("membership", () => {
    it("adds members and subscribes their live connections", async () => {
      const { service } = harness.runtime;
      const conversationId = await createGroup("alice", ["bob"]);
      const carol = await harness.connect("carol");

      const added = await service.addMembers("alice", conversationId, ["carol", "bob"]);
      expect(added.map((member) => member.userId)).toEqual(["carol"]);
      expect(carol.socket.events("chat.session")).toMatchObject([
        { action: "members.added", actorId: "alice", userIds: ["carol"] },
      ]);

      await service.sendMessage("alice", { conversationId, body: "welcome carol" });
      expect(carol.socket.events("chat.message").map((event) => event.message.body)).toEqual(["welcome carol"]);
    });

    it("tells a removed member and stops delivering to them", async () => {
      const { service } = harness.runtime;
      const conversationId = await createGroup("alice", ["bob", "carol"]);
      const carol = await harness.connect("carol");

      await expect(service.removeMember("bob", conversationId, "carol")).rejects.toBeInstanceOf(
        AuthorizationError,
      );
      await expect(service.removeMember("alice", conversationId, "alice")).rejects.toMatchObject({
        code: "owner_cannot_leave",
      });

      await expect(service.removeMember("alice", conversationId, "carol")).resolves.toBe(true);
      const [removal] = carol.socket.events("chat.session");
      expect(removal).toMatchObject({ action: "members.removed", userIds: ["carol"] });
      expect(removal?.conversation.members.map((member) => member.userId)).toEqual(["alice", "bob"]);

      await service.sendMessage("alice", { conversationId, body: "after carol left" });
      expect(carol.socket.events("chat.message")).toEqual([]);
      await expect(service.removeMember("alice", conversationId, "carol")).rejects.toMatchObject({
        code: "member_not_found",
      });
    });

    it("lets a member leave on their own", async () => {
      const conversationId = await createGroup("alice", ["bob"]);
      await expect(harness.runtime.service.removeMember("bob", conversationId, "bob")).resolves.toBe(true);
      const members = await harness.runtime.service.listMembers("alice", conversationId);
      expect(members.map((member) => member.userId)).toEqual(["alice"]);
    });
  });

  describe("messages", () => {
    it("persists concurrent sends in key order and delivers them in that order", async () => {
      const { service } = harness.runtime;
      const alice = await harness.connect("alice");
      const bob = await harness.connect("bob");
      const conversationId = await createGroup("alice", ["bob"]);

      const results = await Promise.all(
        Array.from({ length: 10 }, (_, index) =>
          service.sendMessage(index % 2 ? "bob" : "alice", { conversationId, body: `message ${index}` }),
        ),
      );

      const ids = results.map((result) => result.message.id);
      const sorted = [...ids].sort((a, b) => a - b);
      expect(new Set(ids).size).toBe(10);

      const seenByBob = bob.socket.events("chat.message").map((event) => event.message.id);
      const seenByAlice = alice.socket.events("chat.message").map((event) => event.message.id);
      expect(seenByBob).toEqual(sorted);
      expect(seenByAlice).toEqual(sorted);
    });

    it("delivers edits as updates of the same message", async () => {
      const { service } = harness.runtime;
      const conversationId = await createDirect("alice", "bob");
      const bob = await harness.connect("bob");

      const { message } = await service.sendMessage("alice", { conversationId, body: "first draft" });
      const edited = await service.editMessage("alice", message.id, "  final   text ");

      expect(edited.body).toBe("final text");
      expect(bob.socket.events("chat.message")).toHaveLength(1);
      const updates = bob.socket.events("chat.message.update");
      expect(updates).toHaveLength(1);
      expect(updates[0]?.message).toMatchObject({ id: message.id, body: "final text" });
      expect(updates[0]?.message.editedAt).not.toBeNull();

      await expect(service.editMessage("bob", message.id, "not yours")).rejects.toBeInstanceOf(
        AuthorizationError,
      );
    });

    it("keeps line breaks in sent and edited bodies", async () => {
      const { service } = harness.runtime;
      const conversationId = await createGroup("alice", ["bob"]);

      const { message } = await service.sendMessage("alice", {
        conversationId,
        body: "Room 204 heater:\n- broken\n- needs parts",
      });
      const edited = await service.editMessage("alice", message.id, "Room 204 heater:\n- fixed  ");

      expect(message.body).toBe("Room 204 heater:\n- broken\n- needs parts");
      expect(edited.body).toBe("Room 204 heater:\n- fixed");
    });

    it("deletes once and refuses to edit what was deleted", async () => {
      const { service } = harness.runtime;
      const conversationId = await createDirect("alice", "bob");
      const bob = await harness.connect("bob");
      const { message } = await service.sendMessage("alice", { conversationId, body: "oops" });

      const first = await service.deleteMessage("alice", message.id);
      const second = await service.deleteMessage("alice", message.id);

      expect(first.applied).toBe(true);
      expect(first.message.body).toBeNull();
      expect(second.applied).toBe(false);
      expect(bob.socket.events("chat.message.delete")).toMatchObject([
        { conversationId, messageId: message.id, deletedBy: "alice" },
      ]);
      await expect(service.editMessage("alice", message.id, "again")).rejects.toBeInstanceOf(ConflictError);
    });

    it("requires text or an attachment", async () => {
      const conversationId = await createDirect("alice", "bob");
      await expect(
        harness.runtime.service.sendMessage("alice", { conversationId, body: "   " }),
      ).rejects.toThrow("A message needs text or at least one attachment.");
    });

    it("pages history with an opaque cursor", async () => {
      const { service } = harness.runtime;
      const conversationId = await createDirect("alice", "bob");
      for (const body of ["one", "two", "three"]) {
        await service.sendMessage("alice", { conversationId, body });
      }

      const latest = await service.listMessages("bob", conversationId, { limit: 2 });
      expect(latest.messages.map((message) => message.body)).toEqual(["three", "two"]);
      expect(latest.hasMore).toBe(true);
      expect(latest.nextCursor).toEqual(expect.any(String));

      const older = await service.listMessages("bob", conversationId, {
        limit: 2,
        before: latest.nextCursor,
      });
      expect(older.messages.map((message) => message.body)).toEqual(["one"]);
      expect(older.hasMore).toBe(false);
      expect(older.nextCursor).toBeNull();

      await expect(
        service.listMessages("bob", conversationId, { before: latest.nextCursor, after: latest.nextCursor }),
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it("rejects replies to unknown messages", async () => {
      const conversationId = await createDirect("alice", "bob");
      await expect(
        harness.runtime.service.sendMessage("alice", { conversationId, body: "re", parentId: 404 }),
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("read markers", () => {
    it("only move forward and announce each advance once", async () => {
      const { service } = harness.runtime;
      const conversationId = await createDirect("alice", "bob");
      const alice = await harness.connect("alice");
      const sent = [];
      for (const body of ["one", "two", "three"]) {
        sent.push((await service.sendMessage("alice", { conversationId, body })).message);
      }
      const [first, , third] = sent;
      if (!first || !third) throw new Error("messages were not created");

      const advanced = await service.markRead("bob", third.id);
      const stale = await service.markRead("bob", first.id, conversationId);

      expect(advanced.applied).toBe(true);
      expect(stale.applied).toBe(false);
      expect(stale.marker?.messageId).toBe(third.id);
      expect(alice.socket.events("chat.read")).toMatchObject([
        { conversationId, userId: "bob", messageId: third.id },
      ]);
      await expect(service.unreadCounts("bob")).resolves.toEqual({ [conversationId]: 0 });
    });

    it("marks everything read and rejects a mismatched conversation", async () => {
      const { service } = harness.runtime;
      const conversationId = await createDirect("alice", "bob");
      const otherId = await createDirect("alice", "carol");
      const { message } = await service.sendMessage("alice", { conversationId, body: "one" });
      await service.sendMessage("alice", { conversationId, body: "two" });

      await expect(service.markRead("bob", message.id, otherId)).rejects.toBeInstanceOf(ValidationError);
      await expect(service.unreadCounts("bob")).resolves.toEqual({ [conversationId]: 2 });

      const result = await service.markAllRead("bob", conversationId);
      expect(result.applied).toBe(true);
      await expect(service.unreadCounts("bob")).resolves.toEqual({ [conversationId]: 0 });

      const empty = await service.markAllRead("carol", otherId);
      expect(empty).toEqual({ conversationId: otherId, marker: null, applied: false });
    });
  });

  describe("unread counts", () => {
    it("are pushed to other members on send and to the reader when their marker moves", async () => {
      const { service } = harness.runtime;
      const conversationId = await createGroup("alice", ["bob", "carol"]);
      const alice = await harness.connect("alice");
      const bob = await harness.connect("bob");

      const { message: first } = await service.sendMessage("alice", { conversationId, body: "one" });
      await service.sendMessage("alice", { conversationId, body: "two" });
      await service.markRead("bob", first.id);
      await service.markRead("bob", first.id);

      expect(bob.socket.events("chat.unread")).toEqual([
        { type: "chat.unread", conversationId, count: 1 },
        { type: "chat.unread", conversationId, count: 2 },
        { type: "chat.unread", conversationId, count: 1 },
      ]);
      expect(alice.socket.events("chat.unread")).toEqual([]);
    });

    it("are recounted when an unread message is deleted", async () => {
      const { service } = harness.runtime;
      const conversationId = await createGroup("alice", ["bob"]);
      const bob = await harness.connect("bob");

      const { message } = await service.sendMessage("alice", { conversationId, body: "wrong room" });
      await service.deleteMessage("alice", message.id);

      expect(bob.socket.events("chat.unread").map((event) => event.count)).toEqual([1, 0]);
    });
  });

  describe("reactions", () => {
    it("are idempotent and broadcast only real changes", async () => {
      const { service } = harness.runtime;
      const conversationId = await createDirect("alice", "bob");
      const alice = await harness.connect("alice");
      const { message } = await service.sendMessage("alice", { conversationId, body: "react" });

      await expect(service.addReaction("bob", message.id, "👍")).resolves.toBe(true);
      await expect(service.addReaction("bob", message.id, " 👍 ")).resolves.toBe(false);
      await expect(service.removeReaction("bob", message.id, "👍")).resolves.toBe(true);
      await expect(service.removeReaction("bob", message.id, "👍")).resolves.toBe(false);

      expect(alice.socket.events("chat.reaction")).toEqual([
        {
          type: "chat.reaction",
          conversationId,
          messageId: message.id,
          emoji: "👍",
          action: "added",
          userId: "bob",
          reactions: [{ emoji: "👍", count: 1, userIds: ["bob"] }],
        },
        {
          type: "chat.reaction",
          conversationId,
          messageId: message.id,
          emoji: "👍",
          action: "removed",
          userId: "bob",
          reactions: [],
        },
      ]);
    });

    it("rejects text that is not an emoji", async () => {
      const conversationId = await createDirect("alice", "bob");
      const { message } = await harness.runtime.service.sendMessage("alice", { conversationId, body: "hi" });
      await expect(harness.runtime.service.addReaction("bob", message.id, "nope")).rejects.toThrow(
        "Reactions must be an emoji or a :shortcode:.",
      );
    });
  });

  describe("direct conversation lifecycle", () => {
    it("send, read receipt, disconnect and a debounced offline", async () => {
      vi.useFakeTimers();
      const { service, registry } = harness.runtime;
      const alice = await harness.connect("alice");
      const bob = await harness.connect("bob");

      const opened = await service.createConversation("alice", { kind: "direct", memberIds: ["bob"] });
      const conversationId = opened.conversation.id;
      expect(opened.created).toBe(true);
      expect(bob.socket.events("chat.session")).toMatchObject([
        { conversationId, action: "created", actorId: "alice", userIds: ["alice", "bob"] },
      ]);

      const reopened = await service.createConversation("bob", { kind: "direct", memberIds: ["alice"] });
      expect(reopened).toMatchObject({ created: false, conversation: { id: conversationId } });

      const { message } = await service.sendMessage("alice", { conversationId, body: "hi bob" });
      expect(bob.socket.events("chat.message").map((event) => event.message.body)).toEqual(["hi bob"]);

      await service.markRead("bob", message.id);
      expect(alice.socket.events("chat.read")).toMatchObject([{ userId: "bob", messageId: message.id }]);

      bob.connection.handleSocketClosed();
      await flush();
      const offline = () => alice.socket.events("chat.presence").filter((event) => event.status === "offline");

      await vi.advanceTimersByTimeAsync(4_999);
      expect(offline()).toEqual([]);
      expect(registry.isOnline("bob")).toBe(true);

      await vi.advanceTimersByTimeAsync(1);
      await flush();
      expect(offline()).toMatchObject([{ type: "chat.presence", userId: "bob", status: "offline" }]);
      expect(registry.isOnline("bob")).toBe(false);
    });
  });

  describe("ephemeral signals", () => {
    it("typing requires membership", async () => {
      const conversationId = await createGroup("alice", ["bob"]);
      await expect(harness.runtime.service.setTyping("mallory", conversationId, true)).rejects.toBeInstanceOf(
        AuthorizationError,
      );
      await expect(harness.runtime.service.setTyping("bob", conversationId, true)).resolves.toBe(true);
    });

    it("subscribing returns a presence snapshot", async () => {
      const conversationId = await createGroup("alice", ["bob"]);
      const bob = await harness.connect("bob");
      harness.runtime.service.unsubscribe(bob.connection.id, conversationId);

      const presence = await harness.runtime.service.subscribe(bob.connection.id, "bob", conversationId);
      expect(presence).toEqual([
        { userId: "alice", online: false, typing: false },
        { userId: "bob", online: true, typing: false },
      ]);
      expect(harness.runtime.registry.subscriptionsOf(bob.connection.id)).toEqual([conversationId]);
    });
  });
});
