import { describe, expect, it, vi } from "vitest";

import { SupabaseChatStore } from "@/server/chat/repository";
import { ChatServiceError, ConflictError, NotFoundError } from "@/server/chat/types";

type MockResult = {
  data: unknown;
  error: { message: string; code?: string } | null;
  count?: number | null;
};

const CONVERSATION_ID = "11111111-1111-4111-8111-111111111111";
const CREATED_AT = "2026-01-01T00:00:05.000Z";
const READ_AT = "2026-01-01T00:01:00.000Z";

function createDbMock(results: MockResult[] = [], rpcResults: MockResult[] = []) {
  const next = (queue: MockResult[]) => {
    const result = queue.shift();
    if (!result) throw new Error("unexpected database call");
    return Promise.resolve(result);
  };

  function createChain() {
    return {
      select: vi.fn().mockReturnThis(),
      insert: vi.fn().mockReturnThis(),
      update: vi.fn().mockReturnThis(),
      upsert: vi.fn().mockReturnThis(),
      delete: vi.fn().mockReturnThis(),
      eq: vi.fn().mockReturnThis(),
      is: vi.fn().mockReturnThis(),
      in: vi.fn().mockReturnThis(),
      or: vi.fn().mockReturnThis(),
      order: vi.fn().mockReturnThis(),
      limit: vi.fn().mockReturnThis(),
      range: vi.fn().mockReturnThis(),
      fetch: vi.fn(() => next(results)),
      maybeSingle: vi.fn(() => next(results)),
      single: vi.fn(() => next(results)),
    };
  }

  const queries: Array<{ table: string; chain: ReturnType<typeof createChain> }> = [];

  return {
    queries,
    client: {
      from: vi.fn((table: string) => {
        const chain = createChain();
        queries.push({ table, chain });
        return chain;
      }),
      rpc: vi.fn((_fn: string, _params?: Record<string, unknown>) => next(rpcResults)),
    },
  };
}

const conversationRow = {
  id: CONVERSATION_ID,
  kind: "direct",
  title: null,
  direct_key: "alice:bob",
  created_by: "bob",
  created_at: CREATED_AT,
  last_activity_at: CREATED_AT,
  archived_at: null,
};

const memberRow = (userId: string, overrides: Record<string, unknown> = {}) => ({
  conversation_id: CONVERSATION_ID,
  user_id: userId,
  role: "member",
  joined_at: CREATED_AT,
  last_read_message_id: null,
  last_read_message_at: null,
  last_read_at: null,
  ...overrides,
});

const messageRow = (id: string, overrides: Record<string, unknown> = {}) => ({
  id,
  conversation_id: CONVERSATION_ID,
  sender_id: "alice",
  body: "hello",
  attachments: null,
  parent_id: null,
  client_message_id: null,
  created_at: CREATED_AT,
  edited_at: null,
  deleted_at: null,
  ...overrides,
});

describe("SupabaseChatStore", () => {
  describe("createConversation", () => {
    it("creates the conversation and its members in one database call", async () => {
      const db = createDbMock(
        [
          {
            data: [
              memberRow("bob"),
              memberRow("alice", {
                last_read_message_id: "12",
                last_read_message_at: CREATED_AT,
                last_read_at: READ_AT,
              }),
            ],
            error: null,
          },
        ],
        [{ data: [conversationRow], error: null }],
      );
      const store = new SupabaseChatStore(db.client as never);

      const { conversation, members } = await store.createConversation({
        kind: "direct",
        title: null,
        createdBy: "bob",
        memberIds: ["alice"],
      });

      expect(db.client.rpc).toHaveBeenCalledWith("chat_create_conversation", {
        p_kind: "direct",
        p_title: null,
        p_created_by: "bob",
        p_direct_key: "alice:bob",
        p_member_ids: ["bob", "alice"],
      });
      expect(db.queries.map((query) => query.table)).toEqual(["chat_conversation_members"]);
      expect(db.queries[0]?.chain.upsert).not.toHaveBeenCalled();
      expect(conversation).toEqual({
        id: CONVERSATION_ID,
        kind: "direct",
        title: null,
        createdBy: "bob",
        createdAt: CREATED_AT,
        lastActivityAt: CREATED_AT,
        archivedAt: null,
      });
      expect(members.map((member) => [member.userId, member.lastReadMessageId])).toEqual([
        ["bob", null],
        ["alice", 12],
      ]);
    });

    it("writes nothing else when the transaction fails, so the pair stays free", async () => {
      const db = createDbMock(
        [{ data: null, error: null }],
        [{ data: null, error: { code: "08006", message: "connection failure" } }],
      );
      const store = new SupabaseChatStore(db.client as never);

      await expect(
        store.createConversation({ kind: "direct", title: null, createdBy: "alice", memberIds: ["bob"] }),
      ).rejects.toThrow("chat_create_conversation: connection failure");
      expect(db.queries).toHaveLength(0);

      await expect(store.findDirectConversation("bob", "alice")).resolves.toBeNull();
      expect(db.queries[0]?.chain.eq).toHaveBeenCalledWith("direct_key", "alice:bob");
    });

    it("reports a second direct conversation for the same pair as a conflict", async () => {
      const db = createDbMock(
        [],
        [{ data: null, error: { code: "23505", message: "duplicate key value" } }],
      );
      const store = new SupabaseChatStore(db.client as never);

      const attempt = store.createConversation({
        kind: "direct",
        title: null,
        createdBy: "alice",
        memberIds: ["bob"],
      });

      await expect(attempt).rejects.toBeInstanceOf(ConflictError);
      await expect(attempt).rejects.toMatchObject({ code: "duplicate", status: 409 });
    });
  });

  describe("listMessages", () => {
    it("pages backwards with a keyset filter on the ordering key", async () => {
      const db = createDbMock([
        { data: [messageRow("6"), messageRow("5"), messageRow("4")], error: null },
      ]);
      const store = new SupabaseChatStore(db.client as never);

      const page = await store.listMessages(CONVERSATION_ID, {
        limit: 2,
        before: { createdAt: CREATED_AT, id: 7 },
      });

      const chain = db.queries[0]?.chain;
      expect(db.queries[0]?.table).toBe("chat_messages");
      expect(chain?.eq).toHaveBeenCalledWith("conversation_id", CONVERSATION_ID);
      expect(chain?.or).toHaveBeenCalledWith(
        `created_at.lt."${CREATED_AT}",and(created_at.eq."${CREATED_AT}",id.lt.7)`,
      );
      expect(chain?.order).toHaveBeenNthCalledWith(1, "created_at", { ascending: false });
      expect(chain?.order).toHaveBeenNthCalledWith(2, "id", { ascending: false });
      expect(chain?.limit).toHaveBeenCalledWith(3);
      expect(page.messages.map((message) => message.id)).toEqual([6, 5]);
      expect(page.hasMore).toBe(true);
    });

    it("pages forwards and still returns the page newest first", async () => {
      const db = createDbMock([{ data: [messageRow("8"), messageRow("9")], error: null }]);
      const store = new SupabaseChatStore(db.client as never);

      const page = await store.listMessages(CONVERSATION_ID, {
        limit: 2,
        after: { createdAt: CREATED_AT, id: 7 },
      });

      const chain = db.queries[0]?.chain;
      expect(chain?.or).toHaveBeenCalledWith(
        `created_at.gt."${CREATED_AT}",and(created_at.eq."${CREATED_AT}",id.gt.7)`,
      );
      expect(chain?.order).toHaveBeenNthCalledWith(1, "created_at", { ascending: true });
      expect(page.messages.map((message) => message.id)).toEqual([9, 8]);
      expect(page.hasMore).toBe(false);
    });
  });

  describe("createMessage", () => {
    const input = {
      conversationId: CONVERSATION_ID,
      senderId: "alice",
      body: "hello",
      attachments: [],
      parentId: null,
      clientMessageId: "client-1",
    };

    it("returns the stored message when a retry loses the race on clientMessageId", async () => {
      const db = createDbMock([
        { data: null, error: null },
        { data: null, error: { code: "23505", message: "duplicate key value" } },
        { data: messageRow("41", { client_message_id: "client-1" }), error: null },
      ]);
      const store = new SupabaseChatStore(db.client as never);

      const result = await store.createMessage(input);

      expect(result.created).toBe(false);
      expect(result.message).toMatchObject({ id: 41, clientMessageId: "client-1", body: "hello" });
      expect(db.queries[1]?.chain.insert).toHaveBeenCalledWith({
        conversation_id: CONVERSATION_ID,
        sender_id: "alice",
        body: "hello",
        attachments: [],
        parent_id: null,
        client_message_id: "client-1",
      });
      expect(db.queries[2]?.chain.eq).toHaveBeenCalledWith("client_message_id", "client-1");
    });

    it("maps a missing conversation reference to NotFoundError", async () => {
      const db = createDbMock([
        { data: null, error: { code: "23503", message: "violates foreign key constraint" } },
      ]);
      const store = new SupabaseChatStore(db.client as never);

      const attempt = store.createMessage({ ...input, clientMessageId: null });

      await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
      await expect(attempt).rejects.toMatchObject({
        code: "reference_not_found",
        message: "chat_messages.insert: violates foreign key constraint",
      });
    });
  });

  it("keeps the first reaction when the same one is added twice", async () => {
    const db = createDbMock([
      { data: messageRow("5"), error: null },
      { data: null, error: { code: "23505", message: "duplicate key value" } },
      {
        data: { message_id: "5", user_id: "bob", emoji: "👍", created_at: CREATED_AT },
        error: null,
      },
    ]);
    const store = new SupabaseChatStore(db.client as never);

    const result = await store.addReaction({ messageId: 5, userId: "bob", emoji: "👍" });

    expect(result).toEqual({
      added: false,
      reaction: { messageId: 5, userId: "bob", emoji: "👍", createdAt: CREATED_AT },
    });
    expect(db.queries.map((query) => query.table)).toEqual([
      "chat_messages",
      "chat_message_reactions",
      "chat_message_reactions",
    ]);
    expect(db.queries[2]?.chain.eq).toHaveBeenCalledWith("emoji", "👍");
  });

  it("converts the read marker returned by SQL and reports a missing message", async () => {
    const db = createDbMock(
      [],
      [
        {
          data: [{ message_id: "12", message_created_at: CREATED_AT, read_at: READ_AT, advanced: true }],
          error: null,
        },
        { data: [], error: null },
      ],
    );
    const store = new SupabaseChatStore(db.client as never);
    const params = { conversationId: CONVERSATION_ID, userId: "bob", messageId: 12 };

    await expect(store.advanceReadMarker(params)).resolves.toEqual({
      marker: {
        conversationId: CONVERSATION_ID,
        userId: "bob",
        messageId: 12,
        messageCreatedAt: CREATED_AT,
        readAt: READ_AT,
      },
      advanced: true,
    });
    expect(db.client.rpc).toHaveBeenCalledWith("chat_advance_read_marker", {
      p_conversation_id: CONVERSATION_ID,
      p_user_id: "bob",
      p_message_id: 12,
    });
    await expect(store.advanceReadMarker(params)).rejects.toMatchObject({ code: "message_not_found" });
  });

  it("wraps other database errors without a chat error code", async () => {
    const db = createDbMock([
      { data: null, error: { code: "42P01", message: "relation does not exist" } },
    ]);
    const store = new SupabaseChatStore(db.client as never);

    const attempt = store.getConversation(CONVERSATION_ID);

    await expect(attempt).rejects.toThrow("chat_conversations.get: relation does not exist");
    await expect(attempt).rejects.not.toBeInstanceOf(ChatServiceError);
  });
});
