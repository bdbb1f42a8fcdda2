import { z } from "zod";

const requestIdSchema = z.string().trim().min(1).max(128).optional();
const conversationIdSchema = z.string().uuid();
const messageIdSchema = z.number().int().positive();

export const chatAttachmentInputSchema = z.object({
  reference: z.string().trim().min(1).max(512),
  contentType: z.string().trim().min(1).max(255),
  size: z.number().int().nonnegative(),
  name: z.string().trim().max(255).nullable().optional(),
});

const messageSendFrameSchema = z.object({
  type: z.literal("message.send"),
  requestId: requestIdSchema,
  conversationId: conversationIdSchema,
  body: z.string().nullable().optional(),
  attachments: z.array(chatAttachmentInputSchema).optional(),
  parentId: messageIdSchema.nullable().optional(),
  clientMessageId: z.string().trim().min(1).max(128).nullable().optional(),
});

const messageEditFrameSchema = z.object({
  type: z.literal("message.edit"),
  requestId: requestIdSchema,
  messageId: messageIdSchema,
  body: z.string(),
});

const messageDeleteFrameSchema = z.object({
  type: z.literal("message.delete"),
  requestId: requestIdSchema,
  messageId: messageIdSchema,
});

const typingFrameSchema = z.object({
  type: z.literal("typing"),
  requestId: requestIdSchema,
  conversationId: conversationIdSchema,
  isTyping: z.boolean(),
});

const readFrameSchema = z.object({
  type: z.literal("read"),
  requestId: requestIdSchema,
  conversationId: conversationIdSchema.optional(),
  messageId: messageIdSchema,
});

const reactionAddFrameSchema = z.object({
  type: z.literal("reaction.add"),
  requestId: requestIdSchema,
  messageId: messageIdSchema,
  emoji: z.string().min(1).max(64),
});

const reactionRemoveFrameSchema = z.object({
  type: z.literal("reaction.remove"),
  requestId: requestIdSchema,
  messageId: messageIdSchema,
  emoji: z.string().min(1).max(64),
});

const subscribeFrameSchema = z.object({
  type: z.literal("subscribe"),
  requestId: requestIdSchema,
  conversationId: conversationIdSchema,
});

const unsubscribeFrameSchema = z.object({
  type: z.literal("unsubscribe"),
  requestId: requestIdSchema,
  conversationId: conversationIdSchema,
});

const pingFrameSchema = z.object({
  type: z.literal("ping"),
  requestId: requestIdSchema,
});

export const chatClientFrameSchema = z.discriminatedUnion("type", [
  messageSendFrameSchema,
  messageEditFrameSchema,
  messageDeleteFrameSchema,
  typingFrameSchema,
  readFrameSchema,
  reactionAddFrameSchema,
  reactionRemoveFrameSchema,
  subscribeFrameSchema,
  unsubscribeFrameSchema,
  pingFrameSchema,
]);

export type ChatAttachmentInput = z.infer<typeof chatAttachmentInputSchema>;
export type ChatClientFrame = z.infer<typeof chatClientFrameSchema>;
export type ChatClientFrameType = ChatClientFrame["type"];

export type ParsedFrame =
  | { ok: true; frame: ChatClientFrame }
  | { ok: false; requestId: string | null; message: string };

function extractRequestId(value: unknown): string | null {
  if (!value || typeof value !== "object" || !("requestId" in value)) return null;
  const { requestId } = value;
  return typeof requestId === "string" && requestId.trim().length ? requestId.trim() : null;
}

export function parseClientFrame(raw: string): ParsedFrame {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return { ok: false, requestId: null, message: "Frame is not valid JSON." };
  }
  const result = chatClientFrameSchema.safeParse(decoded);
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue && issue.path.length ? `${issue.path.join(".")}: ` : "";
    return {
      ok: false,
      requestId: extractRequestId(decoded),
      message: `Invalid frame. ${location}${issue?.message ?? "Unrecognized shape."}`,
    };
  }
  return { ok: true, frame: result.data };
}
