import { z } from "zod";

import { chatAttachmentInputSchema } from "@/lib/chat/frames";

const userIdField = z.string().trim().min(1).max(128);

export const conversationIdParamSchema = z.string().uuid();

export const messageIdParamSchema = z.coerce.number().int().positive();

export const createConversationRequestSchema = z.object({
  kind: z.enum(["direct", "group"]),
  memberIds: z.array(userIdField).min(1).max(256),
  title: z.string().max(500).nullable().optional(),
});

export const updateConversationRequestSchema = z
  .object({
    title: z.string().max(500).nullable().optional(),
    archived: z.boolean().optional(),
  })
  .refine((value) => value.title !== undefined || value.archived !== undefined, {
    message: "Provide a title or an archived flag.",
  });

export const addMembersRequestSchema = z.object({
  userIds: z.array(userIdField).min(1).max(256),
});

export const sendMessageRequestSchema = z.object({
  body: z.string().max(20_000).nullable().optional(),
  attachments: z.array(chatAttachmentInputSchema).max(50).nullable().optional(),
  parentId: z.number().int().positive().nullable().optional(),
  clientMessageId: z.string().trim().min(1).max(128).nullable().optional(),
});

export const editMessageRequestSchema = z.object({
  body: z.string().max(20_000),
});

export const reactionRequestSchema = z.object({
  emoji: z.string().trim().min(1).max(64),
});

export const readRequestSchema = z
  .object({
    conversationId: z.string().uuid().nullable().optional(),
  })
  .nullable();

export const listConversationsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

export const listMessagesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
  before: z.string().min(1).optional(),
  after: z.string().min(1).optional(),
});

export type CreateConversationRequest = z.infer<typeof createConversationRequestSchema>;
export type SendMessageRequest = z.infer<typeof sendMessageRequestSchema>;
