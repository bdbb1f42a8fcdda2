import type {
  ChatConversation,
  ChatMember,
  ChatMessage,
  ChatReactionSummary,
} from "@/lib/chat/events";
import type { ChatAttachmentInput } from "@/lib/chat/frames";
import type {
  AttachmentRecord,
  ConversationMemberRecord,
  ConversationRecord,
  MessageCursor,
  MessageRecord,
  ReactionRecord,
} from "@/ports/chat-store";

import { ValidationError } from "./types";

export const MAX_BODY_LENGTH = 4000;
export const MAX_REACTION_EMOJI_LENGTH = 32;
export const MAX_TITLE_LENGTH = 120;
export const MAX_ATTACHMENTS = 10;
export const MAX_ATTACHMENT_BYTES = 50 * 1024 * 1024;

const SHORTCODE_PATTERN = /^:[a-z0-9_+-]{1,30}:$/;

/** Trims the ends and collapses runs of spaces and tabs; line breaks are kept. */
export function sanitizeBody(value: string): string {
  return value
    .replace(/\r\n?/g, "\n")
    .replace(/[^\S\n]+/g, " ")
    .replace(/ ?\n ?/g, "\n")
    .trim()
    .slice(0, MAX_BODY_LENGTH);
}

export function sanitizeTitle(value: string | null | undefined): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.replace(/\s+/g, " ").trim();
  return trimmed.length ? trimmed.slice(0, MAX_TITLE_LENGTH) : null;
}

export function sanitizeAttachments(
  value: ChatAttachmentInput[] | null | undefined,
): AttachmentRecord[] {
  if (!value?.length) return [];
  const unique = new Map<string, AttachmentRecord>();
  value.forEach((entry) => {
    const reference = entry.reference.trim();
    const contentType = entry.contentType.trim();
    if (!reference || !contentType) return;
    if (entry.size > MAX_ATTACHMENT_BYTES) {
      throw new ValidationError(`Attachment ${reference} exceeds the 50 MB limit.`, {
        reference,
        size: entry.size,
      });
    }
    if (unique.has(reference)) return;
    const name = typeof entry.name === "string" && entry.name.trim().length ? entry.name.trim() : null;
    unique.set(reference, { reference, contentType, size: entry.size, name });
  });
  if (unique.size > MAX_ATTACHMENTS) {
    throw new ValidationError(`A message can carry at most ${MAX_ATTACHMENTS} attachments.`);
  }
  return Array.from(unique.values());
}

/** Accepts a pictographic emoji or a `:shortcode:`; returns "" when neither. */
export function sanitizeReactionEmoji(value: string): string {
  if (typeof value !== "string") return "";
  const trimmed = value.trim();
  if (!trimmed) return "";
  if (SHORTCODE_PATTERN.test(trimmed.toLowerCase())) return trimmed.toLowerCase();
  const limited =
    trimmed.length > MAX_REACTION_EMOJI_LENGTH ? trimmed.slice(0, MAX_REACTION_EMOJI_LENGTH) : trimmed;
  const hasEmoji = /\p{Extended_Pictographic}/u.test(limited);
  if (!hasEmoji) return "";
  return limited;
}

export function uniqueIds(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed) seen.add(trimmed);
  }
  return Array.from(seen);
}

export function compareOrderingKey(a: MessageCursor, b: MessageCursor): number {
  const left = Date.parse(a.createdAt);
  const right = Date.parse(b.createdAt);
  if (left !== right) return left < right ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export function encodeCursor(cursor: MessageCursor): string {
  return Buffer.from(JSON.stringify([cursor.createdAt, cursor.id]), "utf8").toString("base64url");
}

export function decodeCursor(value: string | null | undefined): MessageCursor | null {
  if (!value) return null;
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(value, "base64url").toString("utf8"));
  } catch {
    throw new ValidationError("Malformed pagination cursor.");
  }
  if (!Array.isArray(decoded) || decoded.length !== 2) {
    throw new ValidationError("Malformed pagination cursor.");
  }
  const [createdAt, id] = decoded;
  if (
    typeof createdAt !== "string" ||
    Number.isNaN(Date.parse(createdAt)) ||
    typeof id !== "number" ||
    !Number.isInteger(id)
  ) {
    throw new ValidationError("Malformed pagination cursor.");
  }
  return { createdAt, id };
}

export function buildReactionSummaries(reactions: ReactionRecord[]): Map<number, ChatReactionSummary[]> {
  const byMessage = new Map<number, Map<string, string[]>>();
  reactions.forEach((reaction) => {
    let byEmoji = byMessage.get(reaction.messageId);
    if (!byEmoji) {
      byEmoji = new Map();
      byMessage.set(reaction.messageId, byEmoji);
    }
    const users = byEmoji.get(reaction.emoji) ?? [];
    users.push(reaction.userId);
    byEmoji.set(reaction.emoji, users);
  });
  const summaries = new Map<number, ChatReactionSummary[]>();
  byMessage.forEach((byEmoji, messageId) => {
    const list: ChatReactionSummary[] = [];
    byEmoji.forEach((userIds, emoji) => {
      list.push({ emoji, count: userIds.length, userIds: [...userIds].sort() });
    });
    list.sort((a, b) => b.count - a.count || a.emoji.localeCompare(b.emoji));
    summaries.set(messageId, list);
  });
  return summaries;
}

export function toChatMessage(
  record: MessageRecord,
  reactions: ChatReactionSummary[] = [],
): ChatMessage {
  const deleted = record.deletedAt !== null;
  return {
    id: record.id,
    conversationId: record.conversationId,
    senderId: record.senderId,
    body: deleted ? null : record.body,
    attachments: deleted ? [] : record.attachments,
    parentId: record.parentId,
    clientMessageId: record.clientMessageId,
    createdAt: record.createdAt,
    editedAt: record.editedAt,
    deletedAt: record.deletedAt,
    reactions: deleted ? [] : reactions,
  };
}

export function toChatMember(member: ConversationMemberRecord): ChatMember {
  return {
    userId: member.userId,
    role: member.role,
    joinedAt: member.joinedAt,
    lastReadMessageId: member.lastReadMessageId,
    lastReadAt: member.lastReadAt,
  };
}

export function toChatConversation(
  conversation: ConversationRecord,
  members: ConversationMemberRecord[],
): ChatConversation {
  return {
    id: conversation.id,
    kind: conversation.kind,
    title: conversation.title,
    createdBy: conversation.createdBy,
    createdAt: conversation.createdAt,
    lastActivityAt: conversation.lastActivityAt,
    archivedAt: conversation.archivedAt,
    members: members.map(toChatMember),
  };
}
