import type { ChatMessage, HistoryEntry } from "@askshell/core";
import { z } from "zod";

// ============================================================================
// SCHEMAS
// ============================================================================

const historyEntrySchema = z.object({
  sequenceNumber: z.number().int().positive(),
  text: z.string().min(1),
  timestamp: z.string().min(1),
  origin: z.enum(["generated", "corrected", "history-replay"]),
});

const chatHistorySchema = z.object({
  messages: z.array(
    z.object({
      role: z.enum(["user", "assistant"]),
      content: z.string(),
    }),
  ),
});

// ============================================================================
// PARSING
// ============================================================================

/**
 * Parse one JSON Lines record. Returns undefined for anything that is not a
 * well-formed entry.
 */
export function parseHistoryLine(line: string): HistoryEntry | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  const result = historyEntrySchema.safeParse(raw);
  return result.success ? result.data : undefined;
}

export function serializeHistoryEntry(entry: HistoryEntry): string {
  return `${JSON.stringify({
    sequenceNumber: entry.sequenceNumber,
    text: entry.text,
    timestamp: entry.timestamp,
    origin: entry.origin,
  })}\n`;
}

/** Messages of a saved conversation, or undefined when the document is malformed. */
export function parseChatHistory(text: string): ChatMessage[] | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }
  const result = chatHistorySchema.safeParse(raw);
  return result.success ? result.data.messages : undefined;
}

export function serializeChatHistory(messages: readonly ChatMessage[]): string {
  const kept = messages
    .filter((message) => message.role !== "system")
    .map((message) => ({ role: message.role, content: message.content }));
  return `${JSON.stringify({ messages: kept }, null, 2)}\n`;
}
