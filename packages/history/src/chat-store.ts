/**
 * Conversation kept between `askshell chat` runs, stored as one JSON
 * document next to the command history. Only user and assistant turns are
 * kept; the system message is rebuilt for every request.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ChatMessage, Logger } from "@askshell/core";
import { HistoryIOError } from "@askshell/errors";
import { parseChatHistory, serializeChatHistory } from "./validation.js";

/** Messages kept on disk. */
export const MAX_CHAT_MESSAGES = 50;

/** Words of conversation sent with one request. */
export const MAX_CHAT_WORDS = 2_000;

export interface FileChatStoreOptions {
  readonly path: string;
  readonly logger: Logger;
  readonly limit?: number;
}

/**
 * Best-effort store: failures are logged and never reach the conversation.
 */
export class FileChatStore {
  readonly path: string;
  private readonly logger: Logger;
  private readonly limit: number;

  constructor(options: FileChatStoreOptions) {
    this.path = options.path;
    this.logger = options.logger;
    this.limit = options.limit ?? MAX_CHAT_MESSAGES;
  }

  /** Saved messages, oldest first. Empty when nothing readable is saved. */
  async load(): Promise<ChatMessage[]> {
    let text: string;
    try {
      text = await fs.readFile(this.path, "utf-8");
    } catch (error) {
      if (isNotFound(error)) return [];
      this.logger.warn(new HistoryIOError("read", this.path, error).message);
      return [];
    }
    const messages = parseChatHistory(text);
    if (!messages) {
      this.logger.warn(`ignoring malformed chat history in ${this.path}`);
      return [];
    }
    return messages;
  }

  /** Replace the saved conversation with the last `limit` messages. */
  async save(conversation: readonly ChatMessage[]): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.path), { recursive: true });
      await fs.writeFile(this.path, serializeChatHistory(conversation.slice(-this.limit)), {
        encoding: "utf-8",
        mode: 0o600,
      });
      await fs.chmod(this.path, 0o600);
    } catch (error) {
      this.logger.warn(new HistoryIOError("write", this.path, error).message);
    }
  }

  async clear(): Promise<void> {
    try {
      await fs.rm(this.path, { force: true });
    } catch (error) {
      this.logger.warn(new HistoryIOError("clear", this.path, error).message);
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * The most recent part of a conversation that fits in `maxWords`. The last
 * message is always kept, and the result never starts with an assistant turn.
 */
export function trimConversation(
  conversation: readonly ChatMessage[],
  maxWords: number = MAX_CHAT_WORDS,
): ChatMessage[] {
  const kept = [...conversation];
  let words = kept.reduce((total, message) => total + wordCount(message.content), 0);
  while (kept.length > 1) {
    const first = kept[0];
    if (!first || (words <= maxWords && first.role !== "assistant")) break;
    kept.shift();
    words -= wordCount(first.content);
  }
  return kept;
}
