import type { ChatMessage } from "@askshell/core";

export type { ChatMessage, ChatRole } from "@askshell/core";

/** Sampling parameters sent with a chat-completions request. */
export interface CompletionParams {
  readonly maxTokens: number;
  readonly temperature: number;
  /** Number of choices to ask for. */
  readonly n?: number;
}

export interface ChatCompletionRequest {
  readonly messages: readonly ChatMessage[];
  readonly params: CompletionParams;
}

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Longest stderr tail forwarded to the model with a correction request. */
export const MAX_STDERR_CHARS = 4_000;
