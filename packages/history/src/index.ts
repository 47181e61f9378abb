/**
 * @askshell/history
 *
 * History Ledger: append-only JSON Lines store, shell history mirroring,
 * replay and the saved chat conversation.
 */

export const PACKAGE_NAME = "@askshell/history" as const;

export {
  FileChatStore,
  type FileChatStoreOptions,
  MAX_CHAT_MESSAGES,
  MAX_CHAT_WORDS,
  trimConversation,
} from "./chat-store.js";
export { FileHistoryLedger, type FileHistoryLedgerOptions } from "./file-ledger.js";
export { replayPlan } from "./replay.js";
export {
  formatHistoryRecord,
  resolveShellHistory,
  type ShellHistoryFormat,
  ShellHistoryMirror,
  type ShellHistoryMirrorOptions,
  type ShellHistoryTarget,
} from "./shell-history.js";
export { parseChatHistory, parseHistoryLine, serializeChatHistory, serializeHistoryEntry } from "./validation.js";
