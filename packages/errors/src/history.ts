import { AskshellError } from "./base.js";

export type HistoryOperation = "read" | "append" | "mirror" | "write" | "clear";

/**
 * The ledger, the shell-history mirror or the chat history could not be
 * read or written.
 * Always logged by the caller, never propagated into command execution.
 */
export class HistoryIOError extends AskshellError<"HISTORY_IO_FAILED"> {
  readonly _tag = "ExternalError" as const;
  readonly operation: HistoryOperation;
  readonly path: string;

  constructor(operation: HistoryOperation, path: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause ?? "unknown error");
    super({
      code: "HISTORY_IO_FAILED",
      message: `History ${operation} failed for ${path}: ${reason}`,
      metadata: { operation, path },
      cause,
    });
    this.operation = operation;
    this.path = path;
  }
}

/**
 * No ledger entry carries the requested sequence number.
 */
export class HistoryEntryNotFoundError extends AskshellError<"HISTORY_ENTRY_NOT_FOUND"> {
  readonly _tag = "NotFoundError" as const;
  readonly sequenceNumber: number;

  constructor(sequenceNumber: number) {
    super({
      code: "HISTORY_ENTRY_NOT_FOUND",
      message: `History entry #${sequenceNumber} does not exist`,
      metadata: { sequenceNumber: String(sequenceNumber) },
    });
    this.sequenceNumber = sequenceNumber;
  }
}
