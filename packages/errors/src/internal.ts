import { AskshellError } from "./base.js";
import type { InternalCodes } from "./types.js";

/**
 * Unexpected failures: bugs, or foreign errors wrapped by {@link wrapError}.
 */
export class InternalError extends AskshellError<InternalCodes> {
  readonly _tag = "InternalError" as const;

  constructor(message: string, metadata?: Record<string, string>, cause?: unknown) {
    super({ code: "INTERNAL_ERROR", message, metadata, cause });
  }
}
