import { AskshellError } from "./base.js";
import type { ErrorCode } from "./catalog.js";

// ---------------------------------------------------------------------------
// Base class for all pattern errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for pattern-store errors.
 *
 * Enables generic catch: `if (e instanceof PatternError)`
 * while specific subclasses allow precise handling.
 */
export abstract class PatternError<C extends ErrorCode = ErrorCode> extends AskshellError<C> {}

// ---------------------------------------------------------------------------
// Source unreadable
// ---------------------------------------------------------------------------

/**
 * Raised when a pattern file cannot be read. The pattern store recovers
 * from it by treating the source as empty and marking the set degraded.
 */
export class PatternSourceError extends PatternError<"PATTERN_SOURCE_UNREADABLE"> {
  readonly _tag = "ValidationError" as const;
  readonly source: string;

  constructor(source: string, reason: string, cause?: unknown) {
    super({
      code: "PATTERN_SOURCE_UNREADABLE",
      message: `Pattern source "${source}" could not be read: ${reason}`,
      metadata: { source },
      cause,
    });
    this.source = source;
  }
}

// ---------------------------------------------------------------------------
// Malformed pattern
// ---------------------------------------------------------------------------

/**
 * Raised for a pattern line that is not a valid regular expression.
 * The line is skipped; loading continues.
 */
export class PatternSyntaxError extends PatternError<"PATTERN_SYNTAX_INVALID"> {
  readonly _tag = "ValidationError" as const;
  readonly source: string;
  readonly line: number;
  readonly pattern: string;

  constructor(source: string, line: number, pattern: string, reason: string) {
    super({
      code: "PATTERN_SYNTAX_INVALID",
      message: `${source}:${line}: invalid pattern "${pattern}": ${reason}`,
      metadata: { source, line: String(line) },
    });
    this.source = source;
    this.line = line;
    this.pattern = pattern;
  }
}
