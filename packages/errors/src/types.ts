/**
 * Construction options shared by every askshell error.
 */

import type { CodesForBase, ErrorCode } from "./catalog.js";

/**
 * Options for constructing an error.
 * The code determines domain, exit code and isExpected via catalog lookup.
 */
export interface AskshellErrorOptions<C extends ErrorCode> {
  code: C;
  message: string;
  metadata?: Record<string, string> | undefined;
  cause?: unknown;
}

export type ValidationCodes = CodesForBase<"ValidationError">;
export type NotFoundCodes = CodesForBase<"NotFoundError">;
export type PermissionCodes = CodesForBase<"PermissionError">;
export type RateLimitCodes = CodesForBase<"RateLimitError">;
export type ExternalCodes = CodesForBase<"ExternalError">;
export type InternalCodes = CodesForBase<"InternalError">;
