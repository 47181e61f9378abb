/**
 * Type guards for base error types + code-level discrimination.
 */

import { AskshellError } from "./base.js";
import type { BaseErrorType, ErrorCode } from "./catalog.js";

function hasTag<T extends BaseErrorType>(error: unknown, tag: T): error is AskshellError & { readonly _tag: T } {
  return error instanceof AskshellError && error._tag === tag;
}

/** Check if an error is a ValidationError (bad input, config) */
export function isValidationError(error: unknown): error is AskshellError & { readonly _tag: "ValidationError" } {
  return hasTag(error, "ValidationError");
}

/** Check if an error is a NotFoundError (resource missing) */
export function isNotFoundError(error: unknown): error is AskshellError & { readonly _tag: "NotFoundError" } {
  return hasTag(error, "NotFoundError");
}

/** Check if an error is a RateLimitError */
export function isRateLimitError(error: unknown): error is AskshellError & { readonly _tag: "RateLimitError" } {
  return hasTag(error, "RateLimitError");
}

/** Check if an error is an ExternalError (dependency/runtime failure) */
export function isExternalError(error: unknown): error is AskshellError & { readonly _tag: "ExternalError" } {
  return hasTag(error, "ExternalError");
}

/**
 * Check if an error carries a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(error: unknown, code: C): error is AskshellError<C> {
  return error instanceof AskshellError && error.code === code;
}

/**
 * Check if an error is expected (user-facing, not a bug)
 */
export function isExpectedError(error: unknown): boolean {
  return error instanceof AskshellError && error.isExpected;
}
