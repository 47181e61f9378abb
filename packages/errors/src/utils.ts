import { AskshellError } from "./base.js";
import { EXIT_CODES } from "./catalog.js";
import { InternalError } from "./internal.js";

/**
 * Wrap an unknown error into an AskshellError.
 * If the error is already an AskshellError, return it as-is.
 * Otherwise, wrap it in an InternalError.
 */
export function wrapError(error: unknown): AskshellError {
  if (error instanceof AskshellError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, { originalName: error.name }, error);
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError(message);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Process exit code for an error reaching the top level.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof AskshellError ? error.exitCode : EXIT_CODES.SOFTWARE;
}
