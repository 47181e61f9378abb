/**
 * @askshell/errors
 *
 * Shared error taxonomy for askshell.
 *
 * Every error carries a `.code` from the catalog that discriminates the
 * specific condition, a `_tag` naming its behavioral base type, and the
 * `exitCode` the CLI exits with when the error reaches the top level.
 * Use `error.code === "XXX"` for fine-grained matching, or the `is*Error`
 * guards for category matching.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { AskshellError, type ErrorJSON, isAskshellError, isError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
  EXIT_CODES,
} from "./catalog.js";

export type {
  AskshellErrorOptions,
  ExternalCodes,
  InternalCodes,
  NotFoundCodes,
  PermissionCodes,
  RateLimitCodes,
  ValidationCodes,
} from "./types.js";

export { exitCodeFor, getErrorMessage, wrapError } from "./utils.js";

// ============================================================================
// TYPE GUARDS
// ============================================================================

export {
  hasCode,
  isExpectedError,
  isExternalError,
  isNotFoundError,
  isRateLimitError,
  isValidationError,
} from "./guards.js";

// ============================================================================
// DOMAIN ERRORS
// ============================================================================

export {
  ConfigurationError,
  type ConfigurationIssue,
  ModelApiKeyMissingError,
  UsageError,
} from "./config.js";
export { CommandDeclinedError, CorrectionExhaustedError, type DeclineScope } from "./execution.js";
export { HistoryEntryNotFoundError, HistoryIOError, type HistoryOperation } from "./history.js";
export { InternalError } from "./internal.js";
export { ModelEmptyResponseError, ModelRateLimitedError, ModelRequestError } from "./model.js";
export { PatternError, PatternSourceError, PatternSyntaxError } from "./safety.js";
