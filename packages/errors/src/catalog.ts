/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised anywhere in askshell is declared here. Each code
 * maps to a base error type, a domain, and the process exit code the CLI
 * uses when the error reaches the top level.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: config, safety, execution, history, model, cli, internal
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "PermissionError"
  | "RateLimitError"
  | "ExternalError"
  | "InternalError";

/**
 * Exit codes follow sysexits(3) where one fits.
 */
export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  DECLINED: 2,
  USAGE: 64,
  UNAVAILABLE: 69,
  SOFTWARE: 70,
  IO: 74,
  CONFIG: 78,
} as const;

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    baseType: "InternalError" as const,
    exitCode: EXIT_CODES.SOFTWARE,
    isExpected: false,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // CONFIGURATION
  // ============================================================================
  CONFIG_INVALID: {
    domain: "config",
    baseType: "ValidationError" as const,
    exitCode: EXIT_CODES.CONFIG,
    isExpected: true,
    title: "Invalid configuration",
    description: "The configuration file or an override contains an invalid value",
  },
  MODEL_API_KEY_MISSING: {
    domain: "config",
    baseType: "ValidationError" as const,
    exitCode: EXIT_CODES.CONFIG,
    isExpected: true,
    title: "Model API key missing",
    description: "No API key is configured for the language model endpoint",
  },

  // ============================================================================
  // SAFETY
  // ============================================================================
  PATTERN_SOURCE_UNREADABLE: {
    domain: "safety",
    baseType: "ValidationError" as const,
    exitCode: EXIT_CODES.CONFIG,
    isExpected: true,
    title: "Pattern source unreadable",
    description: "A dangerous or safe pattern file could not be read",
  },
  PATTERN_SYNTAX_INVALID: {
    domain: "safety",
    baseType: "ValidationError" as const,
    exitCode: EXIT_CODES.CONFIG,
    isExpected: true,
    title: "Invalid pattern",
    description: "A line in a pattern file is not a valid regular expression",
  },

  // ============================================================================
  // EXECUTION
  // ============================================================================
  COMMAND_DECLINED: {
    domain: "execution",
    baseType: "PermissionError" as const,
    exitCode: EXIT_CODES.DECLINED,
    isExpected: true,
    title: "Command declined",
    description: "The user declined a plan or a step that required confirmation",
  },
  CORRECTION_EXHAUSTED: {
    domain: "execution",
    baseType: "ExternalError" as const,
    exitCode: EXIT_CODES.FAILURE,
    isExpected: true,
    title: "Correction attempts exhausted",
    description: "Every auto-correct attempt for a failing step was used without success",
  },

  // ============================================================================
  // HISTORY
  // ============================================================================
  HISTORY_IO_FAILED: {
    domain: "history",
    baseType: "ExternalError" as const,
    exitCode: EXIT_CODES.IO,
    isExpected: false,
    title: "History I/O failed",
    description: "The history ledger could not be read or written",
  },
  HISTORY_ENTRY_NOT_FOUND: {
    domain: "history",
    baseType: "NotFoundError" as const,
    exitCode: EXIT_CODES.USAGE,
    isExpected: true,
    title: "History entry not found",
    description: "No history entry has the requested sequence number",
  },

  // ============================================================================
  // MODEL
  // ============================================================================
  MODEL_REQUEST_FAILED: {
    domain: "model",
    baseType: "ExternalError" as const,
    exitCode: EXIT_CODES.UNAVAILABLE,
    isExpected: false,
    title: "Model request failed",
    description: "The language model endpoint returned an error or could not be reached",
  },
  MODEL_RATE_LIMITED: {
    domain: "model",
    baseType: "RateLimitError" as const,
    exitCode: EXIT_CODES.UNAVAILABLE,
    isExpected: true,
    title: "Model rate limited",
    description: "The language model endpoint rejected the request with HTTP 429",
  },
  MODEL_EMPTY_RESPONSE: {
    domain: "model",
    baseType: "ExternalError" as const,
    exitCode: EXIT_CODES.UNAVAILABLE,
    isExpected: false,
    title: "Empty model response",
    description: "The language model returned no usable content",
  },

  // ============================================================================
  // CLI
  // ============================================================================
  USAGE_INVALID: {
    domain: "cli",
    baseType: "ValidationError" as const,
    exitCode: EXIT_CODES.USAGE,
    isExpected: true,
    title: "Invalid usage",
    description: "The command line could not be understood",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
