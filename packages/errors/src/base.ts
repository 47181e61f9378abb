import {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";
import type { AskshellErrorOptions } from "./types.js";

/**
 * Serialized form of an {@link AskshellError}.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly exitCode: number;
  readonly metadata?: Readonly<Record<string, string>>;
  readonly cause?: string;
}

/**
 * Root of the askshell error hierarchy.
 *
 * Catalog fields (domain, exitCode, isExpected) are filled from
 * {@link ERROR_CATALOG} so subclasses only declare their code and `_tag`.
 */
export abstract class AskshellError<C extends ErrorCode = ErrorCode> extends Error {
  abstract readonly _tag: BaseErrorType;
  readonly code: C;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly exitCode: number;
  readonly metadata: Readonly<Record<string, string>> | undefined;

  protected constructor(options: AskshellErrorOptions<C>) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    const entry: ErrorCatalogEntry = ERROR_CATALOG[options.code];
    this.name = new.target.name;
    this.code = options.code;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.exitCode = entry.exitCode;
    this.metadata = options.metadata ? Object.freeze({ ...options.metadata }) : undefined;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      exitCode: this.exitCode,
      ...(this.metadata ? { metadata: this.metadata } : {}),
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
    };
  }
}

/** Check if a value is an Error instance */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/** Check if a value belongs to the askshell error hierarchy */
export function isAskshellError(value: unknown): value is AskshellError {
  return value instanceof AskshellError;
}
