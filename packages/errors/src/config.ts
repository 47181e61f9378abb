import { AskshellError } from "./base.js";

// ---------------------------------------------------------------------------
// Configuration invalid
// ---------------------------------------------------------------------------

export interface ConfigurationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Thrown when config.json, an environment override or a flag holds a value
 * the configuration schema rejects.
 */
export class ConfigurationError extends AskshellError<"CONFIG_INVALID"> {
  readonly _tag = "ValidationError" as const;
  readonly issues: readonly ConfigurationIssue[];
  readonly source: string;

  constructor(source: string, issues: readonly ConfigurationIssue[], cause?: unknown) {
    const detail = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ");
    super({
      code: "CONFIG_INVALID",
      message: `Invalid configuration in ${source}: ${detail}`,
      metadata: { source },
      cause,
    });
    this.source = source;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// API key missing
// ---------------------------------------------------------------------------

/**
 * Thrown when a model request is attempted without an API key.
 */
export class ModelApiKeyMissingError extends AskshellError<"MODEL_API_KEY_MISSING"> {
  readonly _tag = "ValidationError" as const;

  constructor(configPath: string) {
    super({
      code: "MODEL_API_KEY_MISSING",
      message: `No API key configured. Set ASKSHELL_API_KEY or run: askshell config set model.apiKey <key> (writes ${configPath})`,
      metadata: { configPath },
    });
  }
}

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

/**
 * Thrown when the command line cannot be understood.
 */
export class UsageError extends AskshellError<"USAGE_INVALID"> {
  readonly _tag = "ValidationError" as const;

  constructor(message: string) {
    super({ code: "USAGE_INVALID", message });
  }
}
