import { chmod, mkdir, readFile, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigurationError, type ConfigurationIssue, getErrorMessage } from "@askshell/errors";
import { type ZodError, z } from "zod";
import type { AskshellConfig, SafetyMode } from "./types.js";

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const CONFIG_FILE_NAME = "config.json";
export const HISTORY_FILE_NAME = "history.jsonl";
export const CHAT_HISTORY_FILE_NAME = "chat.json";
export const DEFAULT_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_MODEL = "gpt-4o-mini";
export const DEFAULT_MODEL_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_CORRECT_ATTEMPTS = 3;
export const MAX_CORRECT_ATTEMPTS_LIMIT = 10;

/** Environment variables read by {@link resolveConfig}. */
export type Environment = Readonly<Record<string, string | undefined>>;

/** Values taken from command-line flags; they win over env and file. */
export interface ConfigOverrides {
  readonly safetyMode?: string;
  readonly autocorrect?: boolean;
  readonly multiStep?: boolean;
  readonly maxCorrectAttempts?: string;
  readonly model?: string;
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const maxCorrectAttemptsSchema = z
  .number()
  .int()
  .min(1, { message: "maxCorrectAttempts must be between 1 and 10" })
  .max(MAX_CORRECT_ATTEMPTS_LIMIT, { message: "maxCorrectAttempts must be between 1 and 10" });

const fileConfigSchema = z
  .object({
    // Checked leniently in resolveSafetyMode: anything but 1 means "always ask".
    safetyMode: z.unknown().optional(),
    autocorrect: z.boolean().optional(),
    multiStep: z.boolean().optional(),
    maxCorrectAttempts: maxCorrectAttemptsSchema.optional(),
    model: z
      .object({
        apiKey: z.string().min(1).optional(),
        baseUrl: z.string().url({ message: "baseUrl must be a URL" }).optional(),
        name: z.string().min(1).optional(),
        timeoutMs: z
          .number()
          .int()
          .positive({ message: "timeoutMs must be a positive integer" })
          .optional(),
      })
      .strict()
      .optional(),
    patterns: z
      .object({
        dangerousFile: z.string().min(1).optional(),
        safeFile: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    history: z
      .object({
        enabled: z.boolean().optional(),
        file: z.string().min(1).optional(),
        mirrorShellHistory: z.boolean().optional(),
      })
      .strict()
      .optional(),
    shell: z.string().min(1).optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

const safetyModeSchema = z
  .preprocess(
    (value) => (typeof value === "string" ? value.trim() : value),
    z.union([z.literal(0), z.literal(1), z.literal("0"), z.literal("1")]),
  )
  .transform((value): SafetyMode => (value === 1 || value === "1" ? 1 : 0))
  .catch(0);

const TRUE_WORDS = new Set(["1", "true", "yes", "on"]);
const FALSE_WORDS = new Set(["0", "false", "no", "off", ""]);

function toIssues(error: ZodError): ConfigurationIssue[] {
  return error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Fail-safe reading of the safety mode: any value other than 1 selects
 * mode 0 (always confirm).
 */
export function resolveSafetyMode(value: unknown): SafetyMode {
  return safetyModeSchema.parse(value);
}

function parseBooleanEnv(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  throw new ConfigurationError("environment", [
    { path: name, message: `expected a boolean (true/false), got "${value}"` },
  ]);
}

function parseAttempts(source: string, path: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const result = z.coerce.number().pipe(maxCorrectAttemptsSchema).safeParse(value.trim());
  if (!result.success) {
    throw new ConfigurationError(source, [
      { path, message: `maxCorrectAttempts must be an integer between 1 and 10, got "${value}"` },
    ]);
  }
  return result.data;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Validate the parsed contents of config.json.
 * Throws ConfigurationError listing every issue.
 */
export function parseFileConfig(raw: unknown, source: string): FileConfig {
  const result = fileConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(source, toIssues(result.error));
  }
  return result.data;
}

export interface ConfigSources {
  /** Directory holding config.json and the default history file. */
  readonly configDir: string;
  /** Parsed contents of config.json, if one exists. */
  readonly file?: unknown;
  readonly env?: Environment;
  readonly overrides?: ConfigOverrides;
}

/**
 * Merge defaults, config.json, environment and flags (lowest to highest
 * precedence) into one frozen configuration value.
 */
export function resolveConfig(sources: ConfigSources): AskshellConfig {
  const file = parseFileConfig(sources.file ?? {}, join(sources.configDir, CONFIG_FILE_NAME));
  const env = sources.env ?? {};
  const overrides = sources.overrides ?? {};

  const safetyMode = resolveSafetyMode(
    overrides.safetyMode ?? nonEmpty(env.ASKSHELL_SAFETY_MODE) ?? file.safetyMode ?? 0,
  );
  const autocorrect =
    overrides.autocorrect ??
    parseBooleanEnv("ASKSHELL_AUTOCORRECT", env.ASKSHELL_AUTOCORRECT) ??
    file.autocorrect ??
    true;
  const multiStep =
    overrides.multiStep ??
    parseBooleanEnv("ASKSHELL_MULTI_STEP", env.ASKSHELL_MULTI_STEP) ??
    file.multiStep ??
    false;
  const maxCorrectAttempts =
    parseAttempts("command line", "--max-attempts", overrides.maxCorrectAttempts) ??
    parseAttempts("environment", "ASKSHELL_MAX_CORRECT_ATTEMPTS", env.ASKSHELL_MAX_CORRECT_ATTEMPTS) ??
    file.maxCorrectAttempts ??
    DEFAULT_MAX_CORRECT_ATTEMPTS;

  const apiKey =
    nonEmpty(env.ASKSHELL_API_KEY) ?? nonEmpty(env.OPENAI_API_KEY) ?? file.model?.apiKey;
  const baseUrl = nonEmpty(env.ASKSHELL_BASE_URL) ?? file.model?.baseUrl ?? DEFAULT_BASE_URL;
  const modelName =
    nonEmpty(overrides.model) ?? nonEmpty(env.ASKSHELL_MODEL) ?? file.model?.name ?? DEFAULT_MODEL;

  const historyEnabled = env.NOHISTORY === undefined && (file.history?.enabled ?? true);

  return Object.freeze({
    safetyMode,
    autocorrect,
    multiStep,
    maxCorrectAttempts,
    model: Object.freeze({
      ...(apiKey ? { apiKey } : {}),
      baseUrl: baseUrl.replace(/\/+$/, ""),
      name: modelName,
      timeoutMs: file.model?.timeoutMs ?? DEFAULT_MODEL_TIMEOUT_MS,
    }),
    patterns: Object.freeze({
      ...(file.patterns?.dangerousFile ? { dangerousFile: file.patterns.dangerousFile } : {}),
      ...(file.patterns?.safeFile ? { safeFile: file.patterns.safeFile } : {}),
    }),
    history: Object.freeze({
      enabled: historyEnabled,
      file: file.history?.file ?? join(sources.configDir, HISTORY_FILE_NAME),
      mirrorShellHistory: historyEnabled && (file.history?.mirrorShellHistory ?? true),
    }),
    ...(file.shell ? { shell: file.shell } : {}),
  });
}

// ---------------------------------------------------------------------------
// Locations
// ---------------------------------------------------------------------------

/**
 * Per-platform config directory, overridable with ASKSHELL_HOME.
 */
export function resolveConfigDir(
  env: Environment,
  platform: NodeJS.Platform = process.platform,
  home: string = homedir(),
): string {
  const override = nonEmpty(env.ASKSHELL_HOME);
  if (override) return override;
  switch (platform) {
    case "linux":
      return join(home, ".cache", "askshell");
    case "darwin":
      return join(home, "Library", "Caches", "askshell");
    case "win32":
      return join(home, "AppData", "Local", "askshell");
    default:
      return join(home, ".askshell");
  }
}

// ---------------------------------------------------------------------------
// File I/O
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === "ENOENT";
}

/**
 * Read and JSON-parse config.json. A missing file yields an empty object.
 */
export async function readConfigFile(configDir: string): Promise<Record<string, unknown>> {
  const path = join(configDir, CONFIG_FILE_NAME);
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return {};
    throw new ConfigurationError(path, [{ path: "", message: getErrorMessage(error) }], error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(path, [{ path: "", message: getErrorMessage(error) }], error);
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(path, [{ path: "", message: "expected a JSON object" }]);
  }
  return parsed;
}

export interface LoadConfigOptions {
  readonly env: Environment;
  readonly overrides?: ConfigOverrides;
  /** Skip the platform lookup. */
  readonly configDir?: string;
}

export interface LoadedConfig {
  readonly config: AskshellConfig;
  readonly configDir: string;
  readonly configPath: string;
}

export async function loadConfig(options: LoadConfigOptions): Promise<LoadedConfig> {
  const configDir = options.configDir ?? resolveConfigDir(options.env);
  const file = await readConfigFile(configDir);
  const config = resolveConfig({
    configDir,
    file,
    env: options.env,
    ...(options.overrides ? { overrides: options.overrides } : {}),
  });
  return { config, configDir, configPath: join(configDir, CONFIG_FILE_NAME) };
}

// ---------------------------------------------------------------------------
// Editing
// ---------------------------------------------------------------------------

/** Keys accepted by `askshell config set`. */
export const CONFIG_KEYS = [
  "safetyMode",
  "autocorrect",
  "multiStep",
  "maxCorrectAttempts",
  "model.apiKey",
  "model.baseUrl",
  "model.name",
  "model.timeoutMs",
  "patterns.dangerousFile",
  "patterns.safeFile",
  "history.enabled",
  "history.file",
  "history.mirrorShellHistory",
  "shell",
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

/** JSON literals become their value; anything else stays a string. */
function parseValue(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return typeof value === "object" && value !== null ? text : value;
  } catch {
    return text;
  }
}

/**
 * Return a copy of `raw` with `key` set to `value`, validated against the
 * config.json schema. Unlike config loading, an out-of-range safetyMode
 * is rejected here.
 */
export function setConfigValue(
  raw: Readonly<Record<string, unknown>>,
  key: string,
  value: string,
): Record<string, unknown> {
  if (!isConfigKey(key)) {
    throw new ConfigurationError("command line", [
      { path: key, message: `unknown key; expected one of ${CONFIG_KEYS.join(", ")}` },
    ]);
  }

  const parsedValue = parseValue(value);
  if (key === "safetyMode" && parsedValue !== 0 && parsedValue !== 1) {
    throw new ConfigurationError("command line", [
      { path: key, message: `safetyMode must be 0 or 1, got "${value}"` },
    ]);
  }

  const next: Record<string, unknown> = { ...raw };
  const [head, tail] = key.split(".");
  if (head === undefined) return next;
  if (tail === undefined) {
    next[head] = parsedValue;
  } else {
    const section = next[head];
    next[head] = { ...(isRecord(section) ? section : {}), [tail]: parsedValue };
  }

  parseFileConfig(next, "command line");
  return next;
}

/**
 * Write config.json, creating the directory when needed. The file may hold
 * an API key, so it is left readable by the owner only, including when it
 * already existed with wider permissions.
 */
export async function writeConfigFile(
  configDir: string,
  raw: Readonly<Record<string, unknown>>,
): Promise<string> {
  const path = join(configDir, CONFIG_FILE_NAME);
  await mkdir(configDir, { recursive: true });
  await writeFile(path, `${JSON.stringify(raw, null, 2)}\n`, { encoding: "utf-8", mode: 0o600 });
  await chmod(path, 0o600);
  return path;
}

/** Config with the API key masked, for display. */
export function redactConfig(config: AskshellConfig): AskshellConfig {
  const { apiKey, ...model } = config.model;
  return {
    ...config,
    model: { ...model, ...(apiKey ? { apiKey: `${apiKey.slice(0, 3)}…${apiKey.slice(-2)}` } : {}) },
  };
}
