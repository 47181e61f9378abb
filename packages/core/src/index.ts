export const PACKAGE_NAME = "@askshell/core" as const;

export {
  CHAT_HISTORY_FILE_NAME,
  CONFIG_FILE_NAME,
  CONFIG_KEYS,
  type ConfigKey,
  type ConfigOverrides,
  type ConfigSources,
  DEFAULT_BASE_URL,
  DEFAULT_MAX_CORRECT_ATTEMPTS,
  DEFAULT_MODEL,
  DEFAULT_MODEL_TIMEOUT_MS,
  type Environment,
  type FileConfig,
  HISTORY_FILE_NAME,
  isConfigKey,
  type LoadConfigOptions,
  type LoadedConfig,
  loadConfig,
  MAX_CORRECT_ATTEMPTS_LIMIT,
  parseFileConfig,
  readConfigFile,
  redactConfig,
  resolveConfig,
  resolveConfigDir,
  resolveSafetyMode,
  setConfigValue,
  writeConfigFile,
} from "./config.js";
export type {
  Approver,
  CommandModel,
  CorrectionRequest,
  GenerateOptions,
  HistoryLedger,
  StepExecutor,
} from "./contracts.js";
export { createLogger, type Logger, type LoggerOptions, type LogLevel, silentLogger } from "./logger.js";
export { detectShell, type ShellInfo, type ShellKind, shellArgs, shellKindOf } from "./shell.js";
export type {
  AskshellConfig,
  ChatMessage,
  ChatRole,
  Classification,
  CommandStep,
  ExecutionResult,
  HistoryEntry,
  HistorySettings,
  ModelSettings,
  Pattern,
  PatternMatch,
  PatternSet,
  PatternSettings,
  Plan,
  SafetyMode,
  StepOrigin,
  Verdict,
} from "./types.js";
