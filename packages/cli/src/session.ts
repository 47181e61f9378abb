/**
 * Wires configuration, patterns, model, executor and history into one
 * session for a CLI invocation.
 */

import { join } from "node:path";
import {
  type AskshellConfig,
  CHAT_HISTORY_FILE_NAME,
  type CommandModel,
  type ConfigOverrides,
  createLogger,
  detectShell,
  type Environment,
  HISTORY_FILE_NAME,
  type HistoryLedger,
  type LoadedConfig,
  type Logger,
  type LoggerOptions,
  loadConfig,
  type PatternSet,
  resolveConfigDir,
  type ShellInfo,
  type StepExecutor,
} from "@askshell/core";
import {
  type CommandRunner,
  type ContextKind,
  collectContext,
  SequenceController,
  type SequenceEvent,
  ShellStepExecutor,
} from "@askshell/executor";
import { FileChatStore, FileHistoryLedger, resolveShellHistory, ShellHistoryMirror } from "@askshell/history";
import { OpenAICompatibleModel } from "@askshell/model";
import { loadPatternSet, resolvePatternSources, SafetyPolicy } from "@askshell/safety";
import type { InteractiveApprover } from "./approver.js";
import type { Terminal } from "./terminal.js";
import { UnavailableModel } from "./unavailable-model.js";

/** Process-level inputs, replaceable in tests. */
export interface CliDeps {
  readonly env: Environment;
  readonly platform: NodeJS.Platform;
  readonly home: string;
  readonly terminal: Terminal;
  readonly approver: InteractiveApprover;
  /** Directory commands run in. Defaults to process.cwd(). */
  readonly cwd?: string;
  readonly executor?: StepExecutor;
  readonly model?: CommandModel;
  /** Runs the fixed commands that gather machine context. */
  readonly contextRunner?: CommandRunner;
  readonly logSink?: LoggerOptions["sink"];
}

export interface SessionOptions {
  readonly overrides: ConfigOverrides;
  readonly verbose: boolean;
}

export interface Session {
  readonly loaded: LoadedConfig;
  readonly config: AskshellConfig;
  readonly logger: Logger;
  readonly shell: ShellInfo;
  readonly patterns: PatternSet;
  readonly policy: SafetyPolicy;
  readonly model: CommandModel;
  readonly ledger: HistoryLedger | undefined;
  /** Saved chat conversation; undefined when history is disabled. */
  readonly chatStore: FileChatStore | undefined;
  readonly controller: SequenceController;
  readonly approver: InteractiveApprover;
  readonly terminal: Terminal;
  gatherContext(kind: ContextKind): Promise<string>;
}

export function createCliLogger(deps: CliDeps, verbose: boolean): Logger {
  return createLogger("askshell", {
    verbose: verbose || Boolean(deps.env.ASKSHELL_DEBUG),
    ...(deps.logSink ? { sink: deps.logSink } : {}),
  });
}

export function loadCliConfig(deps: CliDeps, overrides: ConfigOverrides): Promise<LoadedConfig> {
  return loadConfig({
    env: deps.env,
    overrides,
    configDir: resolveConfigDir(deps.env, deps.platform, deps.home),
  });
}

export async function createSession(deps: CliDeps, options: SessionOptions): Promise<Session> {
  const loaded = await loadCliConfig(deps, options.overrides);
  const { config } = loaded;
  const logger = createCliLogger(deps, options.verbose);
  logger.debug(`config ${loaded.configPath}`);

  const shell = detectShell(deps.env, deps.platform, config.shell);
  const patterns = await loadPatternSet(resolvePatternSources(config.patterns), logger.child("patterns"));
  const policy = new SafetyPolicy(patterns, config.safetyMode);

  const model =
    deps.model ??
    (config.model.apiKey
      ? new OpenAICompatibleModel({
          apiKey: config.model.apiKey,
          baseUrl: config.model.baseUrl,
          model: config.model.name,
          timeoutMs: config.model.timeoutMs,
          logger: logger.child("model"),
          shell: shell.kind,
          platform: deps.platform,
        })
      : new UnavailableModel(loaded.configPath));

  const executor =
    deps.executor ??
    new ShellStepExecutor({
      logger: logger.child("exec"),
      shell: shell.path,
      env: deps.env,
      platform: deps.platform,
      ...(deps.cwd !== undefined ? { cwd: deps.cwd } : {}),
    });

  const ledger = createLedger(config, loaded, shell, deps, logger.child("history"));

  const chatStore = config.history.enabled
    ? new FileChatStore({ path: join(loaded.configDir, CHAT_HISTORY_FILE_NAME), logger: logger.child("chat") })
    : undefined;

  const controller = new SequenceController({
    patterns,
    executor,
    approver: deps.approver,
    model,
    logger: logger.child("sequence"),
    ...(ledger ? { ledger } : {}),
    onEvent: (event) => reportProgress(event, deps.terminal, logger),
  });

  return {
    loaded,
    config,
    logger,
    shell,
    patterns,
    policy,
    model,
    ledger,
    chatStore,
    controller,
    approver: deps.approver,
    terminal: deps.terminal,
    gatherContext: (kind) =>
      collectContext(kind, {
        platform: deps.platform,
        cwd: deps.cwd ?? process.cwd(),
        logger: logger.child("context"),
        ...(deps.contextRunner ? { run: deps.contextRunner } : {}),
      }),
  };
}

function createLedger(
  config: AskshellConfig,
  loaded: LoadedConfig,
  shell: ShellInfo,
  deps: CliDeps,
  logger: Logger,
): HistoryLedger | undefined {
  if (!config.history.enabled) return undefined;
  const target = config.history.mirrorShellHistory
    ? resolveShellHistory(shell.kind, deps.env, deps.home)
    : undefined;
  return new FileHistoryLedger({
    path: config.history.file ?? join(loaded.configDir, HISTORY_FILE_NAME),
    logger,
    ...(target ? { mirror: new ShellHistoryMirror({ target, logger: logger.child("mirror") }) } : {}),
  });
}

function reportProgress(event: SequenceEvent, terminal: Terminal, logger: Logger): void {
  const pc = terminal.colors;
  switch (event.type) {
    case "step-started":
      terminal.print(`${pc.dim("$")} ${event.step.text}`);
      break;
    case "correction-proposed":
      terminal.print(
        pc.yellow(`Trying a correction (${event.remainingAttempts} attempt(s) left): ${event.step.text}`),
      );
      break;
    case "correction-skipped":
      terminal.print(pc.yellow(`No usable correction: ${event.reason}`));
      break;
    case "step-finished":
      logger.debug(`exit ${event.result.exitCode} in ${event.result.durationMs}ms`);
      break;
    case "recorded":
      logger.debug(`recorded as #${event.entry.sequenceNumber}`);
      break;
    case "state":
      logger.debug(`plan ${event.plan.id}: ${event.state}`);
      break;
    case "step-declined":
      break;
  }
}
