/**
 * CLI pipeline: parse args -> load config -> build session -> run command.
 */

import { homedir } from "node:os";
import type { ConfigOverrides } from "@askshell/core";
import { exitCodeFor, isExpectedError, UsageError, wrapError } from "@askshell/errors";
import { CONTEXT_KINDS, CONTEXT_LABELS, type ContextKind } from "@askshell/executor";
import { BOOLEAN_FLAGS, parseArgv, VALUE_FLAGS } from "./args.js";
import { TerminalApprover } from "./approver.js";
import { chat } from "./commands/chat.js";
import { setConfig, showConfig } from "./commands/config.js";
import { showHistory } from "./commands/history.js";
import { showPatterns } from "./commands/patterns.js";
import { replay } from "./commands/replay.js";
import { runRequest } from "./commands/run.js";
import { errorHint } from "./render.js";
import { type CliDeps, createSession } from "./session.js";
import { processTerminal } from "./terminal.js";

export const VERSION = "0.1.0";

export const DEFAULT_HISTORY_COUNT = 20;

export type CliCommand =
  | { readonly kind: "run"; readonly request: string }
  | { readonly kind: "history"; readonly count: number }
  | { readonly kind: "replay"; readonly sequenceNumber: number }
  | { readonly kind: "patterns"; readonly command?: string }
  | { readonly kind: "chat"; readonly message?: string; readonly fresh: boolean }
  | { readonly kind: "config-show" }
  | { readonly kind: "config-set"; readonly key: string; readonly value: string }
  | { readonly kind: "help" }
  | { readonly kind: "version" };

export interface CliArgs {
  readonly command: CliCommand;
  readonly explain: boolean;
  readonly alternatives: number;
  /** Machine context to send with the request. */
  readonly context?: ContextKind;
  readonly verbose: boolean;
  readonly overrides: ConfigOverrides;
}

const SUBCOMMANDS = new Set(["history", "replay", "patterns", "config", "chat"]);

export function parseArgs(argv: readonly string[]): CliArgs {
  const { positionals, flags } = parseArgv(argv);

  for (const [key, value] of Object.entries(flags)) {
    if (BOOLEAN_FLAGS.has(key)) {
      if (typeof value === "string") throw new UsageError(`--${key} does not take a value`);
    } else if (VALUE_FLAGS.has(key)) {
      if (typeof value !== "string") throw new UsageError(`--${key} needs a value`);
    } else {
      throw new UsageError(`unknown option --${key}`);
    }
  }

  const str = (key: string): string | undefined => {
    const value = flags[key];
    return typeof value === "string" ? value : undefined;
  };
  const bool = (key: string): boolean | undefined => {
    const value = flags[key];
    return typeof value === "boolean" ? value : undefined;
  };

  const safetyMode = str("safety-mode");
  if (safetyMode !== undefined && safetyMode !== "0" && safetyMode !== "1") {
    throw new UsageError(`--safety-mode must be 0 or 1, got "${safetyMode}"`);
  }
  const alternatives = str("alternatives");
  const autocorrect = bool("autocorrect");
  const multiStep = bool("multi-step");
  const maxAttempts = str("max-attempts");
  const model = str("model");
  const context = str("context");

  // A subcommand is the first positional, unless it comes after "--".
  const first = positionals[0];
  const separator = argv.indexOf("--");
  const subcommand =
    first !== undefined && SUBCOMMANDS.has(first) && (separator === -1 || argv.indexOf(first) < separator)
      ? first
      : undefined;

  let command: CliCommand;
  if (flags.help === true) {
    command = { kind: "help" };
  } else if (flags.version === true) {
    command = { kind: "version" };
  } else {
    command = parseCommand(subcommand, subcommand ? positionals.slice(1) : positionals, flags.new === true);
  }
  if (flags.new === true && command.kind !== "chat") {
    throw new UsageError("--new only applies to askshell chat");
  }

  return {
    command,
    explain: flags.explain === true,
    alternatives: alternatives === undefined ? 0 : parseCount("--alternatives", alternatives, 0),
    ...(context !== undefined ? { context: parseContext(context) } : {}),
    verbose: flags.verbose === true,
    overrides: {
      ...(safetyMode !== undefined ? { safetyMode } : {}),
      ...(autocorrect !== undefined ? { autocorrect } : {}),
      ...(multiStep !== undefined ? { multiStep } : {}),
      ...(maxAttempts !== undefined ? { maxCorrectAttempts: maxAttempts } : {}),
      ...(model !== undefined ? { model } : {}),
    },
  };
}

function parseCommand(subcommand: string | undefined, rest: readonly string[], fresh: boolean): CliCommand {
  switch (subcommand) {
    case "history":
      return {
        kind: "history",
        count: rest[0] === undefined ? DEFAULT_HISTORY_COUNT : parseCount("history count", rest[0], 1),
      };
    case "replay":
      if (rest[0] === undefined) throw new UsageError("replay needs a history number");
      return { kind: "replay", sequenceNumber: parseCount("history number", rest[0].replace(/^#/, ""), 1) };
    case "patterns":
      return rest.length > 0 ? { kind: "patterns", command: rest.join(" ") } : { kind: "patterns" };
    case "config": {
      const [action, key, ...value] = rest;
      if (action === undefined || action === "show") return { kind: "config-show" };
      if (action === "set" && key !== undefined && value.length > 0) {
        return { kind: "config-set", key, value: value.join(" ") };
      }
      throw new UsageError("usage: askshell config [show | set <key> <value>]");
    }
    case "chat": {
      const message = rest.join(" ").trim();
      return message ? { kind: "chat", message, fresh } : { kind: "chat", fresh };
    }
    default: {
      const request = rest.join(" ").trim();
      return request ? { kind: "run", request } : { kind: "help" };
    }
  }
}

function parseContext(raw: string): ContextKind {
  const kind = /^\d+$/.test(raw) ? CONTEXT_KINDS[Number(raw)] : undefined;
  if (kind === undefined) {
    throw new UsageError(`--context must be a number from 0 to ${CONTEXT_KINDS.length - 1}, got "${raw}"`);
  }
  return kind;
}

function parseCount(what: string, raw: string, min: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new UsageError(`${what} must be an integer of at least ${min}, got "${raw}"`);
  }
  return value;
}

export function helpText(): string {
  return `
  askshell - Turn a plain-language request into shell commands, checked before they run

  Usage:
    askshell [options] <request...>
    askshell history [count]            Show recent commands (default ${DEFAULT_HISTORY_COUNT})
    askshell replay <n>                 Run history entry n again
    askshell patterns [command]         Pattern counts, or how a command classifies
    askshell config [show]              Show the effective configuration
    askshell config set <key> <value>   Change a value in config.json
    askshell chat [--new] [message...]  Talk with the model; nothing is run
    askshell -- <request...>            Request starting with a subcommand name

  Options:
    -e, --explain                 Explain each command before asking
    -m, --multi-step              Ask for a sequence of commands
        --autocorrect             Ask the model to fix failing commands
        --no-autocorrect          Stop at the first failure
        --max-attempts <n>        Correction attempts per failure (1-10)
        --safety-mode <0|1>       0 confirms everything, 1 auto-runs safe commands
    -n, --alternatives <n>        Offer n alternatives when a command is declined
    -C, --context <n>             Send facts about this machine with the request:
${contextHelp()}
        --new                     Start a new chat, forgetting the saved one
        --model <name>            Model to ask
    -v, --verbose                 Debug logging (also ASKSHELL_DEBUG=1)
    -h, --help                    Show this help message
        --version                 Show the version
`;
}

function contextHelp(): string {
  return CONTEXT_KINDS.map((kind, index) => `                                    ${index}  ${CONTEXT_LABELS[kind]}`).join("\n");
}

export function defaultDeps(): CliDeps {
  const terminal = processTerminal();
  return {
    env: process.env,
    platform: process.platform,
    home: homedir(),
    terminal,
    approver: new TerminalApprover(terminal),
  };
}

/**
 * Run one invocation and return the process exit code. Errors never escape:
 * they are printed as `CODE: message`, with a hint where one applies, and
 * mapped to an exit code.
 */
export async function main(argv: readonly string[], deps: CliDeps = defaultDeps()): Promise<number> {
  let verbose = false;
  try {
    const args = parseArgs(argv);
    verbose = args.verbose;
    return await dispatch(args, deps);
  } catch (error) {
    const wrapped = wrapError(error);
    deps.terminal.printError(`${deps.terminal.colors.red(wrapped.code)}: ${wrapped.message}`);
    const hint = errorHint(wrapped);
    if (hint) deps.terminal.printError(deps.terminal.colors.dim(hint));
    // Unexpected errors are bugs; their stack is always worth showing.
    if ((verbose || !isExpectedError(wrapped)) && wrapped.stack) {
      deps.terminal.printError(deps.terminal.colors.dim(wrapped.stack));
    }
    return exitCodeFor(wrapped);
  }
}

async function dispatch(args: CliArgs, deps: CliDeps): Promise<number> {
  const { command } = args;
  switch (command.kind) {
    case "help":
      deps.terminal.print(helpText());
      return 0;
    case "version":
      deps.terminal.print(VERSION);
      return 0;
    case "config-show":
      return showConfig(deps);
    case "config-set":
      return setConfig(deps, command.key, command.value);
    default:
      break;
  }

  const session = await createSession(deps, { overrides: args.overrides, verbose: args.verbose });
  switch (command.kind) {
    case "run":
      return runRequest(session, command.request, {
        explain: args.explain,
        alternatives: args.alternatives,
        ...(args.context !== undefined ? { context: args.context } : {}),
      });
    case "history":
      return showHistory(session, command.count);
    case "replay":
      return replay(session, command.sequenceNumber);
    case "patterns":
      return showPatterns(session, command.command);
    case "chat":
      return chat(session, { fresh: command.fresh, ...(command.message ? { message: command.message } : {}) });
  }
}
