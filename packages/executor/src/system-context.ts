/**
 * Facts about the machine that can be sent along with a request: files in
 * the working directory, processes, accounts and networking. Everything is
 * read with fixed commands; nothing from the request reaches them.
 */

import { execFile as execFileCb } from "node:child_process";
import { readdir } from "node:fs/promises";
import type { Logger } from "@askshell/core";
import { getErrorMessage } from "@askshell/errors";

const DEFAULT_TIMEOUT_MS = 10_000;

/** Longest context sent to the model; output beyond it is cut. */
export const MAX_CONTEXT_CHARS = 3_000;

export type ContextKind = "files" | "processes" | "users" | "groups" | "interfaces" | "routes" | "firewall";

/** Ordered as selected on the command line: `-C 1` is processes. */
export const CONTEXT_KINDS: readonly ContextKind[] = [
  "files",
  "processes",
  "users",
  "groups",
  "interfaces",
  "routes",
  "firewall",
];

export const CONTEXT_LABELS: Readonly<Record<ContextKind, string>> = {
  files: "Files in the current directory",
  processes: "Running processes",
  users: "User accounts",
  groups: "Groups",
  interfaces: "Network interfaces",
  routes: "Routing table",
  firewall: "Firewall rules",
};

export interface HostCommand {
  readonly file: string;
  readonly args: readonly string[];
}

/** Runs a fixed command and resolves with its stdout; rejects when it fails. */
export type CommandRunner = (command: HostCommand) => Promise<string>;

interface CommandSource {
  readonly heading: string;
  /** Tried in order until one succeeds. */
  readonly commands: readonly HostCommand[];
}

const cmd = (file: string, ...args: string[]): HostCommand => ({ file, args });

function commandSource(kind: Exclude<ContextKind, "files">, platform: NodeJS.Platform): CommandSource {
  const windows = platform === "win32";
  const mac = platform === "darwin";
  switch (kind) {
    case "processes":
      return {
        heading: "The following processes are running:",
        commands: windows ? [cmd("tasklist", "/fo", "csv")] : [cmd("ps", "-A", "-o", "pid,ppid,command")],
      };
    case "users":
      return {
        heading: "The following user accounts exist:",
        commands: windows
          ? [cmd("net", "user")]
          : mac
            ? [cmd("dscl", ".", "list", "/Users")]
            : [cmd("getent", "passwd")],
      };
    case "groups":
      return {
        heading: "The following groups exist:",
        commands: windows
          ? [cmd("net", "localgroup")]
          : mac
            ? [cmd("dscl", ".", "list", "/Groups")]
            : [cmd("getent", "group")],
      };
    case "interfaces":
      return {
        heading: "The network interfaces are:",
        commands: windows
          ? [cmd("ipconfig", "/all")]
          : mac
            ? [cmd("ifconfig")]
            : [cmd("ip", "link", "show"), cmd("ifconfig")],
      };
    case "routes":
      return {
        heading: "The routing table is:",
        commands: windows
          ? [cmd("route", "print"), cmd("netstat", "-rn")]
          : mac
            ? [cmd("netstat", "-rn")]
            : [cmd("ip", "route"), cmd("netstat", "-rn")],
      };
    case "firewall":
      return {
        heading: "The firewall rules are:",
        commands: windows
          ? [cmd("netsh", "advfirewall", "firewall", "show", "rule", "name=all")]
          : mac
            ? [cmd("pfctl", "-s", "rules")]
            : [cmd("iptables", "-L", "-n"), cmd("nft", "list", "ruleset")],
      };
  }
}

/** Default runner over execFile: no shell, bounded time and output. */
export function execFileRunner(options: { readonly timeoutMs?: number } = {}): CommandRunner {
  const timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  return (command) =>
    new Promise((resolve, reject) => {
      execFileCb(
        command.file,
        [...command.args],
        {
          timeout,
          maxBuffer: 10 * 1024 * 1024, // 10 MB
          windowsHide: true,
        },
        (err, stdout) => {
          if (err) {
            reject(err);
          } else {
            resolve(stdout.toString());
          }
        },
      );
    });
}

export interface CollectContextOptions {
  readonly platform: NodeJS.Platform;
  readonly cwd: string;
  readonly logger: Logger;
  readonly run?: CommandRunner;
  readonly maxChars?: number;
}

/**
 * Text describing one aspect of the machine. Never rejects: a source that
 * cannot be read yields a line saying so, and a warning.
 */
export async function collectContext(kind: ContextKind, options: CollectContextOptions): Promise<string> {
  const text = kind === "files" ? await listFiles(options) : await runSource(kind, options);
  const max = options.maxChars ?? MAX_CONTEXT_CHARS;
  if (text.length <= max) return text;
  options.logger.debug(`${kind} context cut from ${text.length} to ${max} characters`);
  return text.slice(0, max);
}

async function listFiles(options: CollectContextOptions): Promise<string> {
  try {
    const names = (await readdir(options.cwd)).sort();
    const listing = names.length > 0 ? names.join("\n") : "(no files)";
    return `The command is executed in folder ${options.cwd} containing the following files:\n${listing}`;
  } catch (error) {
    options.logger.warn(`cannot list ${options.cwd}: ${getErrorMessage(error)}`);
    return unreadable("files");
  }
}

async function runSource(kind: Exclude<ContextKind, "files">, options: CollectContextOptions): Promise<string> {
  const source = commandSource(kind, options.platform);
  const run = options.run ?? execFileRunner();
  let lastError: unknown;
  for (const command of source.commands) {
    try {
      const output = (await run(command)).trim();
      return `${source.heading}\n${output || "(empty)"}`;
    } catch (error) {
      lastError = error;
      options.logger.debug(`${command.file} failed: ${getErrorMessage(error)}`);
    }
  }
  options.logger.warn(`cannot read ${CONTEXT_LABELS[kind].toLowerCase()}: ${getErrorMessage(lastError)}`);
  return unreadable(kind);
}

function unreadable(kind: ContextKind): string {
  return `${CONTEXT_LABELS[kind]} could not be read.`;
}
