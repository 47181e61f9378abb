/**
 * Mirrors executed commands into the interactive shell's own history file,
 * so they show up under the arrow keys next time.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Environment, Logger, ShellKind } from "@askshell/core";
import { HistoryIOError } from "@askshell/errors";

export type ShellHistoryFormat = "plain" | "zsh-extended" | "fish";

export interface ShellHistoryTarget {
  readonly path: string;
  readonly format: ShellHistoryFormat;
}

/**
 * History file of a shell, or undefined when it keeps none we can write
 * (cmd.exe, unknown shells).
 */
export function resolveShellHistory(
  shell: ShellKind,
  env: Environment,
  home: string,
): ShellHistoryTarget | undefined {
  switch (shell) {
    case "bash":
      return { path: env.HISTFILE || path.join(home, ".bash_history"), format: "plain" };
    case "zsh":
      return { path: env.HISTFILE || path.join(home, ".zsh_history"), format: "zsh-extended" };
    case "fish":
      return {
        path: path.join(env.XDG_DATA_HOME || path.join(home, ".local", "share"), "fish", "fish_history"),
        format: "fish",
      };
    case "powershell":
      return {
        path: path.join(
          env.APPDATA || path.join(home, "AppData", "Roaming"),
          "Microsoft",
          "Windows",
          "PowerShell",
          "PSReadLine",
          "ConsoleHost_history.txt",
        ),
        format: "plain",
      };
    default:
      return undefined;
  }
}

/** One history record in the shell's own format, newline-terminated. */
export function formatHistoryRecord(format: ShellHistoryFormat, command: string, at: Date): string {
  const seconds = Math.floor(at.getTime() / 1000);
  switch (format) {
    case "plain":
      return `${command}\n`;
    case "zsh-extended":
      return `: ${seconds}:0;${command}\n`;
    case "fish":
      return `- cmd: ${command.replaceAll("\\", "\\\\").replaceAll("\n", "\\n")}\n  when: ${seconds}\n`;
  }
}

export interface ShellHistoryMirrorOptions {
  readonly target: ShellHistoryTarget;
  readonly logger: Logger;
}

export class ShellHistoryMirror {
  readonly target: ShellHistoryTarget;
  private readonly logger: Logger;

  constructor(options: ShellHistoryMirrorOptions) {
    this.target = options.target;
    this.logger = options.logger;
  }

  /** Append one command. Failures are logged, never thrown. */
  async record(command: string, at: Date = new Date()): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.target.path), { recursive: true });
      await fs.appendFile(this.target.path, formatHistoryRecord(this.target.format, command, at), "utf-8");
    } catch (error) {
      this.logger.warn(new HistoryIOError("mirror", this.target.path, error).message);
    }
  }
}
