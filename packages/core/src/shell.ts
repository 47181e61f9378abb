import { basename } from "node:path";
import type { Environment } from "./config.js";

export type ShellKind = "bash" | "zsh" | "fish" | "posix" | "powershell" | "cmd";

export interface ShellInfo {
  readonly kind: ShellKind;
  /** Executable to spawn. */
  readonly path: string;
}

export function shellKindOf(path: string): ShellKind {
  const name = basename(path.replaceAll("\\", "/"))
    .toLowerCase()
    .replace(/\.exe$/, "");
  switch (name) {
    case "bash":
    case "zsh":
    case "fish":
    case "cmd":
      return name;
    case "powershell":
    case "pwsh":
      return "powershell";
    default:
      return "posix";
  }
}

/**
 * The shell commands run in: the configured one, else $SHELL (falling back
 * to /bin/bash) on POSIX. On Windows, PowerShell when the session looks like
 * one, else %COMSPEC%.
 */
export function detectShell(
  env: Environment,
  platform: NodeJS.Platform = process.platform,
  override?: string,
): ShellInfo {
  if (override) {
    return { kind: shellKindOf(override), path: override };
  }

  if (platform === "win32") {
    const comspec = env.COMSPEC ?? "cmd.exe";
    const psModulePath = (env.PSModulePath ?? "").toLowerCase();
    if (psModulePath.includes("powershell") || comspec.toLowerCase().includes("powershell")) {
      return { kind: "powershell", path: "powershell" };
    }
    return { kind: "cmd", path: comspec };
  }

  const path = env.SHELL || "/bin/bash";
  return { kind: shellKindOf(path), path };
}

/** Arguments that make `shell` run `command` as one invocation. */
export function shellArgs(shell: ShellInfo, command: string): string[] {
  switch (shell.kind) {
    case "powershell":
      return ["-NoProfile", "-Command", command];
    case "cmd":
      return ["/d", "/s", "/c", `"${command}"`];
    default:
      return ["-c", command];
  }
}
