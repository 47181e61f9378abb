import type { CorrectionRequest, ShellKind } from "@askshell/core";
import { tail } from "./sanitize.js";
import { type ChatCompletionRequest, type ChatMessage, MAX_STDERR_CHARS } from "./types.js";

/** What the prompts say about the machine commands will run on. */
export interface HostContext {
  readonly platform: NodeJS.Platform;
  /** OS release, e.g. from `os.release()`. */
  readonly release: string;
  readonly shell: ShellKind;
}

const OUTPUT_RULES = "You output only terminal commands. No explanations, no comments, no backticks.";
const WINDOWS_RULE = "Use Windows PowerShell or CMD commands, not Linux/Unix commands.";

export function describeHost(host: HostContext): string {
  switch (host.platform) {
    case "win32":
      return `Windows ${host.release}`;
    case "darwin":
      return "macOS";
    case "linux":
      return "Linux";
    default:
      return host.platform;
  }
}

export function shellName(shell: ShellKind): string {
  switch (shell) {
    case "powershell":
      return "PowerShell";
    case "cmd":
      return "CMD";
    case "posix":
      return "shell";
    default:
      return shell;
  }
}

function systemPrompt(host: HostContext, extra?: string): ChatMessage {
  const parts = [OUTPUT_RULES, `This system is running ${describeHost(host)}.`];
  if (host.platform === "win32") parts.push(WINDOWS_RULE);
  if (extra) parts.push(extra);
  return { role: "system", content: parts.join(" ") };
}

/** The request, followed by gathered machine context when there is some. */
function withContext(content: string, context: string | undefined): string {
  return context?.trim() ? `${content}\n${context.trim()}` : content;
}

export function commandPrompt(host: HostContext, request: string, context?: string): ChatCompletionRequest {
  return {
    messages: [
      systemPrompt(host),
      {
        role: "user",
        content: withContext(`Generate a single ${shellName(host.shell)} command to ${request}`, context),
      },
    ],
    params: { maxTokens: 100, temperature: 0 },
  };
}

export function planPrompt(host: HostContext, request: string, context?: string): ChatCompletionRequest {
  return {
    messages: [
      systemPrompt(host, "Write one command per line, in the order they must run."),
      {
        role: "user",
        content: withContext(
          `Generate the sequence of ${shellName(host.shell)} commands needed to ${request}`,
          context,
        ),
      },
    ],
    params: { maxTokens: 400, temperature: 0 },
  };
}

export function correctionPrompt(host: HostContext, failure: CorrectionRequest): ChatCompletionRequest {
  const lines = [
    `This command failed with exit code ${failure.exitCode}:`,
    failure.command,
    "",
    "Its error output was:",
    tail(failure.stderr, MAX_STDERR_CHARS).trim() || "(none)",
  ];
  if (failure.request) {
    lines.push("", `The goal was to ${failure.request}`);
  }
  lines.push("", `Reply with a single corrected ${shellName(host.shell)} command.`);
  return {
    messages: [systemPrompt(host), { role: "user", content: lines.join("\n") }],
    params: { maxTokens: 100, temperature: 0 },
  };
}

export function explanationPrompt(command: string): ChatCompletionRequest {
  return {
    messages: [
      {
        role: "system",
        content: "Explain what is the purpose of the command with details for each option.",
      },
      { role: "user", content: command },
    ],
    params: { maxTokens: 250, temperature: 0 },
  };
}

export function alternativesPrompt(
  host: HostContext,
  request: string,
  rejected: string,
  count: number,
): ChatCompletionRequest {
  return {
    messages: [
      systemPrompt(host),
      {
        role: "user",
        content: `Generate a single ${shellName(host.shell)} command to ${request}\nDo not suggest: ${rejected}`,
      },
    ],
    params: { maxTokens: 50, temperature: 0.9, n: count },
  };
}

/**
 * Open conversation. Any system message in `conversation` is replaced by
 * the one describing this machine.
 */
export function chatPrompt(host: HostContext, conversation: readonly ChatMessage[]): ChatCompletionRequest {
  const parts = [
    "You are a helpful assistant. Answer as concisely as possible.",
    `This machine is running ${describeHost(host)}.`,
  ];
  if (host.platform === "win32") parts.push(`When suggesting commands: ${WINDOWS_RULE}`);
  return {
    messages: [
      { role: "system", content: parts.join(" ") },
      ...conversation.filter((message) => message.role !== "system"),
    ],
    params: { maxTokens: 1000, temperature: 0.7 },
  };
}
