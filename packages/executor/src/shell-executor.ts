import { spawn } from "node:child_process";
import { constants } from "node:os";
import type { Writable } from "node:stream";
import { StringDecoder } from "node:string_decoder";
import {
  type CommandStep,
  detectShell,
  type Environment,
  type ExecutionResult,
  type Logger,
  type ShellInfo,
  type StepExecutor,
  shellArgs,
} from "@askshell/core";
import { getErrorMessage } from "@askshell/errors";

const DEFAULT_MAX_STDERR_BYTES = 1_048_576; // 1 MB

/** Exit code reported when the shell itself could not be started. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export interface ShellStepExecutorOptions {
  readonly logger: Logger;
  /** Shell to use instead of the detected one. */
  readonly shell?: string;
  readonly env?: Environment;
  readonly platform?: NodeJS.Platform;
  readonly cwd?: string;
  /** Cap on captured stderr. Output beyond it is still shown, not kept. */
  readonly maxStderrBytes?: number;
  /**
   * Connect stdin and stdout to the terminal. Defaults to true; when false
   * both are discarded.
   */
  readonly interactive?: boolean;
  /** Where stderr is echoed as it arrives. Defaults to process.stderr; null disables. */
  readonly stderrEcho?: Writable | null;
}

/**
 * Runs each step as one shell invocation. Commands are not time-limited:
 * the returned promise settles when the process exits.
 */
export class ShellStepExecutor implements StepExecutor {
  readonly shell: ShellInfo;
  private readonly logger: Logger;
  private readonly env: Environment | undefined;
  private readonly cwd: string | undefined;
  private readonly maxStderrBytes: number;
  private readonly interactive: boolean;
  private readonly stderrEcho: Writable | null;

  constructor(options: ShellStepExecutorOptions) {
    this.logger = options.logger;
    this.env = options.env;
    this.cwd = options.cwd;
    this.shell = detectShell(options.env ?? process.env, options.platform, options.shell);
    this.maxStderrBytes = options.maxStderrBytes ?? DEFAULT_MAX_STDERR_BYTES;
    this.interactive = options.interactive ?? true;
    this.stderrEcho = options.stderrEcho === undefined ? process.stderr : options.stderrEcho;
  }

  run(step: CommandStep): Promise<ExecutionResult> {
    const start = performance.now();
    this.logger.debug(`running via ${this.shell.path}: ${step.text}`);

    return new Promise<ExecutionResult>((resolve) => {
      const child = spawn(this.shell.path, shellArgs(this.shell, step.text), {
        ...(this.cwd ? { cwd: this.cwd } : {}),
        ...(this.env ? { env: { ...this.env } } : {}),
        stdio: this.interactive ? ["inherit", "inherit", "pipe"] : ["ignore", "ignore", "pipe"],
        windowsVerbatimArguments: this.shell.kind === "cmd",
      });

      // Characters may be split across chunks or by the cap.
      const decoder = new StringDecoder("utf8");
      let stderr = "";
      let stderrBytes = 0;
      let settled = false;

      child.stderr?.on("data", (chunk: Buffer) => {
        this.stderrEcho?.write(chunk);
        if (stderrBytes < this.maxStderrBytes) {
          const remaining = this.maxStderrBytes - stderrBytes;
          stderr += decoder.write(chunk.subarray(0, remaining));
        }
        stderrBytes += chunk.length;
      });

      child.on("error", (error) => {
        if (settled) return;
        settled = true;
        const message = `failed to start ${this.shell.path}: ${getErrorMessage(error)}`;
        this.logger.warn(message);
        resolve({
          exitCode: SPAWN_FAILURE_EXIT_CODE,
          stderr: message,
          succeeded: false,
          durationMs: Math.round(performance.now() - start),
          signal: null,
        });
      });

      child.on("close", (code, signal) => {
        if (settled) return;
        settled = true;
        // A process killed by a signal has no exit code; report it the way shells do.
        const exitCode = code ?? 128 + signalNumber(signal);
        // Past the cap, a character cut in half is dropped rather than replaced.
        if (stderrBytes <= this.maxStderrBytes) stderr += decoder.end();
        const durationMs = Math.round(performance.now() - start);
        this.logger.debug(`exit ${exitCode} after ${durationMs}ms`);
        resolve({
          exitCode,
          stderr,
          succeeded: exitCode === 0,
          durationMs,
          signal: signal ?? null,
        });
      });
    });
  }
}

function signalNumber(signal: NodeJS.Signals | null): number {
  return signal ? constants.signals[signal] : 0;
}
