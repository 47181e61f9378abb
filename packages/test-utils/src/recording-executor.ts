import type { CommandStep, ExecutionResult, StepExecutor } from "@askshell/core";
import { failed, succeeded } from "./fixtures.js";

/**
 * StepExecutor that runs nothing. Records every step it is asked to run and
 * answers from per-command scripts; unscripted commands succeed.
 */
export class RecordingStepExecutor implements StepExecutor {
  readonly calls: CommandStep[] = [];
  private readonly scripts = new Map<string, ExecutionResult[]>();

  /**
   * Queue results for a command text. Each run consumes one; the last one
   * repeats.
   */
  onCommand(text: string, ...results: ExecutionResult[]): this {
    this.scripts.set(text, [...results]);
    return this;
  }

  /** Shorthand for a command that always fails with the given exit code. */
  failOn(text: string, exitCode = 1, stderr = `${text}: failed`): this {
    return this.onCommand(text, failed(exitCode, stderr));
  }

  async run(step: CommandStep): Promise<ExecutionResult> {
    this.calls.push(step);
    const queue = this.scripts.get(step.text);
    if (!queue || queue.length === 0) {
      return succeeded();
    }
    const next = queue.length > 1 ? queue.shift() : queue[0];
    return next ?? succeeded();
  }

  /** Command texts in the order they ran. */
  get commands(): string[] {
    return this.calls.map((step) => step.text);
  }
}
