import type { Approver, CommandStep, Plan } from "@askshell/core";
import * as p from "./prompts.js";
import { formatPlan, formatVerdict } from "./render.js";
import type { Terminal } from "./terminal.js";

/** Approver that can also let the user pick among alternative commands. */
export interface InteractiveApprover extends Approver {
  /** The chosen command, or undefined to run none. */
  pick(commands: readonly string[]): Promise<string | undefined>;
}

/**
 * Asks on the terminal. Every question defaults to "no".
 */
export class TerminalApprover implements InteractiveApprover {
  private readonly terminal: Terminal;

  constructor(terminal: Terminal) {
    this.terminal = terminal;
  }

  async approvePlan(plan: Plan): Promise<boolean> {
    for (const line of formatPlan(plan, this.terminal.colors)) {
      this.terminal.print(line);
    }
    const message = plan.steps.length === 1 ? "Run this command?" : `Run these ${plan.steps.length} commands?`;
    return p.confirm(this.terminal, { message, initialValue: false });
  }

  async confirmStep(step: CommandStep): Promise<boolean> {
    const verdict = formatVerdict(step.classification, this.terminal.colors);
    const label = step.origin === "corrected" ? "Run corrected command" : "Run";
    return p.confirm(this.terminal, { message: `${label} \`${step.text}\` [${verdict}]?`, initialValue: false });
  }

  async pick(commands: readonly string[]): Promise<string | undefined> {
    return p.select(this.terminal, {
      message: "Alternatives",
      options: commands.map((command) => ({ value: command, label: command })),
    });
  }
}
