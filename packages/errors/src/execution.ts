import { AskshellError } from "./base.js";

// ---------------------------------------------------------------------------
// Declined
// ---------------------------------------------------------------------------

export type DeclineScope = "plan" | "step";

/**
 * A human operator declined a plan or an individual step.
 * The only gate outcome allowed to abort a plan.
 */
export class CommandDeclinedError extends AskshellError<"COMMAND_DECLINED"> {
  readonly _tag = "PermissionError" as const;
  readonly scope: DeclineScope;
  readonly command: string | undefined;

  constructor(scope: DeclineScope, command?: string) {
    super({
      code: "COMMAND_DECLINED",
      message:
        scope === "plan"
          ? "Plan declined; no command was executed"
          : `Step declined: "${command ?? ""}"`,
      metadata: { scope },
    });
    this.scope = scope;
    this.command = command;
  }
}

// ---------------------------------------------------------------------------
// Correction exhausted
// ---------------------------------------------------------------------------

/**
 * Every auto-correct attempt for a failing step was used up.
 * Fatal to the current plan only.
 */
export class CorrectionExhaustedError extends AskshellError<"CORRECTION_EXHAUSTED"> {
  readonly _tag = "ExternalError" as const;
  /** Text of the step the plan originally failed on. */
  readonly command: string;
  readonly attempts: number;
  /** Stderr of the last attempt that ran. */
  readonly lastStderr: string;

  constructor(command: string, attempts: number, lastStderr: string) {
    super({
      code: "CORRECTION_EXHAUSTED",
      message: `Could not fix "${command}" after ${attempts} correction attempt${attempts === 1 ? "" : "s"}`,
      metadata: { attempts: String(attempts) },
    });
    this.command = command;
    this.attempts = attempts;
    this.lastStderr = lastStderr;
  }
}
