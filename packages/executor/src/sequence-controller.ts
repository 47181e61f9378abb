/**
 * Sequence Controller.
 *
 * Drives a plan through pending_approval → running → completed | aborted:
 *   1. every step is re-classified and the whole plan is shown for approval
 *      unless no step needs confirmation
 *   2. steps run strictly in order; in a multi-step plan each step the gate
 *      refuses to auto-run is confirmed on its own
 *   3. the first failure goes to the auto-corrector when enabled, otherwise
 *      aborts the plan
 *   4. each succeeded step is appended to the history ledger right away
 */

import type {
  Approver,
  AskshellConfig,
  CommandModel,
  CommandStep,
  ExecutionResult,
  HistoryLedger,
  Logger,
  PatternSet,
  Plan,
  StepExecutor,
} from "@askshell/core";
import { CommandDeclinedError, CorrectionExhaustedError, getErrorMessage } from "@askshell/errors";
import { SafetyPolicy } from "@askshell/safety";
import { AutoCorrector } from "./auto-correct.js";
import type { AbortReason, SequenceEvent, SequenceState } from "./events.js";

export interface CompletedStep {
  readonly step: CommandStep;
  readonly result: ExecutionResult;
}

export interface SequenceResult {
  readonly state: Extract<SequenceState, "completed" | "aborted">;
  readonly aborted: boolean;
  /** Steps that succeeded, in execution order (corrected steps included). */
  readonly completedSteps: readonly CompletedStep[];
  /** Number of commands executed, corrections included. */
  readonly attempts: number;
  readonly abortReason?: AbortReason;
  /** Step whose failure or refusal aborted the plan. */
  readonly failedStep?: CommandStep;
  readonly failure?: ExecutionResult;
  readonly error?: CommandDeclinedError | CorrectionExhaustedError;
}

export interface SequenceControllerOptions {
  readonly patterns: PatternSet;
  readonly executor: StepExecutor;
  readonly approver: Approver;
  readonly model: CommandModel;
  readonly logger: Logger;
  /** Omit to run without recording history. */
  readonly ledger?: HistoryLedger;
  readonly onEvent?: (event: SequenceEvent) => void;
}

export class SequenceController {
  private readonly patterns: PatternSet;
  private readonly executor: StepExecutor;
  private readonly approver: Approver;
  private readonly ledger: HistoryLedger | undefined;
  private readonly logger: Logger;
  private readonly onEvent: ((event: SequenceEvent) => void) | undefined;
  private readonly corrector: AutoCorrector;

  constructor(options: SequenceControllerOptions) {
    this.patterns = options.patterns;
    this.executor = options.executor;
    this.approver = options.approver;
    this.ledger = options.ledger;
    this.logger = options.logger;
    this.onEvent = options.onEvent;
    this.corrector = new AutoCorrector({
      model: options.model,
      approver: options.approver,
      logger: options.logger.child("autocorrect"),
      ...(options.onEvent ? { onEvent: options.onEvent } : {}),
    });
  }

  async execute(plan: Plan, config: AskshellConfig): Promise<SequenceResult> {
    const policy = new SafetyPolicy(this.patterns, config.safetyMode);
    const steps = plan.steps.map((step) => reclassify(step, policy));
    const gated: Plan = { ...plan, steps };
    const needsConfirmation = steps.map((step) => policy.requiresConfirmation(step.classification));

    const completedSteps: CompletedStep[] = [];
    let attempts = 0;

    const finish = (
      state: SequenceResult["state"],
      extra: Omit<SequenceResult, "state" | "aborted" | "completedSteps" | "attempts"> = {},
    ): SequenceResult => {
      this.emit({ type: "state", state, plan: gated });
      return { state, aborted: state === "aborted", completedSteps, attempts, ...extra };
    };

    const run = async (step: CommandStep): Promise<ExecutionResult> => {
      attempts++;
      this.emit({ type: "step-started", step });
      const result = await this.executor.run(step);
      this.emit({ type: "step-finished", step, result });
      return result;
    };

    this.emit({ type: "state", state: "pending_approval", plan: gated });
    if (needsConfirmation.some(Boolean)) {
      const approved = await this.approver.approvePlan(gated);
      if (!approved) {
        this.logger.debug(`plan ${plan.id} declined`);
        return finish("aborted", { abortReason: "declined", error: new CommandDeclinedError("plan") });
      }
    }

    this.emit({ type: "state", state: "running", plan: gated });
    for (const [index, step] of steps.entries()) {
      // For a one-step plan the plan approval above is the step's confirmation.
      if (steps.length > 1 && needsConfirmation[index] === true) {
        const confirmed = await this.approver.confirmStep(step);
        if (!confirmed) {
          this.emit({ type: "step-declined", step });
          return finish("aborted", {
            abortReason: "declined",
            failedStep: step,
            error: new CommandDeclinedError("step", step.text),
          });
        }
      }

      const result = await run(step);
      if (result.succeeded) {
        completedSteps.push({ step, result });
        await this.record(step);
        continue;
      }

      if (!config.autocorrect) {
        return finish("aborted", { abortReason: "step-failed", failedStep: step, failure: result });
      }

      const outcome = await this.corrector.correct(step, result, config.maxCorrectAttempts, {
        policy,
        run,
        request: plan.request,
      });
      switch (outcome.kind) {
        case "recovered":
          completedSteps.push({ step: outcome.step, result: outcome.result });
          await this.record(outcome.step);
          break;
        case "declined":
          return finish("aborted", {
            abortReason: "declined",
            failedStep: outcome.step,
            failure: result,
            error: new CommandDeclinedError("step", outcome.step.text),
          });
        case "exhausted":
          return finish("aborted", {
            abortReason: "correction-exhausted",
            failedStep: step,
            failure: result,
            error: outcome.error,
          });
      }
    }

    return finish("completed");
  }

  private async record(step: CommandStep): Promise<void> {
    if (!this.ledger) return;
    try {
      const entry = await this.ledger.append(step);
      if (entry) this.emit({ type: "recorded", entry });
    } catch (error) {
      this.logger.warn(`history append failed: ${getErrorMessage(error)}`);
    }
  }

  private emit(event: SequenceEvent): void {
    this.onEvent?.(event);
  }
}

function reclassify(step: CommandStep, policy: SafetyPolicy): CommandStep {
  return { ...step, classification: policy.classify(step.text) };
}
