/**
 * Auto-Correct Loop.
 *
 * Asks the model for a replacement of a failed step, gates and runs it,
 * and recurses on failure. The remaining-attempt budget is threaded through
 * each call and spent on every attempt, whatever its outcome, so the loop
 * is bounded by the configured maximum.
 */

import type {
  Approver,
  CommandModel,
  CommandStep,
  ExecutionResult,
  Logger,
} from "@askshell/core";
import { CorrectionExhaustedError, getErrorMessage } from "@askshell/errors";
import { createStep, type SafetyPolicy } from "@askshell/safety";
import type { SequenceEvent } from "./events.js";

export type CorrectionOutcome =
  | { readonly kind: "recovered"; readonly step: CommandStep; readonly result: ExecutionResult }
  | { readonly kind: "declined"; readonly step: CommandStep }
  | { readonly kind: "exhausted"; readonly error: CorrectionExhaustedError };

/** Per-plan context a correction runs in. */
export interface CorrectionSession {
  readonly policy: SafetyPolicy;
  /** Executes a corrected step; supplied by the controller. */
  readonly run: (step: CommandStep) => Promise<ExecutionResult>;
  /** Natural-language request the plan came from. */
  readonly request?: string;
}

export interface AutoCorrectorOptions {
  readonly model: CommandModel;
  readonly approver: Approver;
  readonly logger: Logger;
  readonly onEvent?: (event: SequenceEvent) => void;
}

interface Attempt {
  /** Step the plan originally failed on. */
  readonly original: CommandStep;
  /** Attempts spent so far. */
  readonly used: number;
}

export class AutoCorrector {
  private readonly model: CommandModel;
  private readonly approver: Approver;
  private readonly logger: Logger;
  private readonly onEvent: ((event: SequenceEvent) => void) | undefined;

  constructor(options: AutoCorrectorOptions) {
    this.model = options.model;
    this.approver = options.approver;
    this.logger = options.logger;
    this.onEvent = options.onEvent;
  }

  /**
   * Try to recover from `result`, the failure of `failedStep`, within
   * `remainingAttempts` attempts.
   */
  correct(
    failedStep: CommandStep,
    result: ExecutionResult,
    remainingAttempts: number,
    session: CorrectionSession,
  ): Promise<CorrectionOutcome> {
    return this.attempt(failedStep, result, remainingAttempts, session, { original: failedStep, used: 0 });
  }

  private async attempt(
    failedStep: CommandStep,
    result: ExecutionResult,
    remaining: number,
    session: CorrectionSession,
    progress: Attempt,
  ): Promise<CorrectionOutcome> {
    if (remaining <= 0) {
      const error = new CorrectionExhaustedError(progress.original.text, progress.used, result.stderr);
      this.logger.debug(error.message);
      return { kind: "exhausted", error };
    }

    const next: Attempt = { original: progress.original, used: progress.used + 1 };

    let suggestion: string;
    try {
      suggestion = (
        await this.model.suggestCorrection({
          command: failedStep.text,
          stderr: result.stderr,
          exitCode: result.exitCode,
          ...(session.request ? { request: session.request } : {}),
        })
      ).trim();
    } catch (error) {
      const reason = `correction request failed: ${getErrorMessage(error)}`;
      this.logger.warn(reason);
      this.onEvent?.({ type: "correction-skipped", failedStep, reason, remainingAttempts: remaining - 1 });
      return this.attempt(failedStep, result, remaining - 1, session, next);
    }

    if (suggestion === "" || suggestion === failedStep.text) {
      const reason =
        suggestion === "" ? "model suggested no correction" : "model suggested the same command";
      this.logger.warn(reason);
      this.onEvent?.({ type: "correction-skipped", failedStep, reason, remainingAttempts: remaining - 1 });
      return this.attempt(failedStep, result, remaining - 1, session, next);
    }

    const step = createStep(suggestion, session.policy, {
      origin: "corrected",
      attempt: failedStep.attempt + 1,
      correctedFrom: failedStep.id,
    });
    this.onEvent?.({ type: "correction-proposed", failedStep, step, remainingAttempts: remaining - 1 });

    if (session.policy.requiresConfirmation(step.classification)) {
      const confirmed = await this.approver.confirmStep(step);
      if (!confirmed) {
        this.onEvent?.({ type: "step-declined", step });
        return { kind: "declined", step };
      }
    }

    const corrected = await session.run(step);
    if (corrected.succeeded) {
      return { kind: "recovered", step, result: corrected };
    }
    return this.attempt(step, corrected, remaining - 1, session, next);
  }
}
