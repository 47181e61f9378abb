import type { CommandStep, ExecutionResult, HistoryEntry, Plan } from "@askshell/core";

export type SequenceState = "pending_approval" | "running" | "completed" | "aborted";

export type AbortReason = "declined" | "step-failed" | "correction-exhausted";

/** Progress notifications from the controller and the auto-corrector. */
export type SequenceEvent =
  | { readonly type: "state"; readonly state: SequenceState; readonly plan: Plan }
  | { readonly type: "step-started"; readonly step: CommandStep }
  | { readonly type: "step-finished"; readonly step: CommandStep; readonly result: ExecutionResult }
  | { readonly type: "step-declined"; readonly step: CommandStep }
  | {
      readonly type: "correction-proposed";
      readonly failedStep: CommandStep;
      readonly step: CommandStep;
      readonly remainingAttempts: number;
    }
  | {
      readonly type: "correction-skipped";
      readonly failedStep: CommandStep;
      readonly reason: string;
      readonly remainingAttempts: number;
    }
  | { readonly type: "recorded"; readonly entry: HistoryEntry };
