/**
 * @askshell/executor
 *
 * Step Executor, Sequence Controller and Auto-Correct Loop.
 */

export const PACKAGE_NAME = "@askshell/executor" as const;

export {
  AutoCorrector,
  type AutoCorrectorOptions,
  type CorrectionOutcome,
  type CorrectionSession,
} from "./auto-correct.js";
export type { AbortReason, SequenceEvent, SequenceState } from "./events.js";
export {
  type CompletedStep,
  SequenceController,
  type SequenceControllerOptions,
  type SequenceResult,
} from "./sequence-controller.js";
export {
  SPAWN_FAILURE_EXIT_CODE,
  ShellStepExecutor,
  type ShellStepExecutorOptions,
} from "./shell-executor.js";
export {
  type CollectContextOptions,
  type CommandRunner,
  CONTEXT_KINDS,
  CONTEXT_LABELS,
  type ContextKind,
  collectContext,
  execFileRunner,
  type HostCommand,
  MAX_CONTEXT_CHARS,
} from "./system-context.js";
