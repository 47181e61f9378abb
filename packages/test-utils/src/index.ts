export const PACKAGE_NAME = "@askshell/test-utils" as const;

export {
  failed,
  makeConfig,
  makePattern,
  makePatternSet,
  makePlan,
  makeStep,
  type PatternSetInit,
  type StepInit,
  succeeded,
} from "./fixtures.js";
export { InMemoryHistoryLedger, type InMemoryLedgerOptions } from "./in-memory-ledger.js";
export { type LogRecord, RecordingLogger } from "./logger.js";
export { RecordingStepExecutor } from "./recording-executor.js";
export { type ApproverScript, ScriptedApprover } from "./scripted-approver.js";
export { type ModelCall, type ModelScript, type ScriptedReply, ScriptedModel } from "./scripted-model.js";
