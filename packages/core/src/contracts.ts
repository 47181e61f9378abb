/**
 * Seams between the execution pipeline and its collaborators.
 *
 * The controller only talks to these interfaces; production
 * implementations live in @askshell/executor, @askshell/model and
 * @askshell/history, test doubles in @askshell/test-utils.
 */

import type { ChatMessage, CommandStep, ExecutionResult, HistoryEntry, Plan } from "./types.js";

// ============================================================================
// EXECUTION
// ============================================================================

/**
 * The single side-effect boundary: runs one command and reports how it ended.
 * A non-zero exit is a normal result, never a rejection.
 */
export interface StepExecutor {
  run(step: CommandStep): Promise<ExecutionResult>;
}

// ============================================================================
// HUMAN APPROVAL
// ============================================================================

export interface Approver {
  /** Present the whole plan with per-step verdicts; true to proceed. */
  approvePlan(plan: Plan): Promise<boolean>;
  /** Confirm one step that the gate refused to auto-run. */
  confirmStep(step: CommandStep): Promise<boolean>;
}

// ============================================================================
// LANGUAGE MODEL
// ============================================================================

/** What the model is told about a failed command. */
export interface CorrectionRequest {
  readonly command: string;
  readonly stderr: string;
  readonly exitCode: number;
  /** Original natural-language request, when known. */
  readonly request?: string;
}

export interface GenerateOptions {
  /** Facts about the machine (files, processes, network) appended to the request. */
  readonly context?: string;
}

export interface CommandModel {
  /** One command for the request. */
  generateCommand(request: string, options?: GenerateOptions): Promise<string>;
  /** An ordered list of commands for the request. */
  generatePlan(request: string, options?: GenerateOptions): Promise<readonly string[]>;
  /** A replacement command for one that failed. */
  suggestCorrection(failure: CorrectionRequest): Promise<string>;
  /** Plain-language explanation of a command. */
  explain(command: string): Promise<string>;
  /** Up to `count` different commands for a request whose first answer was declined. */
  alternatives(request: string, rejected: string, count: number): Promise<readonly string[]>;
  /**
   * Free-form answer to the last user message of a conversation. The model
   * adds its own system message; `conversation` holds user and assistant turns.
   */
  chat(conversation: readonly ChatMessage[]): Promise<string>;
}

// ============================================================================
// HISTORY
// ============================================================================

/**
 * Append-only record of executed commands.
 * `append` never rejects: storage failures are logged and yield undefined.
 */
export interface HistoryLedger {
  append(step: CommandStep): Promise<HistoryEntry | undefined>;
  /** Most recent first, at most `count` entries. */
  list(count: number): Promise<readonly HistoryEntry[]>;
  /** Rejects with HistoryEntryNotFoundError for an unknown number. */
  get(sequenceNumber: number): Promise<HistoryEntry>;
}
