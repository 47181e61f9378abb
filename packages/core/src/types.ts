/**
 * Domain types shared by every askshell package.
 */

// ============================================================================
// PATTERNS & CLASSIFICATION
// ============================================================================

/** Risk verdict attached to a single command. */
export type Verdict = "safe" | "dangerous" | "unclassified";

/** A compiled pattern line from a dangerous or safe pattern source. */
export interface Pattern {
  readonly regex: RegExp;
  /** Pattern source text as written in the file (comment stripped). */
  readonly source: string;
  /** Trailing comment when present, otherwise the source text. */
  readonly label: string;
  /** Most recent full-line comment above the pattern, or "uncategorized". */
  readonly category: string;
  /** Name of the file or built-in list the pattern came from. */
  readonly origin: string;
  /** 1-based line number within its origin. */
  readonly line: number;
}

/**
 * Immutable rule set produced by one load of the pattern sources.
 * `degraded` is set when any configured source could not be read.
 */
export interface PatternSet {
  readonly dangerous: readonly Pattern[];
  readonly safe: readonly Pattern[];
  readonly degraded: boolean;
  readonly warnings: readonly string[];
}

/** Reference to the pattern that decided a verdict. */
export interface PatternMatch {
  readonly label: string;
  readonly category: string;
  readonly origin: string;
  readonly line: number;
}

export interface Classification {
  readonly verdict: Verdict;
  /** Absent when the verdict is "unclassified". */
  readonly match?: PatternMatch;
}

// ============================================================================
// PLANS & STEPS
// ============================================================================

export type StepOrigin = "generated" | "corrected" | "history-replay";

export interface CommandStep {
  readonly id: string;
  readonly text: string;
  readonly origin: StepOrigin;
  readonly classification: Classification;
  /** 0 for planned steps, incremented for each correction. */
  readonly attempt: number;
  /** Id of the step this one replaces. */
  readonly correctedFrom?: string;
}

export interface Plan {
  readonly id: string;
  /** Natural-language request the plan was generated from. */
  readonly request: string;
  readonly steps: readonly CommandStep[];
}

export interface ExecutionResult {
  readonly exitCode: number;
  readonly stderr: string;
  readonly succeeded: boolean;
  readonly durationMs: number;
  readonly signal: string | null;
}

// ============================================================================
// HISTORY
// ============================================================================

export interface HistoryEntry {
  readonly sequenceNumber: number;
  readonly text: string;
  /** ISO-8601 timestamp of execution. */
  readonly timestamp: string;
  readonly origin: StepOrigin;
}

// ============================================================================
// CHAT
// ============================================================================

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

/** 0: confirm every command. 1: auto-run commands that match a safe pattern. */
export type SafetyMode = 0 | 1;

export interface ModelSettings {
  readonly apiKey?: string;
  readonly baseUrl: string;
  readonly name: string;
  readonly timeoutMs: number;
}

export interface PatternSettings {
  readonly dangerousFile?: string;
  readonly safeFile?: string;
}

export interface HistorySettings {
  readonly enabled: boolean;
  readonly file?: string;
  readonly mirrorShellHistory: boolean;
}

export interface AskshellConfig {
  readonly safetyMode: SafetyMode;
  readonly autocorrect: boolean;
  readonly multiStep: boolean;
  readonly maxCorrectAttempts: number;
  readonly model: ModelSettings;
  readonly patterns: PatternSettings;
  readonly history: HistorySettings;
  readonly shell?: string;
}
