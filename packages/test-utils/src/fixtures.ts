/**
 * Builders for domain values used across test suites.
 */

import type {
  AskshellConfig,
  Classification,
  CommandStep,
  ExecutionResult,
  Pattern,
  PatternSet,
  Plan,
  StepOrigin,
  Verdict,
} from "@askshell/core";

let stepCounter = 0;

export function makePattern(source: string, overrides: Partial<Omit<Pattern, "regex">> = {}): Pattern {
  return {
    regex: new RegExp(source),
    source,
    label: source,
    category: "test",
    origin: "test",
    line: 1,
    ...overrides,
  };
}

export interface PatternSetInit {
  readonly dangerous?: readonly string[];
  readonly safe?: readonly string[];
  readonly degraded?: boolean;
}

export function makePatternSet(init: PatternSetInit = {}): PatternSet {
  return Object.freeze({
    dangerous: (init.dangerous ?? []).map((source, index) =>
      makePattern(source, { origin: "test:dangerous", line: index + 1 }),
    ),
    safe: (init.safe ?? []).map((source, index) =>
      makePattern(source, { origin: "test:safe", line: index + 1 }),
    ),
    degraded: init.degraded ?? false,
    warnings: [],
  });
}

export interface StepInit {
  readonly id?: string;
  readonly verdict?: Verdict;
  readonly classification?: Classification;
  readonly origin?: StepOrigin;
  readonly attempt?: number;
  readonly correctedFrom?: string;
}

/** A step with a given verdict; the match is a placeholder. */
export function makeStep(text: string, init: StepInit = {}): CommandStep {
  stepCounter++;
  const verdict = init.verdict ?? "unclassified";
  const classification: Classification =
    init.classification ??
    (verdict === "unclassified"
      ? { verdict }
      : { verdict, match: { label: `${verdict} fixture`, category: "test", origin: "test", line: 1 } });
  return {
    id: init.id ?? `step-${stepCounter}`,
    text,
    origin: init.origin ?? "generated",
    classification,
    attempt: init.attempt ?? 0,
    ...(init.correctedFrom ? { correctedFrom: init.correctedFrom } : {}),
  };
}

export function makePlan(steps: readonly (string | CommandStep)[], request = "test request"): Plan {
  return {
    id: `plan-${++stepCounter}`,
    request,
    steps: steps.map((step) => (typeof step === "string" ? makeStep(step) : step)),
  };
}

export function makeConfig(overrides: Partial<AskshellConfig> = {}): AskshellConfig {
  return {
    safetyMode: 0,
    autocorrect: false,
    multiStep: true,
    maxCorrectAttempts: 3,
    model: { baseUrl: "https://llm.test/v1", name: "test-model", timeoutMs: 1_000 },
    patterns: {},
    history: { enabled: true, mirrorShellHistory: false },
    ...overrides,
  };
}

export function succeeded(durationMs = 1): ExecutionResult {
  return { exitCode: 0, stderr: "", succeeded: true, durationMs, signal: null };
}

export function failed(exitCode: number, stderr = "", durationMs = 1): ExecutionResult {
  return { exitCode, stderr, succeeded: exitCode === 0, durationMs, signal: null };
}
