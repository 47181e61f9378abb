/**
 * Text shown to the user. Pure functions of their inputs.
 */

import type { Classification, CommandStep, HistoryEntry, PatternSet, Plan } from "@askshell/core";
import {
  type AskshellError,
  hasCode,
  isExternalError,
  isNotFoundError,
  isRateLimitError,
  isValidationError,
} from "@askshell/errors";
import type { PatternLookup } from "@askshell/safety";
import type { Colors } from "./terminal.js";

export function formatVerdict(classification: Classification, pc: Colors): string {
  switch (classification.verdict) {
    case "safe":
      return pc.green("safe");
    case "dangerous": {
      const match = classification.match;
      return pc.red(match ? `dangerous: ${match.label} (${match.category})` : "dangerous");
    }
    case "unclassified":
      return pc.yellow("unclassified");
  }
}

export function formatStep(step: CommandStep, index: number, pc: Colors): string {
  const corrected = step.origin === "corrected" ? pc.dim(" (corrected)") : "";
  return `  ${pc.bold(`${index + 1}.`)} ${step.text}  [${formatVerdict(step.classification, pc)}]${corrected}`;
}

export function formatPlan(plan: Plan, pc: Colors): string[] {
  return [`${pc.bold("Plan for:")} ${plan.request}`, ...plan.steps.map((step, index) => formatStep(step, index, pc))];
}

export function formatHistoryEntry(entry: HistoryEntry, pc: Colors): string {
  const origin = entry.origin === "generated" ? "" : pc.dim(` (${entry.origin})`);
  return `${pc.bold(`#${entry.sequenceNumber}`.padStart(5))}  ${pc.dim(entry.timestamp)}  ${entry.text}${origin}`;
}

export function formatPatternSummary(set: PatternSet, pc: Colors): string[] {
  const lines = [`dangerous patterns: ${set.dangerous.length}`, `safe patterns: ${set.safe.length}`];
  if (set.degraded) {
    lines.push(pc.red("degraded: a pattern source could not be read; nothing runs without confirmation"));
  }
  for (const warning of set.warnings) {
    lines.push(pc.yellow(`warning: ${warning}`));
  }
  return lines;
}

/** Both matches for a command, for `askshell patterns <command>`. */
export function formatLookup(command: string, classification: Classification, found: PatternLookup, pc: Colors): string[] {
  const describe = (kind: string, pattern: PatternLookup["dangerous"]): string =>
    pattern
      ? `  ${kind}: ${pattern.source}  (${pattern.label}; ${pattern.category}; ${pattern.origin}:${pattern.line})`
      : `  ${kind}: no match`;
  return [
    `${command}  [${formatVerdict(classification, pc)}]`,
    describe("dangerous", found.dangerous),
    describe("safe", found.safe),
  ];
}

export function formatExplanation(command: string, explanation: string, pc: Colors): string[] {
  return [pc.bold(command), ...explanation.split("\n").map((line) => `  ${line}`)];
}

/** Follow-up advice printed under a top-level error, when there is any. */
export function errorHint(error: AskshellError): string | undefined {
  if (hasCode(error, "USAGE_INVALID")) return "Run askshell --help for usage.";
  if (hasCode(error, "MODEL_API_KEY_MISSING")) return undefined;
  if (isNotFoundError(error)) return "Run askshell history to list recorded entries.";
  if (isRateLimitError(error)) return "The model provider is rate limiting requests; try again in a moment.";
  if (isValidationError(error)) return "Change the value with askshell config set <key> <value>.";
  if (isExternalError(error)) return "Check model.baseUrl and model.name with askshell config show.";
  return undefined;
}
