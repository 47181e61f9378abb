import type { SafetyMode, Verdict } from "@askshell/core";

export interface GateContext {
  /** True when the pattern set was loaded with an unreadable source. */
  readonly degraded?: boolean;
}

/**
 * Confirmation Gate.
 *
 * | mode | safe     | dangerous | unclassified |
 * |------|----------|-----------|--------------|
 * | 0    | confirm  | confirm   | confirm      |
 * | 1    | auto-run | confirm   | confirm      |
 *
 * A degraded pattern set never auto-runs.
 */
export function requiresConfirmation(
  verdict: Verdict,
  safetyMode: SafetyMode,
  context: GateContext = {},
): boolean {
  if (verdict !== "safe") return true;
  if (safetyMode !== 1) return true;
  return context.degraded === true;
}
