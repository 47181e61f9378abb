import type { Classification, PatternSet, SafetyMode } from "@askshell/core";
import { classify } from "./classifier.js";
import { requiresConfirmation } from "./gate.js";
import { lookup, type PatternLookup } from "./pattern-store.js";

/**
 * A loaded pattern set bound to a safety mode.
 *
 * Classifications are computed on every call and never cached, so a new
 * policy built from a reloaded set applies immediately.
 */
export class SafetyPolicy {
  readonly patterns: PatternSet;
  readonly safetyMode: SafetyMode;

  constructor(patterns: PatternSet, safetyMode: SafetyMode) {
    this.patterns = patterns;
    this.safetyMode = safetyMode;
  }

  classify(commandText: string): Classification {
    return classify(commandText, this.patterns);
  }

  requiresConfirmation(classification: Classification): boolean {
    return requiresConfirmation(classification.verdict, this.safetyMode, {
      degraded: this.patterns.degraded,
    });
  }

  /** Both lists searched independently, for explaining a verdict. */
  lookup(commandText: string): PatternLookup {
    return lookup(commandText, this.patterns);
  }
}
