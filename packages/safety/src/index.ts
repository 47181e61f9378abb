/**
 * @askshell/safety
 *
 * Pattern Store, Safety Classifier and Confirmation Gate.
 */

export const PACKAGE_NAME = "@askshell/safety" as const;

export { classify, spansLines } from "./classifier.js";
export { type GateContext, requiresConfirmation } from "./gate.js";
export {
  BUILTIN_DANGEROUS_FILE,
  BUILTIN_SAFE_FILE,
  DEFAULT_CATEGORY,
  fileSource,
  loadPatternSet,
  lookup,
  type ParsedPatternSource,
  type PatternLookup,
  type PatternSource,
  type PatternSources,
  parsePatternSource,
  resolvePatternSources,
  textSource,
} from "./pattern-store.js";
export { SafetyPolicy } from "./policy.js";
export { createPlan, createStep, type StepOptions } from "./steps.js";
