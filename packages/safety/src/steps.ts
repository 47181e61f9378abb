import { randomUUID } from "node:crypto";
import type { CommandStep, Plan, StepOrigin } from "@askshell/core";
import type { SafetyPolicy } from "./policy.js";

export interface StepOptions {
  readonly origin?: StepOrigin;
  readonly attempt?: number;
  readonly correctedFrom?: string;
}

/**
 * Wrap command text as a step classified against the policy's current
 * pattern set.
 */
export function createStep(text: string, policy: SafetyPolicy, options: StepOptions = {}): CommandStep {
  return Object.freeze({
    id: randomUUID(),
    text,
    origin: options.origin ?? "generated",
    classification: policy.classify(text),
    attempt: options.attempt ?? 0,
    ...(options.correctedFrom ? { correctedFrom: options.correctedFrom } : {}),
  });
}

export function createPlan(
  request: string,
  commands: readonly string[],
  policy: SafetyPolicy,
  origin: StepOrigin = "generated",
): Plan {
  return Object.freeze({
    id: randomUUID(),
    request,
    steps: Object.freeze(commands.map((text) => createStep(text, policy, { origin }))),
  });
}
