import { makePatternSet } from "@askshell/test-utils";
import { describe, expect, it } from "vitest";
import { SafetyPolicy } from "../../policy.js";
import { createPlan, createStep } from "../../steps.js";

const policy = new SafetyPolicy(makePatternSet({ dangerous: ["\\bsudo\\b"], safe: ["^ls\\b"] }), 1);

describe("createStep", () => {
  it("classifies the command", () => {
    const step = createStep("sudo ls", policy);
    expect(step.classification.verdict).toBe("dangerous");
    expect(step.origin).toBe("generated");
    expect(step.attempt).toBe(0);
    expect(step.correctedFrom).toBeUndefined();
  });

  it("records correction lineage", () => {
    const original = createStep("lss", policy);
    const corrected = createStep("ls", policy, {
      origin: "corrected",
      attempt: 1,
      correctedFrom: original.id,
    });
    expect(corrected.correctedFrom).toBe(original.id);
    expect(corrected.attempt).toBe(1);
    expect(corrected.id).not.toBe(original.id);
    expect(Object.isFrozen(corrected)).toBe(true);
  });
});

describe("createPlan", () => {
  it("keeps command order", () => {
    const plan = createPlan("tidy up", ["ls", "git status", "sudo rm -rf build"], policy);
    expect(plan.request).toBe("tidy up");
    expect(plan.steps.map((step) => [step.text, step.classification.verdict])).toEqual([
      ["ls", "safe"],
      ["git status", "unclassified"],
      ["sudo rm -rf build", "dangerous"],
    ]);
  });

  it("marks replayed steps", () => {
    const plan = createPlan("replay #3", ["ls"], policy, "history-replay");
    expect(plan.steps[0]?.origin).toBe("history-replay");
  });
});
