import type { SafetyMode, Verdict } from "@askshell/core";
import { makePatternSet } from "@askshell/test-utils";
import { describe, expect, it } from "vitest";
import { requiresConfirmation } from "../../gate.js";
import { SafetyPolicy } from "../../policy.js";

describe("requiresConfirmation", () => {
  const table: Array<[SafetyMode, Verdict, boolean]> = [
    [0, "safe", true],
    [0, "dangerous", true],
    [0, "unclassified", true],
    [1, "safe", false],
    [1, "dangerous", true],
    [1, "unclassified", true],
  ];

  it.each(table)("mode %i, %s => %s", (mode, verdict, expected) => {
    expect(requiresConfirmation(verdict, mode)).toBe(expected);
  });

  it("never auto-runs against a degraded pattern set", () => {
    expect(requiresConfirmation("safe", 1, { degraded: true })).toBe(true);
  });

  it("auto-runs a safe command in mode 1 when the set is intact", () => {
    expect(requiresConfirmation("safe", 1, { degraded: false })).toBe(false);
  });
});

describe("SafetyPolicy", () => {
  it("auto-runs a safe-only command in mode 1 and confirms it in mode 0", () => {
    const set = makePatternSet({ safe: ["^ls\\b"] });
    const auto = new SafetyPolicy(set, 1);
    const ask = new SafetyPolicy(set, 0);

    expect(auto.requiresConfirmation(auto.classify("ls -la"))).toBe(false);
    expect(ask.requiresConfirmation(ask.classify("ls -la"))).toBe(true);
  });

  it("takes degradation from its pattern set", () => {
    const policy = new SafetyPolicy(makePatternSet({ safe: ["^ls\\b"], degraded: true }), 1);
    expect(policy.requiresConfirmation(policy.classify("ls"))).toBe(true);
  });

  it("classifies against a newly loaded set", () => {
    const before = new SafetyPolicy(makePatternSet({ safe: ["^make\\b"] }), 1);
    const after = new SafetyPolicy(makePatternSet({ dangerous: ["\\bmake\\s+install\\b"], safe: ["^make\\b"] }), 1);

    expect(before.classify("make install").verdict).toBe("safe");
    expect(after.classify("make install").verdict).toBe("dangerous");
  });

  it("explains both lists through lookup", () => {
    const policy = new SafetyPolicy(makePatternSet({ dangerous: ["-delete"], safe: ["^find\\b"] }), 1);
    const result = policy.lookup("find . -delete");
    expect(result.dangerous?.source).toBe("-delete");
    expect(result.safe?.source).toBe("^find\\b");
  });
});
