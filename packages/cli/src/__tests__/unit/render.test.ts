import type { HistoryEntry } from "@askshell/core";
import {
  ConfigurationError,
  HistoryEntryNotFoundError,
  InternalError,
  ModelApiKeyMissingError,
  ModelRateLimitedError,
  ModelRequestError,
  UsageError,
} from "@askshell/errors";
import { makePatternSet, makePlan, makeStep } from "@askshell/test-utils";
import pc from "picocolors";
import { describe, expect, it } from "vitest";
import {
  errorHint,
  formatHistoryEntry,
  formatLookup,
  formatPatternSummary,
  formatPlan,
  formatStep,
  formatVerdict,
} from "../../render.js";

const colors = pc.createColors(false);

describe("formatVerdict", () => {
  it("names the matched pattern for dangerous commands", () => {
    expect(
      formatVerdict(
        { verdict: "dangerous", match: { label: "sudo", category: "Privilege escalation", origin: "x", line: 3 } },
        colors,
      ),
    ).toBe("dangerous: sudo (Privilege escalation)");
    expect(formatVerdict({ verdict: "safe" }, colors)).toBe("safe");
    expect(formatVerdict({ verdict: "unclassified" }, colors)).toBe("unclassified");
  });
});

describe("formatPlan", () => {
  it("lists numbered steps with verdicts", () => {
    const plan = makePlan([makeStep("ls", { verdict: "safe" }), makeStep("make")], "build it");

    expect(formatPlan(plan, colors)).toEqual([
      "Plan for: build it",
      "  1. ls  [safe]",
      "  2. make  [unclassified]",
    ]);
  });

  it("marks corrected steps", () => {
    expect(formatStep(makeStep("make all", { origin: "corrected" }), 0, colors)).toBe(
      "  1. make all  [unclassified] (corrected)",
    );
  });
});

describe("formatHistoryEntry", () => {
  it("shows number, time, command and non-default origin", () => {
    const entry: HistoryEntry = {
      sequenceNumber: 12,
      text: "du -sh .",
      timestamp: "2026-01-01T00:00:00.000Z",
      origin: "history-replay",
    };
    expect(formatHistoryEntry(entry, colors)).toBe("  #12  2026-01-01T00:00:00.000Z  du -sh . (history-replay)");
  });
});

describe("formatPatternSummary", () => {
  it("reports counts and degradation", () => {
    const set = makePatternSet({ dangerous: ["a", "b"], safe: ["c"], degraded: true });

    expect(formatPatternSummary(set, colors)).toEqual([
      "dangerous patterns: 2",
      "safe patterns: 1",
      "degraded: a pattern source could not be read; nothing runs without confirmation",
    ]);
  });
});

describe("formatLookup", () => {
  it("shows both lists", () => {
    const set = makePatternSet({ safe: ["^ls"] });
    const [safe] = set.safe;

    expect(formatLookup("ls", { verdict: "safe" }, safe ? { safe } : {}, colors)).toEqual([
      "ls  [safe]",
      "  dangerous: no match",
      "  safe: ^ls  (^ls; test; test:safe:1)",
    ]);
  });
});

describe("errorHint", () => {
  it("points usage errors at --help", () => {
    expect(errorHint(new UsageError("unknown option --yes"))).toBe("Run askshell --help for usage.");
  });

  it("points unknown history entries at the history command", () => {
    expect(errorHint(new HistoryEntryNotFoundError(9))).toBe("Run askshell history to list recorded entries.");
  });

  it("advises waiting when rate limited", () => {
    expect(errorHint(new ModelRateLimitedError("https://llm.test/v1/chat/completions"))).toBe(
      "The model provider is rate limiting requests; try again in a moment.",
    );
  });

  it("points configuration errors at config set", () => {
    expect(errorHint(new ConfigurationError("config.json", [{ path: "autocorrect", message: "bad" }]))).toBe(
      "Change the value with askshell config set <key> <value>.",
    );
  });

  it("points model failures at the model settings", () => {
    expect(errorHint(new ModelRequestError("https://llm.test/v1/chat/completions", "HTTP 500: down", 500))).toBe(
      "Check model.baseUrl and model.name with askshell config show.",
    );
  });

  it("adds nothing where the message already says what to do", () => {
    expect(errorHint(new ModelApiKeyMissingError("/tmp/config.json"))).toBeUndefined();
    expect(errorHint(new InternalError("bug"))).toBeUndefined();
  });
});
