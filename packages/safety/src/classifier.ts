import type { Classification, Pattern, PatternMatch, PatternSet } from "@askshell/core";

function toMatch(pattern: Pattern): PatternMatch {
  return {
    label: pattern.label,
    category: pattern.category,
    origin: pattern.origin,
    line: pattern.line,
  };
}

const LINE_BREAK = /[\r\n]/;

/** True when the command is a script of several lines rather than one command. */
export function spansLines(commandText: string): boolean {
  return LINE_BREAK.test(commandText.trim());
}

/**
 * Classify one command against a pattern set.
 *
 * The dangerous list is consulted first, so a command matching both lists
 * is dangerous. A command matching neither is unclassified. A command that
 * spans several lines is never safe, whatever the safe patterns say.
 */
export function classify(commandText: string, set: PatternSet): Classification {
  const dangerous = set.dangerous.find((pattern) => pattern.regex.test(commandText));
  if (dangerous) {
    return { verdict: "dangerous", match: toMatch(dangerous) };
  }

  if (spansLines(commandText)) {
    return { verdict: "unclassified" };
  }

  const safe = set.safe.find((pattern) => pattern.regex.test(commandText));
  if (safe) {
    return { verdict: "safe", match: toMatch(safe) };
  }

  return { verdict: "unclassified" };
}
