import { formatLookup, formatPatternSummary } from "../render.js";
import type { Session } from "../session.js";

/** Pattern counts and load warnings, or how one command classifies. */
export function showPatterns(session: Session, command: string | undefined): number {
  const { policy, terminal } = session;
  const lines =
    command === undefined
      ? formatPatternSummary(session.patterns, terminal.colors)
      : formatLookup(command, policy.classify(command), policy.lookup(command), terminal.colors);
  for (const line of lines) {
    terminal.print(line);
  }
  return 0;
}
