import { formatHistoryEntry } from "../render.js";
import type { Session } from "../session.js";

export async function showHistory(session: Session, count: number): Promise<number> {
  const { ledger, terminal } = session;
  if (!ledger) {
    terminal.print("History is disabled.");
    return 0;
  }
  const entries = await ledger.list(count);
  if (entries.length === 0) {
    terminal.print("No history yet.");
    return 0;
  }
  // Oldest of the selection first, like shell `history`.
  for (const entry of [...entries].reverse()) {
    terminal.print(formatHistoryEntry(entry, terminal.colors));
  }
  return 0;
}
