import { UsageError } from "@askshell/errors";
import { replayPlan } from "@askshell/history";
import type { Session } from "../session.js";
import { reportResult } from "./report.js";

/** Re-run history entry `sequenceNumber` through the same gates as a new command. */
export async function replay(session: Session, sequenceNumber: number): Promise<number> {
  const { ledger, terminal } = session;
  if (!ledger) {
    throw new UsageError("history is disabled, nothing to replay");
  }
  const plan = await replayPlan(ledger, sequenceNumber, session.policy);
  terminal.print(terminal.colors.dim(`Replaying #${sequenceNumber}`));
  return reportResult(await session.controller.execute(plan, session.config), terminal);
}
