import type { HistoryLedger, Plan } from "@askshell/core";
import { createPlan, type SafetyPolicy } from "@askshell/safety";

/**
 * Build a one-step plan that re-runs history entry `sequenceNumber`.
 *
 * The command is classified against the policy's current patterns, not the
 * ones in force when it first ran. Rejects with HistoryEntryNotFoundError
 * for an unknown number.
 */
export async function replayPlan(
  ledger: HistoryLedger,
  sequenceNumber: number,
  policy: SafetyPolicy,
): Promise<Plan> {
  const entry = await ledger.get(sequenceNumber);
  return createPlan(`run ${entry.text}`, [entry.text], policy, "history-replay");
}
