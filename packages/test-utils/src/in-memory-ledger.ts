import type { CommandStep, HistoryEntry, HistoryLedger } from "@askshell/core";
import { HistoryEntryNotFoundError } from "@askshell/errors";

export interface InMemoryLedgerOptions {
  /** Entries already present, oldest first. */
  readonly entries?: readonly HistoryEntry[];
  /** Make every append report a storage failure (resolves undefined). */
  readonly failAppends?: boolean;
  readonly now?: () => Date;
}

/**
 * HistoryLedger held in an array. Sequence numbers continue from the last
 * seeded entry.
 */
export class InMemoryHistoryLedger implements HistoryLedger {
  readonly entries: HistoryEntry[];
  private readonly failAppends: boolean;
  private readonly now: () => Date;

  constructor(options: InMemoryLedgerOptions = {}) {
    this.entries = [...(options.entries ?? [])];
    this.failAppends = options.failAppends ?? false;
    this.now = options.now ?? (() => new Date());
  }

  async append(step: CommandStep): Promise<HistoryEntry | undefined> {
    if (this.failAppends) return undefined;
    const last = this.entries.at(-1);
    const entry: HistoryEntry = {
      sequenceNumber: (last?.sequenceNumber ?? 0) + 1,
      text: step.text,
      timestamp: this.now().toISOString(),
      origin: step.origin,
    };
    this.entries.push(entry);
    return entry;
  }

  async list(count: number): Promise<readonly HistoryEntry[]> {
    return [...this.entries].reverse().slice(0, Math.max(0, count));
  }

  async get(sequenceNumber: number): Promise<HistoryEntry> {
    const entry = this.entries.find((candidate) => candidate.sequenceNumber === sequenceNumber);
    if (!entry) {
      throw new HistoryEntryNotFoundError(sequenceNumber);
    }
    return entry;
  }

  /** Texts of recorded entries, oldest first. */
  get texts(): string[] {
    return this.entries.map((entry) => entry.text);
  }
}
