/**
 * HistoryLedger stored as JSON Lines, one entry per executed step.
 *
 * The file is only ever appended to. Lines that fail to parse are skipped
 * with a warning, so one torn write does not hide the rest of the history,
 * and a record appended after a torn line starts on a line of its own.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CommandStep, HistoryEntry, HistoryLedger, Logger } from "@askshell/core";
import { HistoryEntryNotFoundError, HistoryIOError } from "@askshell/errors";
import type { ShellHistoryMirror } from "./shell-history.js";
import { parseHistoryLine, serializeHistoryEntry } from "./validation.js";

export interface FileHistoryLedgerOptions {
  readonly path: string;
  readonly logger: Logger;
  /** Also append each recorded command to the user's shell history. */
  readonly mirror?: ShellHistoryMirror;
  readonly now?: () => Date;
}

export class FileHistoryLedger implements HistoryLedger {
  readonly path: string;
  private readonly logger: Logger;
  private readonly mirror: ShellHistoryMirror | undefined;
  private readonly now: () => Date;

  constructor(options: FileHistoryLedgerOptions) {
    this.path = options.path;
    this.logger = options.logger;
    this.mirror = options.mirror;
    this.now = options.now ?? (() => new Date());
  }

  async append(step: CommandStep): Promise<HistoryEntry | undefined> {
    let entry: HistoryEntry;
    try {
      const raw = await this.readRaw();
      const entries = this.parseEntries(raw);
      const last = entries.reduce((max, current) => Math.max(max, current.sequenceNumber), 0);
      entry = {
        sequenceNumber: last + 1,
        text: step.text,
        timestamp: this.now().toISOString(),
        origin: step.origin,
      };
      await fs.mkdir(path.dirname(this.path), { recursive: true });
      const separator = raw.length > 0 && !raw.endsWith("\n") ? "\n" : "";
      await fs.appendFile(this.path, separator + serializeHistoryEntry(entry), { encoding: "utf-8", mode: 0o600 });
    } catch (error) {
      const failure = error instanceof HistoryIOError ? error : new HistoryIOError("append", this.path, error);
      this.logger.warn(failure.message);
      return undefined;
    }

    await this.mirror?.record(step.text, this.now());
    return entry;
  }

  async list(count: number): Promise<readonly HistoryEntry[]> {
    const entries = await this.readEntries();
    return entries.reverse().slice(0, Math.max(0, count));
  }

  async get(sequenceNumber: number): Promise<HistoryEntry> {
    const entries = await this.readEntries();
    const entry = entries.find((candidate) => candidate.sequenceNumber === sequenceNumber);
    if (!entry) {
      throw new HistoryEntryNotFoundError(sequenceNumber);
    }
    return entry;
  }

  /** All readable entries, oldest first. */
  private async readEntries(): Promise<HistoryEntry[]> {
    return this.parseEntries(await this.readRaw());
  }

  /** File contents; a missing file is an empty history. */
  private async readRaw(): Promise<string> {
    try {
      return await fs.readFile(this.path, "utf-8");
    } catch (error) {
      if (isNotFound(error)) return "";
      throw new HistoryIOError("read", this.path, error);
    }
  }

  private parseEntries(raw: string): HistoryEntry[] {
    const entries: HistoryEntry[] = [];
    for (const [index, line] of raw.split("\n").entries()) {
      if (line.trim() === "") continue;
      const entry = parseHistoryLine(line);
      if (entry) {
        entries.push(entry);
      } else {
        this.logger.warn(`skipping corrupt history line ${index + 1} in ${this.path}`);
      }
    }
    return entries;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
