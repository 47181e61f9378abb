import type { Logger, LogLevel } from "@askshell/core";

export interface LogRecord {
  readonly level: LogLevel;
  readonly tag: string;
  readonly message: string;
}

/**
 * Logger that keeps every line in memory. Child loggers share the parent's
 * record list.
 */
export class RecordingLogger implements Logger {
  readonly tag: string;
  readonly records: LogRecord[];

  constructor(tag = "test", records: LogRecord[] = []) {
    this.tag = tag;
    this.records = records;
  }

  debug(message: string): void {
    this.records.push({ level: "debug", tag: this.tag, message });
  }

  info(message: string): void {
    this.records.push({ level: "info", tag: this.tag, message });
  }

  warn(message: string): void {
    this.records.push({ level: "warn", tag: this.tag, message });
  }

  error(message: string): void {
    this.records.push({ level: "error", tag: this.tag, message });
  }

  child(tag: string): RecordingLogger {
    return new RecordingLogger(`${this.tag}:${tag}`, this.records);
  }

  /** Messages at one level, in order. */
  messages(level: LogLevel): string[] {
    return this.records.filter((record) => record.level === level).map((record) => record.message);
  }
}
