/**
 * Tag-prefixed console logging: `[askshell:safety] message`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger with `:${tag}` appended to this logger's tag. */
  child(tag: string): Logger;
}

export interface LoggerOptions {
  /** Emit debug lines. Defaults to false. */
  readonly verbose?: boolean;
  /** Where lines go. Defaults to the console method matching the level. */
  readonly sink?: (level: LogLevel, line: string) => void;
}

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const sink = options.sink ?? consoleSink;
  const emit = (level: LogLevel, message: string): void => {
    if (level === "debug" && !verbose) return;
    sink(level, `[${tag}] ${message}`);
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
    child: (childTag) => createLogger(`${tag}:${childTag}`, options),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
