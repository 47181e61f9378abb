import { stderr, stdin, stdout } from "node:process";
import type { Readable, Writable } from "node:stream";
import pc from "picocolors";

export type Colors = ReturnType<typeof pc.createColors>;

/** Where the CLI writes and reads. */
export interface Terminal {
  readonly colors: Colors;
  readonly input: Readable;
  readonly output: Writable;
  print(line?: string): void;
  printError(line: string): void;
}

export function processTerminal(): Terminal {
  return {
    colors: pc,
    input: stdin,
    output: stdout,
    print: (line = "") => {
      console.log(line);
    },
    printError: (line) => {
      console.error(line);
    },
  };
}

/** Colorless terminal over the given streams. */
export function plainTerminal(input: Readable, output: Writable, errors: Writable = stderr): Terminal {
  return {
    colors: pc.createColors(false),
    input,
    output,
    print: (line = "") => {
      output.write(`${line}\n`);
    },
    printError: (line) => {
      errors.write(`${line}\n`);
    },
  };
}
