/**
 * Minimal interactive prompt helpers using node:readline.
 */

import { createInterface } from "node:readline/promises";
import type { Terminal } from "./terminal.js";

function createRl(terminal: Terminal) {
  return createInterface({ input: terminal.input, output: terminal.output });
}

export async function confirm(
  terminal: Terminal,
  opts: {
    readonly message: string;
    readonly initialValue?: boolean;
  },
): Promise<boolean> {
  const pc = terminal.colors;
  const rl = createRl(terminal);
  const hint = opts.initialValue ? "Y/n" : "y/N";
  try {
    const answer = await rl.question(`${pc.cyan("?")} ${opts.message} (${hint}): `);
    const trimmed = answer.trim().toLowerCase();
    if (trimmed === "") return opts.initialValue ?? false;
    return trimmed === "y" || trimmed === "yes";
  } finally {
    rl.close();
  }
}

/**
 * Numbered choice. An empty answer returns undefined.
 */
export async function select<T extends string>(
  terminal: Terminal,
  opts: {
    readonly message: string;
    readonly options: ReadonlyArray<{
      readonly value: T;
      readonly label: string;
      readonly hint?: string;
    }>;
  },
): Promise<T | undefined> {
  const pc = terminal.colors;
  const rl = createRl(terminal);
  try {
    terminal.print(`${pc.cyan("?")} ${opts.message}`);
    for (let i = 0; i < opts.options.length; i++) {
      const opt = opts.options[i];
      if (!opt) continue;
      const hint = opt.hint ? pc.dim(`  ${opt.hint}`) : "";
      terminal.print(`  ${pc.bold(`${i + 1})`)} ${opt.label}${hint}`);
    }
    for (;;) {
      const answer = (await rl.question(`${pc.cyan("?")} Choose [1-${opts.options.length}, empty to skip]: `)).trim();
      if (answer === "") return undefined;
      const num = Number.parseInt(answer, 10);
      if (num >= 1 && num <= opts.options.length) {
        const selected = opts.options[num - 1];
        if (selected) return selected.value;
      }
      terminal.print(`  ${pc.red(`Please enter a number between 1 and ${opts.options.length}`)}`);
    }
  } finally {
    rl.close();
  }
}

/** Prompts for one line at a time. */
export interface LineReader {
  /** The next line, or undefined once input has ended. */
  read(prompt: string): Promise<string | undefined>;
  close(): void;
}

/**
 * One readline interface for a whole conversation, so lines typed (or piped)
 * ahead of a prompt are not lost between reads.
 */
export function lineReader(terminal: Terminal): LineReader {
  const rl = createRl(terminal);
  const lines = rl[Symbol.asyncIterator]();
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });
  return {
    async read(prompt) {
      if (!closed) {
        rl.setPrompt(prompt);
        rl.prompt();
      }
      const next = await lines.next();
      return next.done ? undefined : next.value;
    },
    close: () => {
      rl.close();
    },
  };
}
