/**
 * Minimal argument parser.
 */

export interface ParsedArgs {
  readonly positionals: readonly string[];
  readonly flags: Readonly<Record<string, string | boolean>>;
}

const ALIASES: Readonly<Record<string, string>> = {
  C: "context",
  e: "explain",
  m: "multi-step",
  n: "alternatives",
  v: "verbose",
  h: "help",
};

export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
  "explain",
  "multi-step",
  "autocorrect",
  "verbose",
  "help",
  "version",
  "new",
]);

export const VALUE_FLAGS: ReadonlySet<string> = new Set([
  "alternatives",
  "context",
  "max-attempts",
  "safety-mode",
  "model",
]);

/** Boolean flags that also accept a `--no-` form. */
const NEGATABLE_FLAGS: ReadonlySet<string> = new Set(["autocorrect", "multi-step"]);

export function parseArgv(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, string | boolean> = {};

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === "--") {
      // Everything after -- is positional
      positionals.push(...argv.slice(i + 1));
      break;
    }

    if (arg.startsWith("--")) {
      const body = arg.slice(2);
      const eq = body.indexOf("=");
      if (eq !== -1) {
        flags[body.slice(0, eq)] = body.slice(eq + 1);
      } else if (body.startsWith("no-") && NEGATABLE_FLAGS.has(body.slice(3))) {
        flags[body.slice(3)] = false;
      } else {
        i += readFlag(body, argv[i + 1], flags);
      }
    } else if (arg.startsWith("-") && arg.length === 2) {
      const short = arg.slice(1);
      i += readFlag(ALIASES[short] ?? short, argv[i + 1], flags);
    } else {
      positionals.push(arg);
    }

    i++;
  }

  return { positionals, flags };
}

/** Store one flag; returns how many extra arguments it consumed. */
function readFlag(key: string, next: string | undefined, flags: Record<string, string | boolean>): number {
  if (BOOLEAN_FLAGS.has(key)) {
    flags[key] = true;
    return 0;
  }
  if (next !== undefined && !next.startsWith("-")) {
    flags[key] = next;
    return 1;
  }
  flags[key] = true;
  return 0;
}
