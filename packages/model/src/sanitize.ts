/**
 * Reply cleanup. Models wrap commands in Markdown despite being told not to.
 */

const FENCE_LINE = /^\s*```[\w+-]*\s*$/;
const LIST_MARKER = /^(?:\d+[.)]|[-*+])\s+/;
const PROMPT_MARKER = /^\$\s+/;
const WRAPPED_IN_BACKTICKS = /^`+([^`]*)`+$/;

/** Drop Markdown code-fence lines, keeping what they enclose. */
export function stripCodeFences(text: string): string {
  return text
    .split(/\r?\n/)
    .filter((line) => !FENCE_LINE.test(line))
    .join("\n");
}

/**
 * Backticks are only removed where they wrap the whole line; inner ones may
 * be command substitution.
 */
function cleanLine(line: string): string {
  return line
    .trim()
    .replace(LIST_MARKER, "")
    .replace(PROMPT_MARKER, "")
    .trim()
    .replace(WRAPPED_IN_BACKTICKS, "$1")
    .trim();
}

/** Ordered commands from a reply with one command per line. */
export function splitPlan(reply: string): string[] {
  return stripCodeFences(reply)
    .split(/\r?\n|\r/)
    .map(cleanLine)
    .filter((line) => line.length > 0);
}

/**
 * One command from a reply: its first command line. Further lines are never
 * joined to it; `dropped` counts them.
 */
export function sanitizeCommand(reply: string): { readonly command: string; readonly dropped: number } {
  const [command = "", ...rest] = splitPlan(reply);
  return { command, dropped: rest.length };
}

export function sanitizeExplanation(reply: string): string {
  return reply.replaceAll("\n\n", "\n").trim();
}

/** Keep the end of `text`, where the error usually is. */
export function tail(text: string, maxChars: number): string {
  return text.length <= maxChars ? text : `…${text.slice(text.length - maxChars)}`;
}
