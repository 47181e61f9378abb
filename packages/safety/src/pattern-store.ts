/**
 * Pattern Store: loads dangerous and safe regular expressions into an
 * immutable {@link PatternSet}.
 *
 * File format, one pattern per line:
 *   - blank lines are ignored
 *   - a line whose first non-blank character is "#" is a comment and names
 *     the category of the patterns that follow it
 *   - a trailing comment starts at the first "#" preceded by whitespace and
 *     becomes the pattern's label
 *
 * Loading never throws. An unreadable source contributes nothing and marks
 * the set degraded; a malformed pattern is skipped. Both are logged.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { Logger, Pattern, PatternSet, PatternSettings } from "@askshell/core";
import { getErrorMessage, PatternSourceError, PatternSyntaxError } from "@askshell/errors";

export const DEFAULT_CATEGORY = "uncategorized";

export const BUILTIN_DANGEROUS_FILE = fileURLToPath(new URL("../patterns/dangerous.txt", import.meta.url));
export const BUILTIN_SAFE_FILE = fileURLToPath(new URL("../patterns/safe.txt", import.meta.url));

// ---------------------------------------------------------------------------
// Sources
// ---------------------------------------------------------------------------

export interface PatternSource {
  /** Shown in warnings and recorded as each pattern's origin. */
  readonly name: string;
  read(): Promise<string>;
}

export interface PatternSources {
  readonly dangerous: readonly PatternSource[];
  readonly safe: readonly PatternSource[];
}

export function fileSource(path: string, name: string = path): PatternSource {
  return { name, read: () => readFile(path, "utf-8") };
}

export function textSource(name: string, text: string): PatternSource {
  return { name, read: () => Promise.resolve(text) };
}

/**
 * Built-in lists first, then the user's files from configuration.
 */
export function resolvePatternSources(settings: PatternSettings): PatternSources {
  return {
    dangerous: [
      fileSource(BUILTIN_DANGEROUS_FILE, "builtin:dangerous"),
      ...(settings.dangerousFile ? [fileSource(settings.dangerousFile)] : []),
    ],
    safe: [
      fileSource(BUILTIN_SAFE_FILE, "builtin:safe"),
      ...(settings.safeFile ? [fileSource(settings.safeFile)] : []),
    ],
  };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export interface ParsedPatternSource {
  readonly patterns: readonly Pattern[];
  readonly warnings: readonly string[];
}

const TRAILING_COMMENT = /\s#/;

export function parsePatternSource(text: string, origin: string, logger: Logger): ParsedPatternSource {
  const patterns: Pattern[] = [];
  const warnings: string[] = [];
  let category = DEFAULT_CATEGORY;

  const lines = text.split(/\r?\n/);
  for (const [index, rawLine] of lines.entries()) {
    const trimmed = rawLine.trim();
    if (trimmed === "") continue;

    if (trimmed.startsWith("#")) {
      const heading = trimmed.replace(/^#+/, "").trim();
      if (heading !== "") category = heading;
      continue;
    }

    const commentAt = rawLine.search(TRAILING_COMMENT);
    const source = (commentAt === -1 ? rawLine : rawLine.slice(0, commentAt)).trim();
    const comment = commentAt === -1 ? "" : rawLine.slice(commentAt).trim().replace(/^#+/, "").trim();
    const line = index + 1;

    let regex: RegExp;
    try {
      regex = new RegExp(source);
    } catch (error) {
      const syntaxError = new PatternSyntaxError(origin, line, source, getErrorMessage(error));
      logger.warn(syntaxError.message);
      warnings.push(syntaxError.message);
      continue;
    }

    patterns.push(
      Object.freeze({
        regex,
        source,
        label: comment === "" ? source : comment,
        category,
        origin,
        line,
      }),
    );
  }

  return { patterns, warnings };
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

interface ListLoad {
  patterns: Pattern[];
  warnings: string[];
  degraded: boolean;
}

async function loadList(sources: readonly PatternSource[], logger: Logger): Promise<ListLoad> {
  const result: ListLoad = { patterns: [], warnings: [], degraded: false };

  for (const source of sources) {
    let text: string;
    try {
      text = await source.read();
    } catch (cause) {
      const error = new PatternSourceError(source.name, getErrorMessage(cause), cause);
      logger.warn(error.message);
      result.warnings.push(error.message);
      result.degraded = true;
      continue;
    }

    const parsed = parsePatternSource(text, source.name, logger);
    result.patterns.push(...parsed.patterns);
    result.warnings.push(...parsed.warnings);
  }

  return result;
}

/**
 * Read every source and build a frozen pattern set. Sources are read once;
 * picking up edits requires another call.
 */
export async function loadPatternSet(sources: PatternSources, logger: Logger): Promise<PatternSet> {
  const dangerous = await loadList(sources.dangerous, logger);
  const safe = await loadList(sources.safe, logger);

  logger.debug(
    `loaded ${dangerous.patterns.length} dangerous and ${safe.patterns.length} safe patterns` +
      (dangerous.degraded || safe.degraded ? " (degraded)" : ""),
  );

  return Object.freeze({
    dangerous: Object.freeze(dangerous.patterns),
    safe: Object.freeze(safe.patterns),
    degraded: dangerous.degraded || safe.degraded,
    warnings: Object.freeze([...dangerous.warnings, ...safe.warnings]),
  });
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

export interface PatternLookup {
  readonly dangerous?: Pattern;
  readonly safe?: Pattern;
}

/**
 * First dangerous and first safe pattern matching the command, searched
 * independently. Matching is a case-sensitive search anywhere in the text.
 */
export function lookup(command: string, set: PatternSet): PatternLookup {
  const dangerous = set.dangerous.find((pattern) => pattern.regex.test(command));
  const safe = set.safe.find((pattern) => pattern.regex.test(command));
  return {
    ...(dangerous ? { dangerous } : {}),
    ...(safe ? { safe } : {}),
  };
}
