import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { RecordingLogger } from "@askshell/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  BUILTIN_DANGEROUS_FILE,
  BUILTIN_SAFE_FILE,
  fileSource,
  loadPatternSet,
  lookup,
  type PatternSource,
  parsePatternSource,
  resolvePatternSources,
  textSource,
} from "../../pattern-store.js";

function brokenSource(name: string, message: string): PatternSource {
  return { name, read: () => Promise.reject(new Error(message)) };
}

describe("parsePatternSource", () => {
  it("reads labels and categories", () => {
    const text = [
      "# Deletion",
      "\\brm\\s+-rf  # recursive delete",
      "\\bshred\\b",
      "",
      "  # Disks",
      "dd\\s+if=",
    ].join("\n");

    const { patterns, warnings } = parsePatternSource(text, "custom.txt", new RecordingLogger());

    expect(warnings).toEqual([]);
    expect(
      patterns.map((p) => ({ source: p.source, label: p.label, category: p.category, line: p.line })),
    ).toEqual([
      { source: "\\brm\\s+-rf", label: "recursive delete", category: "Deletion", line: 2 },
      { source: "\\bshred\\b", label: "\\bshred\\b", category: "Deletion", line: 3 },
      { source: "dd\\s+if=", label: "dd\\s+if=", category: "Disks", line: 6 },
    ]);
    expect(patterns.every((p) => p.origin === "custom.txt")).toBe(true);
  });

  it("uses the default category before any heading", () => {
    const { patterns } = parsePatternSource("\\bsudo\\b", "custom.txt", new RecordingLogger());
    expect(patterns[0]?.category).toBe("uncategorized");
  });

  it("keeps a # that is not preceded by whitespace", () => {
    const { patterns } = parsePatternSource("chmod\\s+a#b", "custom.txt", new RecordingLogger());
    expect(patterns[0]?.source).toBe("chmod\\s+a#b");
    expect(patterns[0]?.regex.test("chmod a#b")).toBe(true);
  });

  it("handles CRLF line endings", () => {
    const { patterns } = parsePatternSource("^ls\r\n^pwd\r\n", "win.txt", new RecordingLogger());
    expect(patterns.map((p) => p.source)).toEqual(["^ls", "^pwd"]);
  });

  it("skips malformed patterns with a warning naming source and line", () => {
    const logger = new RecordingLogger();
    const { patterns, warnings } = parsePatternSource("^ls\nrm (\n^pwd", "custom.txt", logger);

    expect(patterns.map((p) => p.source)).toEqual(["^ls", "^pwd"]);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^custom\.txt:2: invalid pattern "rm \(": /);
    expect(logger.messages("warn")).toEqual(warnings);
  });

  it("freezes each pattern", () => {
    const { patterns } = parsePatternSource("^ls", "custom.txt", new RecordingLogger());
    expect(Object.isFrozen(patterns[0])).toBe(true);
  });
});

describe("loadPatternSet", () => {
  it("concatenates sources in order", async () => {
    const set = await loadPatternSet(
      {
        dangerous: [textSource("builtin", "\\brm\\b"), textSource("user", "\\bshred\\b")],
        safe: [textSource("builtin", "^ls")],
      },
      new RecordingLogger(),
    );

    expect(set.dangerous.map((p) => p.origin)).toEqual(["builtin", "user"]);
    expect(set.safe).toHaveLength(1);
    expect(set.degraded).toBe(false);
    expect(set.warnings).toEqual([]);
  });

  it("marks the set degraded when a source cannot be read", async () => {
    const logger = new RecordingLogger();
    const set = await loadPatternSet(
      {
        dangerous: [textSource("builtin", "\\brm\\b")],
        safe: [brokenSource("safe.txt", "EACCES: permission denied"), textSource("extra", "^pwd")],
      },
      logger,
    );

    expect(set.degraded).toBe(true);
    expect(set.safe.map((p) => p.source)).toEqual(["^pwd"]);
    expect(set.warnings).toEqual([
      'Pattern source "safe.txt" could not be read: EACCES: permission denied',
    ]);
    expect(logger.messages("warn")).toEqual(set.warnings);
  });

  it("treats a missing file as unreadable", async () => {
    const set = await loadPatternSet(
      { dangerous: [fileSource("/nonexistent/askshell/dangerous.txt")], safe: [] },
      new RecordingLogger(),
    );
    expect(set.degraded).toBe(true);
    expect(set.dangerous).toEqual([]);
  });

  it("returns a frozen set", async () => {
    const set = await loadPatternSet({ dangerous: [], safe: [] }, new RecordingLogger());
    expect(Object.isFrozen(set)).toBe(true);
    expect(Object.isFrozen(set.dangerous)).toBe(true);
  });

  describe("with files on disk", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "askshell-patterns-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("does not see edits until loaded again", async () => {
      const path = join(dir, "dangerous.txt");
      await writeFile(path, "\\brm\\b\n", "utf-8");
      const sources = { dangerous: [fileSource(path)], safe: [] };

      const first = await loadPatternSet(sources, new RecordingLogger());
      await writeFile(path, "\\brm\\b\n\\bshred\\b\n", "utf-8");

      expect(first.dangerous).toHaveLength(1);
      const second = await loadPatternSet(sources, new RecordingLogger());
      expect(second.dangerous).toHaveLength(2);
    });
  });
});

describe("resolvePatternSources", () => {
  it("uses only the built-in files by default", () => {
    const sources = resolvePatternSources({});
    expect(sources.dangerous.map((s) => s.name)).toEqual(["builtin:dangerous"]);
    expect(sources.safe.map((s) => s.name)).toEqual(["builtin:safe"]);
  });

  it("appends user files after the built-in ones", () => {
    const sources = resolvePatternSources({
      dangerousFile: "/etc/askshell/dangerous.txt",
      safeFile: "/etc/askshell/safe.txt",
    });
    expect(sources.dangerous.map((s) => s.name)).toEqual([
      "builtin:dangerous",
      "/etc/askshell/dangerous.txt",
    ]);
    expect(sources.safe.map((s) => s.name)).toEqual(["builtin:safe", "/etc/askshell/safe.txt"]);
  });

  it("points at the bundled pattern files", () => {
    expect(BUILTIN_DANGEROUS_FILE.endsWith(join("patterns", "dangerous.txt"))).toBe(true);
    expect(BUILTIN_SAFE_FILE.endsWith(join("patterns", "safe.txt"))).toBe(true);
  });
});

describe("lookup", () => {
  it("reports the first match in each list independently", async () => {
    const set = await loadPatternSet(
      {
        dangerous: [textSource("d", "\\bfind\\b.*-delete  # find -delete")],
        safe: [textSource("s", "^find\\s+  # find"), textSource("s2", "^find")],
      },
      new RecordingLogger(),
    );

    const result = lookup("find . -delete", set);
    expect(result.dangerous?.label).toBe("find -delete");
    expect(result.safe?.origin).toBe("s");
  });

  it("returns an empty result when nothing matches", async () => {
    const set = await loadPatternSet({ dangerous: [], safe: [] }, new RecordingLogger());
    expect(lookup("git status", set)).toEqual({});
  });
});
