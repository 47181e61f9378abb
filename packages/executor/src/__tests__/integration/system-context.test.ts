import { describe, expect, it } from "vitest";
import { execFileRunner } from "../../system-context.js";

describe.skipIf(process.platform === "win32")("execFileRunner", () => {
  it("resolves with stdout", async () => {
    const run = execFileRunner();

    await expect(run({ file: "sh", args: ["-c", "echo ready"] })).resolves.toBe("ready\n");
  });

  it("does not hand arguments to a shell", async () => {
    const run = execFileRunner();

    await expect(run({ file: "echo", args: ["$HOME;", "`id`"] })).resolves.toBe("$HOME; `id`\n");
  });

  it("rejects when the command fails", async () => {
    const run = execFileRunner();

    await expect(run({ file: "sh", args: ["-c", "exit 2"] })).rejects.toThrow();
  });

  it("rejects when the command runs too long", async () => {
    const run = execFileRunner({ timeoutMs: 50 });

    await expect(run({ file: "sleep", args: ["5"] })).rejects.toThrow();
  });
});
