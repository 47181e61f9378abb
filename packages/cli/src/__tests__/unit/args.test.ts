import { describe, expect, it } from "vitest";
import { parseArgv } from "../../args.js";

describe("parseArgv", () => {
  it("collects positionals", () => {
    expect(parseArgv(["find", "big", "files"])).toEqual({ positionals: ["find", "big", "files"], flags: {} });
  });

  it("expands short aliases", () => {
    expect(parseArgv(["-e", "-m", "-v", "-n", "3"]).flags).toEqual({
      explain: true,
      "multi-step": true,
      verbose: true,
      alternatives: "3",
    });
  });

  it("does not let boolean flags swallow the next argument", () => {
    expect(parseArgv(["--explain", "list", "files"])).toEqual({
      positionals: ["list", "files"],
      flags: { explain: true },
    });
  });

  it("reads values after the flag or after =", () => {
    expect(parseArgv(["--max-attempts", "2", "--model=gpt-test"]).flags).toEqual({
      "max-attempts": "2",
      model: "gpt-test",
    });
  });

  it("turns --no-autocorrect into false", () => {
    expect(parseArgv(["--no-autocorrect"]).flags).toEqual({ autocorrect: false });
  });

  it("marks a value flag without a value as true", () => {
    expect(parseArgv(["--model", "-v"]).flags).toEqual({ model: true, verbose: true });
  });

  it("treats everything after -- as positional", () => {
    expect(parseArgv(["-v", "--", "history", "-n"])).toEqual({
      positionals: ["history", "-n"],
      flags: { verbose: true },
    });
  });
});
