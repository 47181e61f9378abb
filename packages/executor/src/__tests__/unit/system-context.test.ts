import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { RecordingLogger } from "@askshell/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CONTEXT_KINDS, type CommandRunner, collectContext, type HostCommand } from "../../system-context.js";

/** Answers from a table keyed by the command line; anything else fails. */
function fakeRunner(outputs: Record<string, string>): CommandRunner & { readonly seen: string[] } {
  const seen: string[] = [];
  const run = async (command: HostCommand): Promise<string> => {
    const line = [command.file, ...command.args].join(" ");
    seen.push(line);
    const output = outputs[line];
    if (output === undefined) throw new Error(`${command.file}: not found`);
    return output;
  };
  return Object.assign(run, { seen });
}

describe("CONTEXT_KINDS", () => {
  it("keeps the command-line order", () => {
    expect(CONTEXT_KINDS).toEqual(["files", "processes", "users", "groups", "interfaces", "routes", "firewall"]);
  });
});

describe("collectContext", () => {
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = new RecordingLogger();
  });

  it("lists processes with ps", async () => {
    const run = fakeRunner({ "ps -A -o pid,ppid,command": "  PID  PPID COMMAND\n    1     0 init\n" });

    const text = await collectContext("processes", { platform: "linux", cwd: "/", logger, run });

    expect(text).toBe("The following processes are running:\nPID  PPID COMMAND\n    1     0 init");
  });

  it("uses the Windows tools on win32", async () => {
    const run = fakeRunner({ "net localgroup": "*Administrators\r\n*Users\r\n" });

    const text = await collectContext("groups", { platform: "win32", cwd: "C:\\", logger, run });

    expect(text).toBe("The following groups exist:\n*Administrators\r\n*Users");
    expect(run.seen).toEqual(["net localgroup"]);
  });

  it("uses dscl on macOS", async () => {
    const run = fakeRunner({ "dscl . list /Users": "root\nsam\n" });

    const text = await collectContext("users", { platform: "darwin", cwd: "/", logger, run });

    expect(text).toBe("The following user accounts exist:\nroot\nsam");
  });

  it("falls back to the next command when one fails", async () => {
    const run = fakeRunner({ "netstat -rn": "default 10.0.0.1" });

    const text = await collectContext("routes", { platform: "linux", cwd: "/", logger, run });

    expect(text).toBe("The routing table is:\ndefault 10.0.0.1");
    expect(run.seen).toEqual(["ip route", "netstat -rn"]);
    expect(logger.messages("warn")).toEqual([]);
  });

  it("says so and warns when nothing can be read", async () => {
    const run = fakeRunner({});

    const text = await collectContext("firewall", { platform: "linux", cwd: "/", logger, run });

    expect(text).toBe("Firewall rules could not be read.");
    expect(run.seen).toEqual(["iptables -L -n", "nft list ruleset"]);
    expect(logger.messages("warn")).toEqual(["cannot read firewall rules: nft: not found"]);
  });

  it("marks empty output", async () => {
    const run = fakeRunner({ "ip link show": "\n" });

    await expect(collectContext("interfaces", { platform: "linux", cwd: "/", logger, run })).resolves.toBe(
      "The network interfaces are:\n(empty)",
    );
  });

  it("cuts long output", async () => {
    const run = fakeRunner({ "getent passwd": "x".repeat(100) });

    const text = await collectContext("users", { platform: "linux", cwd: "/", logger, run, maxChars: 40 });

    expect(text).toBe(`The following user accounts exist:\n${"x".repeat(5)}`);
  });

  describe("files", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "askshell-context-"));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it("lists the working directory without running anything", async () => {
      await fs.writeFile(path.join(dir, "notes.txt"), "");
      await fs.mkdir(path.join(dir, "build"));
      const run = fakeRunner({});

      const text = await collectContext("files", { platform: "linux", cwd: dir, logger, run });

      expect(text).toBe(`The command is executed in folder ${dir} containing the following files:\nbuild\nnotes.txt`);
      expect(run.seen).toEqual([]);
    });

    it("marks an empty directory", async () => {
      const text = await collectContext("files", { platform: "linux", cwd: dir, logger });

      expect(text).toBe(`The command is executed in folder ${dir} containing the following files:\n(no files)`);
    });

    it("says so when the directory is gone", async () => {
      const missing = path.join(dir, "missing");

      const text = await collectContext("files", { platform: "linux", cwd: missing, logger });

      expect(text).toBe("Files in the current directory could not be read.");
      expect(logger.messages("warn")[0]).toMatch(/^cannot list .*missing: ENOENT/);
    });
  });
});
