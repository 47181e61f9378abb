import { describe, expect, it } from "vitest";
import {
  alternativesPrompt,
  chatPrompt,
  commandPrompt,
  correctionPrompt,
  describeHost,
  type HostContext,
  planPrompt,
} from "../../prompts.js";

const linux: HostContext = { platform: "linux", release: "6.8.0", shell: "bash" };
const windows: HostContext = { platform: "win32", release: "10.0.22631", shell: "powershell" };

describe("describeHost", () => {
  it("names the platform", () => {
    expect(describeHost(linux)).toBe("Linux");
    expect(describeHost({ ...linux, platform: "darwin" })).toBe("macOS");
    expect(describeHost(windows)).toBe("Windows 10.0.22631");
    expect(describeHost({ ...linux, platform: "freebsd" })).toBe("freebsd");
  });
});

describe("commandPrompt", () => {
  it("mentions the platform and shell", () => {
    const { messages, params } = commandPrompt(linux, "list files by size");

    expect(messages[0]?.content).toBe(
      "You output only terminal commands. No explanations, no comments, no backticks. This system is running Linux.",
    );
    expect(messages[1]).toEqual({ role: "user", content: "Generate a single bash command to list files by size" });
    expect(params).toEqual({ maxTokens: 100, temperature: 0 });
  });

  it("asks for PowerShell or CMD on Windows", () => {
    const { messages } = commandPrompt(windows, "list files");

    expect(messages[0]?.content).toContain("Use Windows PowerShell or CMD commands, not Linux/Unix commands.");
    expect(messages[1]?.content).toBe("Generate a single PowerShell command to list files");
  });

  it("appends machine context on its own line", () => {
    const { messages } = commandPrompt(linux, "stop the web server", "The following processes are running:\n1 0 nginx\n");

    expect(messages[1]?.content).toBe(
      "Generate a single bash command to stop the web server\nThe following processes are running:\n1 0 nginx",
    );
  });

  it("ignores blank context", () => {
    const { messages } = commandPrompt(linux, "list files", "  \n");

    expect(messages[1]?.content).toBe("Generate a single bash command to list files");
  });
});

describe("planPrompt", () => {
  it("asks for one command per line and carries context", () => {
    const { messages, params } = planPrompt(linux, "set up a repo", "Files: README.md");

    expect(messages[0]?.content).toContain("Write one command per line, in the order they must run.");
    expect(messages[1]?.content).toBe("Generate the sequence of bash commands needed to set up a repo\nFiles: README.md");
    expect(params).toEqual({ maxTokens: 400, temperature: 0 });
  });
});

describe("chatPrompt", () => {
  it("leads with its own system message and keeps the turns in order", () => {
    const { messages, params } = chatPrompt(linux, [
      { role: "system", content: "stale" },
      { role: "user", content: "what is a zombie process?" },
      { role: "assistant", content: "A finished child not yet reaped." },
      { role: "user", content: "how do I find them?" },
    ]);

    expect(messages).toEqual([
      {
        role: "system",
        content: "You are a helpful assistant. Answer as concisely as possible. This machine is running Linux.",
      },
      { role: "user", content: "what is a zombie process?" },
      { role: "assistant", content: "A finished child not yet reaped." },
      { role: "user", content: "how do I find them?" },
    ]);
    expect(params).toEqual({ maxTokens: 1000, temperature: 0.7 });
  });

  it("asks for Windows commands on Windows", () => {
    const { messages } = chatPrompt(windows, [{ role: "user", content: "hi" }]);

    expect(messages[0]?.content).toBe(
      "You are a helpful assistant. Answer as concisely as possible. This machine is running Windows 10.0.22631. " +
        "When suggesting commands: Use Windows PowerShell or CMD commands, not Linux/Unix commands.",
    );
  });
});

describe("correctionPrompt", () => {
  it("includes the failed command, exit code, stderr and goal", () => {
    const { messages } = correctionPrompt(linux, {
      command: "gti status",
      stderr: "bash: gti: command not found\n",
      exitCode: 127,
      request: "show repo status",
    });

    expect(messages[1]?.content).toBe(
      [
        "This command failed with exit code 127:",
        "gti status",
        "",
        "Its error output was:",
        "bash: gti: command not found",
        "",
        "The goal was to show repo status",
        "",
        "Reply with a single corrected bash command.",
      ].join("\n"),
    );
  });

  it("marks empty stderr", () => {
    const { messages } = correctionPrompt(linux, { command: "false", stderr: "", exitCode: 1 });

    expect(messages[1]?.content).toContain("Its error output was:\n(none)\n");
  });
});

describe("alternativesPrompt", () => {
  it("asks for several samples", () => {
    const { messages, params } = alternativesPrompt(linux, "free disk space", "rm -rf /tmp/*", 3);

    expect(params).toEqual({ maxTokens: 50, temperature: 0.9, n: 3 });
    expect(messages[1]?.content).toBe("Generate a single bash command to free disk space\nDo not suggest: rm -rf /tmp/*");
  });
});
