import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { ChatMessage } from "@askshell/core";
import { RecordingLogger } from "@askshell/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FileChatStore } from "../../chat-store.js";

const turns = (count: number): ChatMessage[] =>
  Array.from({ length: count }, (_, i): ChatMessage => ({
    role: i % 2 === 0 ? "user" : "assistant",
    content: `turn ${i}`,
  }));

describe("FileChatStore", () => {
  let tmpDir: string;
  let logger: RecordingLogger;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "askshell-chat-"));
    logger = new RecordingLogger();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function storeAt(file: string, limit?: number): FileChatStore {
    return new FileChatStore({ path: file, logger, ...(limit === undefined ? {} : { limit }) });
  }

  it("treats a missing file as an empty conversation", async () => {
    await expect(storeAt(path.join(tmpDir, "chat.json")).load()).resolves.toEqual([]);
    expect(logger.messages("warn")).toEqual([]);
  });

  it("saves and loads a conversation", async () => {
    const store = storeAt(path.join(tmpDir, "nested", "chat.json"));

    await store.save(turns(3));

    await expect(store.load()).resolves.toEqual(turns(3));
  });

  it("keeps only the most recent messages", async () => {
    const store = storeAt(path.join(tmpDir, "chat.json"), 2);

    await store.save(turns(5));

    await expect(store.load()).resolves.toEqual([
      { role: "assistant", content: "turn 3" },
      { role: "user", content: "turn 4" },
    ]);
  });

  it.skipIf(process.platform === "win32")("is readable only by its owner", async () => {
    const file = path.join(tmpDir, "chat.json");
    await fs.writeFile(file, "{}", { mode: 0o644 });

    await storeAt(file).save(turns(1));

    expect((await fs.stat(file)).mode & 0o777).toBe(0o600);
  });

  it("ignores a malformed file with a warning", async () => {
    const file = path.join(tmpDir, "chat.json");
    await fs.writeFile(file, '{"messages":[{"role":"user"', "utf-8");

    await expect(storeAt(file).load()).resolves.toEqual([]);
    expect(logger.messages("warn")).toEqual([`ignoring malformed chat history in ${file}`]);
  });

  it("clears the saved conversation", async () => {
    const file = path.join(tmpDir, "chat.json");
    const store = storeAt(file);
    await store.save(turns(2));

    await store.clear();
    await store.clear();

    await expect(store.load()).resolves.toEqual([]);
    await expect(fs.access(file)).rejects.toThrow();
  });

  it("logs a write failure instead of rejecting", async () => {
    const blocker = path.join(tmpDir, "blocker");
    await fs.writeFile(blocker, "", "utf-8");
    const store = storeAt(path.join(blocker, "chat.json"));

    await expect(store.save(turns(1))).resolves.toBeUndefined();
    expect(logger.messages("warn")[0]).toMatch(/^History write failed for .*blocker\/chat\.json: /);
  });
});
