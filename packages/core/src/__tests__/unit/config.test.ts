import { chmod, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigurationError } from "@askshell/errors";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  loadConfig,
  readConfigFile,
  redactConfig,
  resolveConfig,
  resolveConfigDir,
  resolveSafetyMode,
  setConfigValue,
  writeConfigFile,
} from "../../config.js";

const DIR = "/home/test/.cache/askshell";

describe("resolveConfig", () => {
  it("applies defaults when nothing is configured", () => {
    const config = resolveConfig({ configDir: DIR });
    expect(config).toEqual({
      safetyMode: 0,
      autocorrect: true,
      multiStep: false,
      maxCorrectAttempts: 3,
      model: { baseUrl: DEFAULT_BASE_URL, name: DEFAULT_MODEL, timeoutMs: 30_000 },
      patterns: {},
      history: {
        enabled: true,
        file: join(DIR, "history.jsonl"),
        mirrorShellHistory: true,
      },
    });
  });

  it("returns a frozen value", () => {
    const config = resolveConfig({ configDir: DIR });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.model)).toBe(true);
  });

  it("reads values from the config file", () => {
    const config = resolveConfig({
      configDir: DIR,
      file: {
        safetyMode: 1,
        autocorrect: false,
        multiStep: true,
        maxCorrectAttempts: 5,
        model: { apiKey: "test-secret", baseUrl: "https://llm.example.com/v1/", name: "local" },
        patterns: { dangerousFile: "/etc/askshell/dangerous.txt" },
        shell: "/bin/zsh",
      },
    });
    expect(config.safetyMode).toBe(1);
    expect(config.autocorrect).toBe(false);
    expect(config.multiStep).toBe(true);
    expect(config.maxCorrectAttempts).toBe(5);
    expect(config.model).toEqual({
      apiKey: "test-secret",
      baseUrl: "https://llm.example.com/v1",
      name: "local",
      timeoutMs: 30_000,
    });
    expect(config.patterns).toEqual({ dangerousFile: "/etc/askshell/dangerous.txt" });
    expect(config.shell).toBe("/bin/zsh");
  });

  it("lets the environment override the file", () => {
    const config = resolveConfig({
      configDir: DIR,
      file: { safetyMode: 1, autocorrect: true, model: { name: "file-model" } },
      env: {
        ASKSHELL_SAFETY_MODE: "0",
        ASKSHELL_AUTOCORRECT: "off",
        ASKSHELL_MODEL: "env-model",
        ASKSHELL_MAX_CORRECT_ATTEMPTS: "7",
        OPENAI_API_KEY: "test-secret",
      },
    });
    expect(config.safetyMode).toBe(0);
    expect(config.autocorrect).toBe(false);
    expect(config.model.name).toBe("env-model");
    expect(config.maxCorrectAttempts).toBe(7);
    expect(config.model.apiKey).toBe("test-secret");
  });

  it("prefers ASKSHELL_API_KEY over OPENAI_API_KEY", () => {
    const config = resolveConfig({
      configDir: DIR,
      env: { ASKSHELL_API_KEY: "test-secret-a", OPENAI_API_KEY: "test-secret-b" },
    });
    expect(config.model.apiKey).toBe("test-secret-a");
  });

  it("lets flags override the environment", () => {
    const config = resolveConfig({
      configDir: DIR,
      env: { ASKSHELL_SAFETY_MODE: "1", ASKSHELL_MULTI_STEP: "false" },
      overrides: { safetyMode: "0", multiStep: true, maxCorrectAttempts: "2", model: "flag-model" },
    });
    expect(config.safetyMode).toBe(0);
    expect(config.multiStep).toBe(true);
    expect(config.maxCorrectAttempts).toBe(2);
    expect(config.model.name).toBe("flag-model");
  });

  it("falls back to safety mode 0 for an out-of-range value", () => {
    expect(resolveConfig({ configDir: DIR, file: { safetyMode: 5 } }).safetyMode).toBe(0);
    expect(resolveConfig({ configDir: DIR, env: { ASKSHELL_SAFETY_MODE: "yes" } }).safetyMode).toBe(0);
  });

  it("disables history and mirroring under NOHISTORY", () => {
    const config = resolveConfig({ configDir: DIR, env: { NOHISTORY: "1" } });
    expect(config.history.enabled).toBe(false);
    expect(config.history.mirrorShellHistory).toBe(false);
  });

  it("rejects unknown keys in the file", () => {
    expect(() => resolveConfig({ configDir: DIR, file: { safety: 1 } })).toThrow(ConfigurationError);
  });

  it("rejects maxCorrectAttempts outside 1..10", () => {
    expect(() => resolveConfig({ configDir: DIR, file: { maxCorrectAttempts: 0 } })).toThrow(
      "maxCorrectAttempts: maxCorrectAttempts must be between 1 and 10",
    );
    expect(() => resolveConfig({ configDir: DIR, overrides: { maxCorrectAttempts: "11" } })).toThrow(
      ConfigurationError,
    );
  });

  it("rejects a non-boolean ASKSHELL_AUTOCORRECT", () => {
    expect(() => resolveConfig({ configDir: DIR, env: { ASKSHELL_AUTOCORRECT: "maybe" } })).toThrow(
      'Invalid configuration in environment: ASKSHELL_AUTOCORRECT: expected a boolean (true/false), got "maybe"',
    );
  });
});

describe("resolveSafetyMode", () => {
  it("accepts only 1 as auto-run", () => {
    expect(resolveSafetyMode(1)).toBe(1);
    expect(resolveSafetyMode(" 1 ")).toBe(1);
    expect(resolveSafetyMode(0)).toBe(0);
    expect(resolveSafetyMode(true)).toBe(0);
    expect(resolveSafetyMode("2")).toBe(0);
    expect(resolveSafetyMode(undefined)).toBe(0);
  });
});

describe("resolveConfigDir", () => {
  it("uses ASKSHELL_HOME when set", () => {
    expect(resolveConfigDir({ ASKSHELL_HOME: "/opt/askshell" }, "linux", "/home/u")).toBe("/opt/askshell");
  });

  it("picks a per-platform directory", () => {
    expect(resolveConfigDir({}, "linux", "/home/u")).toBe(join("/home/u", ".cache", "askshell"));
    expect(resolveConfigDir({}, "darwin", "/Users/u")).toBe(
      join("/Users/u", "Library", "Caches", "askshell"),
    );
    expect(resolveConfigDir({}, "win32", "/c/u")).toBe(join("/c/u", "AppData", "Local", "askshell"));
    expect(resolveConfigDir({}, "freebsd", "/home/u")).toBe(join("/home/u", ".askshell"));
  });
});

describe("setConfigValue", () => {
  it("sets top-level and nested keys with typed values", () => {
    const first = setConfigValue({}, "safetyMode", "1");
    const second = setConfigValue(first, "model.name", "gpt-4o");
    const third = setConfigValue(second, "history.enabled", "false");
    expect(third).toEqual({ safetyMode: 1, model: { name: "gpt-4o" }, history: { enabled: false } });
  });

  it("does not mutate its input", () => {
    const raw = { autocorrect: true };
    setConfigValue(raw, "autocorrect", "false");
    expect(raw).toEqual({ autocorrect: true });
  });

  it("rejects unknown keys", () => {
    expect(() => setConfigValue({}, "colour", "red")).toThrow(ConfigurationError);
  });

  it("rejects an invalid safety mode", () => {
    expect(() => setConfigValue({}, "safetyMode", "2")).toThrow('safetyMode must be 0 or 1, got "2"');
  });

  it("rejects values of the wrong type", () => {
    expect(() => setConfigValue({}, "maxCorrectAttempts", "lots")).toThrow(ConfigurationError);
  });
});

describe("config file I/O", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "askshell-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("treats a missing file as empty", async () => {
    expect(await readConfigFile(join(dir, "absent"))).toEqual({});
  });

  it("reports malformed JSON as a ConfigurationError", async () => {
    await writeFile(join(dir, "config.json"), "{ not json", "utf-8");
    await expect(readConfigFile(dir)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("rejects a JSON array", async () => {
    await writeFile(join(dir, "config.json"), "[]", "utf-8");
    await expect(readConfigFile(dir)).rejects.toThrow("expected a JSON object");
  });

  it("writes then loads a config", async () => {
    const nested = join(dir, "nested");
    const path = await writeConfigFile(nested, { safetyMode: 1, model: { name: "local" } });
    expect(await readFile(path, "utf-8")).toBe(
      '{\n  "safetyMode": 1,\n  "model": {\n    "name": "local"\n  }\n}\n',
    );

    const loaded = await loadConfig({ env: {}, configDir: nested });
    expect(loaded.configPath).toBe(path);
    expect(loaded.config.safetyMode).toBe(1);
    expect(loaded.config.model.name).toBe("local");
  });

  it.skipIf(process.platform === "win32")("creates config.json readable by the owner only", async () => {
    const path = await writeConfigFile(dir, {});
    expect((await stat(path)).mode & 0o777).toBe(0o600);
  });

  it.skipIf(process.platform === "win32")("restricts an existing world-readable config.json", async () => {
    const existing = join(dir, "config.json");
    await writeFile(existing, "{}\n", { encoding: "utf-8", mode: 0o644 });
    await chmod(existing, 0o644);

    const path = await writeConfigFile(dir, { model: { apiKey: "test-secret" } });

    expect(path).toBe(existing);
    expect((await stat(path)).mode & 0o777).toBe(0o600);
  });
});

describe("redactConfig", () => {
  it("masks the API key", () => {
    const config = resolveConfig({ configDir: DIR, env: { ASKSHELL_API_KEY: "test-secret" } });
    expect(redactConfig(config).model.apiKey).toBe("tes…et");
  });

  it("leaves a config without a key untouched", () => {
    const config = resolveConfig({ configDir: DIR });
    expect(redactConfig(config).model.apiKey).toBeUndefined();
  });
});
