import {
  readConfigFile,
  redactConfig,
  resolveConfigDir,
  setConfigValue,
  writeConfigFile,
} from "@askshell/core";
import { type CliDeps, loadCliConfig } from "../session.js";

export async function showConfig(deps: CliDeps): Promise<number> {
  const loaded = await loadCliConfig(deps, {});
  deps.terminal.print(deps.terminal.colors.dim(`# ${loaded.configPath}`));
  deps.terminal.print(JSON.stringify(redactConfig(loaded.config), null, 2));
  return 0;
}

/** Edits the raw file, so a config.json the schema rejects can still be repaired. */
export async function setConfig(deps: CliDeps, key: string, value: string): Promise<number> {
  const configDir = resolveConfigDir(deps.env, deps.platform, deps.home);
  const next = setConfigValue(await readConfigFile(configDir), key, value);
  const path = await writeConfigFile(configDir, next);
  deps.terminal.print(`Saved ${key} to ${path}`);
  return 0;
}
