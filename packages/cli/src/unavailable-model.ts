import type { CommandModel } from "@askshell/core";
import { ModelApiKeyMissingError } from "@askshell/errors";

/**
 * Stands in for the model when no API key is configured, so commands that
 * only might need it (replay with auto-correct) still start.
 */
export class UnavailableModel implements CommandModel {
  private readonly configPath: string;

  constructor(configPath: string) {
    this.configPath = configPath;
  }

  generateCommand(): Promise<string> {
    return this.fail();
  }

  generatePlan(): Promise<readonly string[]> {
    return this.fail();
  }

  suggestCorrection(): Promise<string> {
    return this.fail();
  }

  explain(): Promise<string> {
    return this.fail();
  }

  alternatives(): Promise<readonly string[]> {
    return this.fail();
  }

  chat(): Promise<string> {
    return this.fail();
  }

  private fail(): Promise<never> {
    return Promise.reject(new ModelApiKeyMissingError(this.configPath));
  }
}
