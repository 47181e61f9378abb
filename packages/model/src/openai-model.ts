/**
 * CommandModel over an OpenAI-compatible `/chat/completions` endpoint.
 */

import { release } from "node:os";
import type { ChatMessage, CommandModel, CorrectionRequest, GenerateOptions, Logger, ShellKind } from "@askshell/core";
import { ModelEmptyResponseError } from "@askshell/errors";
import { fetchCompletion } from "./fetch-completion.js";
import {
  alternativesPrompt,
  chatPrompt,
  commandPrompt,
  correctionPrompt,
  explanationPrompt,
  type HostContext,
  planPrompt,
} from "./prompts.js";
import { sanitizeCommand, sanitizeExplanation, splitPlan } from "./sanitize.js";
import type { ChatCompletionRequest } from "./types.js";

export interface OpenAICompatibleModelOptions {
  readonly apiKey: string;
  /** API root, e.g. https://api.openai.com/v1 */
  readonly baseUrl: string;
  readonly model: string;
  readonly timeoutMs?: number;
  readonly logger: Logger;
  /** Shell the commands will run in. */
  readonly shell: ShellKind;
  readonly platform?: NodeJS.Platform;
  readonly release?: string;
}

export class OpenAICompatibleModel implements CommandModel {
  readonly endpoint: string;
  private readonly apiKey: string;
  private readonly model: string;
  private readonly timeoutMs: number | undefined;
  private readonly logger: Logger;
  private readonly host: HostContext;

  constructor(options: OpenAICompatibleModelOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/chat/completions`;
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.host = {
      platform: options.platform ?? process.platform,
      release: options.release ?? release(),
      shell: options.shell,
    };
  }

  async generateCommand(request: string, options: GenerateOptions = {}): Promise<string> {
    const command = this.single(
      await this.first(commandPrompt(this.host, request, options.context)),
      "command",
    );
    if (!command) throw new ModelEmptyResponseError(this.model);
    return command;
  }

  async generatePlan(request: string, options: GenerateOptions = {}): Promise<readonly string[]> {
    const commands = splitPlan(await this.first(planPrompt(this.host, request, options.context)));
    if (commands.length === 0) throw new ModelEmptyResponseError(this.model);
    return commands;
  }

  /** May return an empty string; the auto-corrector treats that as no suggestion. */
  async suggestCorrection(failure: CorrectionRequest): Promise<string> {
    return this.single(await this.first(correctionPrompt(this.host, failure)), "correction");
  }

  async explain(command: string): Promise<string> {
    return sanitizeExplanation(await this.first(explanationPrompt(command)));
  }

  async alternatives(request: string, rejected: string, count: number): Promise<readonly string[]> {
    if (count <= 0) return [];
    const replies = await this.complete(alternativesPrompt(this.host, request, rejected, count));
    const unique = new Set<string>();
    for (const reply of replies) {
      const command = this.single(reply, "alternative");
      if (command && command !== rejected) unique.add(command);
    }
    return [...unique].slice(0, count);
  }

  async chat(conversation: readonly ChatMessage[]): Promise<string> {
    return (await this.first(chatPrompt(this.host, conversation))).trim();
  }

  /** First command line of a reply; the rest is dropped with a warning. */
  private single(reply: string, what: string): string {
    const { command, dropped } = sanitizeCommand(reply);
    if (dropped > 0) {
      this.logger.warn(`${what} reply had ${dropped + 1} command lines; keeping only "${command}"`);
    }
    return command;
  }

  private async first(request: ChatCompletionRequest): Promise<string> {
    const [content] = await this.complete(request);
    if (content === undefined || content.trim() === "") {
      throw new ModelEmptyResponseError(this.model);
    }
    return content;
  }

  private async complete(request: ChatCompletionRequest): Promise<readonly string[]> {
    this.logger.debug(`POST ${this.endpoint} (${this.model}, ${request.messages.length} messages)`);
    const choices = await fetchCompletion({
      endpoint: this.endpoint,
      apiKey: this.apiKey,
      model: this.model,
      request,
      ...(this.timeoutMs !== undefined ? { timeoutMs: this.timeoutMs } : {}),
    });
    this.logger.debug(`${choices.length} choice(s) received`);
    return choices;
  }
}
