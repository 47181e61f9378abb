/**
 * ScriptedModel for testing CommandModel consumers.
 *
 * Each method answers from its own queue, in order. An Error in a queue is
 * thrown instead of returned. Every call is recorded for assertions.
 */

import type { ChatMessage, CommandModel, CorrectionRequest, GenerateOptions } from "@askshell/core";

export type ModelCall =
  | { readonly method: "generateCommand"; readonly request: string; readonly context?: string }
  | { readonly method: "generatePlan"; readonly request: string; readonly context?: string }
  | { readonly method: "suggestCorrection"; readonly failure: CorrectionRequest }
  | { readonly method: "explain"; readonly command: string }
  | {
      readonly method: "alternatives";
      readonly request: string;
      readonly rejected: string;
      readonly count: number;
    }
  | { readonly method: "chat"; readonly conversation: readonly ChatMessage[] };

export type ScriptedReply<T> = T | Error;

export interface ModelScript {
  readonly commands?: readonly ScriptedReply<string>[];
  readonly plans?: readonly ScriptedReply<readonly string[]>[];
  readonly corrections?: readonly ScriptedReply<string>[];
  readonly explanations?: readonly ScriptedReply<string>[];
  readonly alternatives?: readonly ScriptedReply<readonly string[]>[];
  readonly answers?: readonly ScriptedReply<string>[];
}

export class ScriptedModel implements CommandModel {
  readonly calls: ModelCall[] = [];
  private readonly commands: ScriptedReply<string>[];
  private readonly plans: ScriptedReply<readonly string[]>[];
  private readonly corrections: ScriptedReply<string>[];
  private readonly explanations: ScriptedReply<string>[];
  private readonly alternativeLists: ScriptedReply<readonly string[]>[];
  private readonly answers: ScriptedReply<string>[];

  constructor(script: ModelScript = {}) {
    this.commands = [...(script.commands ?? [])];
    this.plans = [...(script.plans ?? [])];
    this.corrections = [...(script.corrections ?? [])];
    this.explanations = [...(script.explanations ?? [])];
    this.alternativeLists = [...(script.alternatives ?? [])];
    this.answers = [...(script.answers ?? [])];
  }

  async generateCommand(request: string, options: GenerateOptions = {}): Promise<string> {
    this.calls.push({ method: "generateCommand", request, ...withContext(options) });
    return this.next(this.commands, "generateCommand");
  }

  async generatePlan(request: string, options: GenerateOptions = {}): Promise<readonly string[]> {
    this.calls.push({ method: "generatePlan", request, ...withContext(options) });
    return this.next(this.plans, "generatePlan");
  }

  async suggestCorrection(failure: CorrectionRequest): Promise<string> {
    this.calls.push({ method: "suggestCorrection", failure });
    return this.next(this.corrections, "suggestCorrection");
  }

  async explain(command: string): Promise<string> {
    this.calls.push({ method: "explain", command });
    return this.next(this.explanations, "explain");
  }

  async alternatives(request: string, rejected: string, count: number): Promise<readonly string[]> {
    this.calls.push({ method: "alternatives", request, rejected, count });
    return this.next(this.alternativeLists, "alternatives");
  }

  async chat(conversation: readonly ChatMessage[]): Promise<string> {
    // Copied: callers keep appending to the array they pass.
    this.calls.push({ method: "chat", conversation: [...conversation] });
    return this.next(this.answers, "chat");
  }

  /** Correction requests received, in order. */
  get correctionRequests(): CorrectionRequest[] {
    return this.calls.flatMap((call) => (call.method === "suggestCorrection" ? [call.failure] : []));
  }

  private next<T>(queue: ScriptedReply<T>[], method: ModelCall["method"]): T {
    const reply = queue.shift();
    if (reply === undefined) {
      const count = this.calls.filter((call) => call.method === method).length;
      throw new Error(`ScriptedModel: no ${method} reply configured for call #${count}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

function withContext(options: GenerateOptions): { readonly context?: string } {
  return options.context !== undefined ? { context: options.context } : {};
}
