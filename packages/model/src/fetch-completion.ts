/**
 * Shared HTTP utility: chat-completions POST with timeout and error
 * classification.
 */

import {
  getErrorMessage,
  ModelRateLimitedError,
  ModelRequestError,
} from "@askshell/errors";
import { z } from "zod";
import { type ChatCompletionRequest, DEFAULT_TIMEOUT_MS } from "./types.js";

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
          })
          .nullish(),
      }),
    )
    .default([]),
});

export interface FetchCompletionOptions {
  readonly endpoint: string;
  readonly apiKey: string;
  readonly model: string;
  readonly request: ChatCompletionRequest;
  readonly timeoutMs?: number;
  /** Optional external abort signal. */
  readonly signal?: AbortSignal;
}

/**
 * POST a chat-completions request and return the content of every choice,
 * in order. Choices without content come back as empty strings.
 */
export async function fetchCompletion(options: FetchCompletionOptions): Promise<readonly string[]> {
  const { endpoint, signal } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  // Link external signal to internal controller
  const onExternalAbort = () => controller.abort();
  signal?.addEventListener("abort", onExternalAbort, { once: true });

  try {
    const { params } = options.request;
    const response = await fetch(endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${options.apiKey}`,
      },
      body: JSON.stringify({
        model: options.model,
        messages: options.request.messages,
        max_tokens: params.maxTokens,
        temperature: params.temperature,
        top_p: 1,
        ...(params.n !== undefined && params.n > 1 ? { n: params.n } : {}),
      }),
      signal: controller.signal,
    });

    if (response.status === 429) {
      throw new ModelRateLimitedError(endpoint);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new ModelRequestError(endpoint, `HTTP ${response.status}: ${body}`, response.status);
    }

    const parsed = chatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ModelRequestError(endpoint, "malformed response body", response.status, parsed.error);
    }
    return parsed.data.choices.map((choice) => choice.message?.content ?? "");
  } catch (error) {
    if (error instanceof ModelRateLimitedError || error instanceof ModelRequestError) {
      throw error;
    }

    if (error instanceof DOMException && error.name === "AbortError") {
      if (signal?.aborted) {
        throw error;
      }
      throw new ModelRequestError(endpoint, `request timed out after ${timeoutMs}ms`);
    }

    throw new ModelRequestError(endpoint, getErrorMessage(error), undefined, error);
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onExternalAbort);
  }
}
