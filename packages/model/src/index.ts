/**
 * @askshell/model
 *
 * Language-model client: commands, plans, corrections and explanations
 * from an OpenAI-compatible endpoint.
 */

export const PACKAGE_NAME = "@askshell/model" as const;

export { type FetchCompletionOptions, fetchCompletion } from "./fetch-completion.js";
export { OpenAICompatibleModel, type OpenAICompatibleModelOptions } from "./openai-model.js";
export {
  alternativesPrompt,
  chatPrompt,
  commandPrompt,
  correctionPrompt,
  describeHost,
  explanationPrompt,
  type HostContext,
  planPrompt,
  shellName,
} from "./prompts.js";
export { sanitizeCommand, sanitizeExplanation, splitPlan, stripCodeFences, tail } from "./sanitize.js";
export {
  type ChatCompletionRequest,
  type ChatMessage,
  type ChatRole,
  type CompletionParams,
  DEFAULT_TIMEOUT_MS,
  MAX_STDERR_CHARS,
} from "./types.js";
