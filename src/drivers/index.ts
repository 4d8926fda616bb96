import { defaultBaseUrl, parseModelId } from "../model-config.js";
import { makeOllamaCompletionClient } from "./ollama.js";
import { makeOpenAiCompletionClient } from "./openai.js";
import type { LlmConfig } from "../types.js";
import type { CompletionClient } from "./types.js";

export type {
  AssistantReply,
  CompletionClient,
  CompletionMessage,
  CompletionRequest,
  CompletionToolDefinition,
  GenerationOptions,
  ToolCallRequest,
} from "./types.js";
export { makeOpenAiCompletionClient } from "./openai.js";
export type { OpenAiClientConfig } from "./openai.js";
export { makeOllamaCompletionClient } from "./ollama.js";
export type { OllamaClientConfig } from "./ollama.js";

/** Pick the backend for a model id; returns the client and the model name to send it. */
export function createCompletionClient(cfg: LlmConfig): { client: CompletionClient; model: string } {
  const { provider, model } = parseModelId(cfg.modelId);
  const baseUrl = cfg.baseUrl ?? defaultBaseUrl(provider);
  switch (provider) {
    case "ollama":
      return { client: makeOllamaCompletionClient({ baseUrl, timeoutMs: cfg.requestTimeoutMs }), model };
    case "openai":
      return {
        client: makeOpenAiCompletionClient({ baseUrl, apiKey: cfg.apiKey ?? undefined, timeoutMs: cfg.requestTimeoutMs }),
        model,
      };
  }
}
