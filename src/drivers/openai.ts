/**
 * OpenAI-compatible chat completion client.
 * Works with OpenAI, vLLM, LM Studio, llama.cpp server, Ollama's /v1 shim, etc.
 */
import { Logger } from "../logger.js";
import { isRecord } from "../utils/guards.js";
import { logRequest, malformedResponse, newToolCallId, postJson } from "./http.js";
import type { AssistantReply, CompletionClient, CompletionRequest, ToolCallRequest } from "./types.js";

export interface OpenAiClientConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
}

const PROVIDER = "openai";

export function chatCompletionsEndpoint(baseUrl: string): string {
  const base = baseUrl.replace(/\/+$/, "");
  return base.endsWith("/v1") ? `${base}/chat/completions` : `${base}/v1/chat/completions`;
}

/** Pull the assistant message out of a /chat/completions response body. */
export function parseChatCompletion(data: unknown, model: string, newId: () => string = newToolCallId): AssistantReply {
  if (!isRecord(data)) throw malformedResponse(PROVIDER, model, "body is not a JSON object");
  const choices = data.choices;
  if (!Array.isArray(choices) || choices.length === 0) {
    throw malformedResponse(PROVIDER, model, "no choices");
  }
  const choice: unknown = choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) {
    throw malformedResponse(PROVIDER, model, "first choice has no message");
  }
  const msg = choice.message;
  const text = typeof msg.content === "string" && msg.content.length > 0 ? msg.content : null;
  const rawCalls: unknown[] = Array.isArray(msg.tool_calls) ? msg.tool_calls : [];

  const toolCalls: ToolCallRequest[] = rawCalls.map((tc, i) => {
    const fn = isRecord(tc) && isRecord(tc.function) ? tc.function : null;
    if (!isRecord(tc) || !fn || typeof fn.name !== "string") {
      throw malformedResponse(PROVIDER, model, `tool call ${i} has no function name`);
    }
    const args = typeof fn.arguments === "string"
      ? fn.arguments
      : isRecord(fn.arguments) ? JSON.stringify(fn.arguments) : "";
    return {
      id: typeof tc.id === "string" && tc.id ? tc.id : newId(),
      name: fn.name,
      arguments: args,
    };
  });

  return { text, toolCalls };
}

export function makeOpenAiCompletionClient(cfg: OpenAiClientConfig): CompletionClient {
  const endpoint = chatCompletionsEndpoint(cfg.baseUrl);
  const timeoutMs = cfg.timeoutMs ?? 10 * 60 * 1000;
  const headers: Record<string, string> = {};
  if (cfg.apiKey) headers["Authorization"] = `Bearer ${cfg.apiKey}`;

  async function complete(req: CompletionRequest): Promise<AssistantReply> {
    const opts = req.options ?? {};
    const payload: Record<string, unknown> = { model: req.model, messages: req.messages, stream: false };
    if (req.tools.length) {
      payload.tools = req.tools;
      payload.tool_choice = "auto";
    }
    if (opts.temperature !== undefined) payload.temperature = opts.temperature;
    if (opts.maxTokens !== undefined) payload.max_tokens = opts.maxTokens;
    if (opts.contextWindow !== undefined) {
      Logger.debug(`${PROVIDER}: context window (${opts.contextWindow}) is not a request option here, skipped`);
    }

    logRequest(PROVIDER, req.messages);
    const data = await postJson(endpoint, payload, {
      provider: PROVIDER,
      model: req.model,
      headers,
      signal: req.signal,
      timeoutMs,
    });
    return parseChatCompletion(data, req.model);
  }

  return { provider: PROVIDER, complete };
}
