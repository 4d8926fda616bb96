/**
 * Ollama native chat client (/api/chat).
 *
 * Used instead of the OpenAI shim because only the native endpoint takes
 * num_ctx, and local models are unusable with Ollama's 2k default window.
 * Ollama speaks tool-call arguments as objects and omits call ids; both are
 * converted to the JSON-string/id form the rest of the agent uses.
 */
import { Logger } from "../logger.js";
import { isRecord } from "../utils/guards.js";
import { logRequest, malformedResponse, newToolCallId, postJson } from "./http.js";
import type {
  AssistantReply,
  CompletionClient,
  CompletionMessage,
  CompletionRequest,
  ToolCallRequest,
} from "./types.js";

export interface OllamaClientConfig {
  baseUrl: string;
  timeoutMs?: number;
}

const PROVIDER = "ollama";

type OllamaMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string; tool_calls?: Array<{ function: { name: string; arguments: Record<string, unknown> } }> }
  | { role: "tool"; content: string; tool_name: string };

function decodeArgs(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    // The adapter already answered this call with an argument error.
    return {};
  }
}

export function toOllamaMessage(msg: CompletionMessage): OllamaMessage {
  switch (msg.role) {
    case "system":
    case "user":
      return { role: msg.role, content: msg.content };
    case "assistant":
      if (!msg.tool_calls?.length) return { role: "assistant", content: msg.content ?? "" };
      return {
        role: "assistant",
        content: msg.content ?? "",
        tool_calls: msg.tool_calls.map((tc) => ({
          function: { name: tc.function.name, arguments: decodeArgs(tc.function.arguments) },
        })),
      };
    case "tool":
      return { role: "tool", content: msg.content, tool_name: msg.name };
  }
}

/** Pull the assistant message out of an /api/chat response body. */
export function parseOllamaChat(data: unknown, model: string, newId: () => string = newToolCallId): AssistantReply {
  if (!isRecord(data)) throw malformedResponse(PROVIDER, model, "body is not a JSON object");
  if (typeof data.error === "string") throw malformedResponse(PROVIDER, model, data.error);
  const msg = data.message;
  if (!isRecord(msg)) throw malformedResponse(PROVIDER, model, "no message");

  const text = typeof msg.content === "string" && msg.content.length > 0 ? msg.content : null;
  const rawCalls: unknown[] = Array.isArray(msg.tool_calls) ? msg.tool_calls : [];
  const toolCalls: ToolCallRequest[] = rawCalls.map((tc, i) => {
    const fn = isRecord(tc) && isRecord(tc.function) ? tc.function : null;
    if (!isRecord(tc) || !fn || typeof fn.name !== "string") {
      throw malformedResponse(PROVIDER, model, `tool call ${i} has no function name`);
    }
    const args = isRecord(fn.arguments)
      ? JSON.stringify(fn.arguments)
      : typeof fn.arguments === "string" ? fn.arguments : "{}";
    return {
      id: typeof tc.id === "string" && tc.id ? tc.id : newId(),
      name: fn.name,
      arguments: args,
    };
  });

  if (typeof data.eval_count === "number") {
    Logger.debug(`[${PROVIDER} ←] ${data.eval_count} tokens generated`);
  }
  return { text, toolCalls };
}

export function makeOllamaCompletionClient(cfg: OllamaClientConfig): CompletionClient {
  const endpoint = `${cfg.baseUrl.replace(/\/+$/, "")}/api/chat`;
  const timeoutMs = cfg.timeoutMs ?? 10 * 60 * 1000;

  async function complete(req: CompletionRequest): Promise<AssistantReply> {
    const opts = req.options ?? {};
    const options: Record<string, number> = {};
    if (opts.temperature !== undefined) options.temperature = opts.temperature;
    if (opts.maxTokens !== undefined) options.num_predict = opts.maxTokens;
    if (opts.contextWindow !== undefined) options.num_ctx = opts.contextWindow;

    const payload: Record<string, unknown> = {
      model: req.model,
      messages: req.messages.map(toOllamaMessage),
      stream: false,
      options,
    };
    if (req.tools.length) payload.tools = req.tools;

    logRequest(PROVIDER, req.messages);
    const data = await postJson(endpoint, payload, {
      provider: PROVIDER,
      model: req.model,
      signal: req.signal,
      timeoutMs,
    });
    return parseOllamaChat(data, req.model);
  }

  return { provider: PROVIDER, complete };
}
