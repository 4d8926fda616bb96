/** A tool invocation requested by the model. `arguments` is a JSON-encoded object. */
export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: string;
}

/** Wire shape of a tool call inside an assistant message (OpenAI chat format). */
export interface WireToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

/** One message record as submitted to a completion backend. */
export type CompletionMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: WireToolCall[] }
  | { role: "tool"; tool_call_id: string; name: string; content: string };

/** An object-typed JSON schema; everything besides `type` is passed through. */
export interface JsonSchemaObject {
  type: "object";
  additionalProperties?: boolean;
  [key: string]: unknown;
}

export interface CompletionToolDefinition {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: JsonSchemaObject;
    strict: boolean;
  };
}

export interface GenerationOptions {
  /** Sampling temperature (0.0–2.0) */
  temperature?: number;
  /** Upper bound on generated tokens for one completion */
  maxTokens?: number;
  /** Context window size; only honoured by backends that take it (Ollama's num_ctx) */
  contextWindow?: number;
}

export interface CompletionRequest {
  model: string;
  messages: CompletionMessage[];
  tools: CompletionToolDefinition[];
  options?: GenerationOptions;
  signal?: AbortSignal;
}

/** The single assistant message a completion returns. Both fields may be empty. */
export interface AssistantReply {
  text: string | null;
  toolCalls: ToolCallRequest[];
}

export interface CompletionClient {
  /** Name of the backend, used in logs and errors. */
  readonly provider: string;
  complete(request: CompletionRequest): Promise<AssistantReply>;
}
