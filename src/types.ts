/**
 * Shared types for tasker runtime configuration.
 */
import type { McpServerConfig } from "./mcp/index.js";
import type { NativeServerName } from "./servers/index.js";

export interface LlmConfig {
  /** Model id, optionally provider-prefixed ("ollama_chat/qwen3:8b"). */
  modelId: string;
  /** Backend URL; the provider default when null. */
  baseUrl: string | null;
  apiKey: string | null;
  temperature: number;
  maxTokens: number;
  /** Context window for backends that accept one; null leaves the backend default. */
  numCtx: number | null;
  /** Timeout for one completion request. */
  requestTimeoutMs: number;
}

export interface AgentConfig {
  /** Upper bound on completion requests per turn. */
  maxSteps: number;
  /** Timeout for one tool call. */
  toolTimeoutMs: number;
  /** Send tool schemas with strict: true. */
  strictTools: boolean;
  llm: LlmConfig;
}

export interface TaskerConfig {
  agent: AgentConfig;
  workingDirectory: string;
  /** Built-in servers to start, in no particular order. */
  nativeServers: NativeServerName[];
  mcpServers: Record<string, McpServerConfig>;
  verbose: boolean;
}
