export { Agent, CANCELLED_TOOL_TEXT, DEFAULT_MAX_STEPS } from "./agent.js";
export type { AgentOptions, TurnOptions, TurnPhase } from "./agent.js";
export { MessageHistory, toCompletionMessage } from "./history.js";
export type { HistoryView, Message, NewMessage } from "./history.js";
export { ToolAdapter, describeTools, normalizeSchema, parseToolArguments, toolResultText, toolErrorText } from "./tool-adapter.js";
export type { ToolOutcome } from "./tool-adapter.js";
export { projectAssistant, projectTool, summarizeToolCall, formatToolCall } from "./events.js";
export type { AssistantEvent, ToolEvent, TurnEvent, ToolCallSummary } from "./events.js";
export { stripThinking } from "./think-tags.js";
export { McpManager, prefixedName } from "./mcp/index.js";
export type { AttachOptions, McpServerConfig, ToolDescriptor, ToolTransport, ContentBlock, CallToolOptions } from "./mcp/index.js";
export { attachInProcess, attachNativeServers, createFilesystemServer, createWebServer, NATIVE_SERVERS } from "./servers/index.js";
export type { NativeServerName } from "./servers/index.js";
export { createCompletionClient, makeOllamaCompletionClient, makeOpenAiCompletionClient } from "./drivers/index.js";
export type { AssistantReply, CompletionClient, CompletionRequest, ToolCallRequest } from "./drivers/index.js";
export { buildSystemPrompt } from "./prompts.js";
export { loadConfig } from "./cli/config.js";
export { taskerError, isTaskerError, asError } from "./errors.js";
export type { TaskerError, TaskerErrorKind } from "./errors.js";
export { Logger } from "./logger.js";
export type { TaskerConfig, AgentConfig, LlmConfig } from "./types.js";
