/**
 * Tool adapter: the seam between the agent's tool calls and the MCP transport.
 *
 * Outbound: MCP tool descriptors become completion tool definitions.
 * Inbound: MCP content blocks become the single text payload the model sees.
 * Every failure on the way (bad arguments, transport errors, tool errors,
 * timeouts) comes back as text so the model can correct itself.
 */
import { Logger } from "./logger.js";
import { taskerError, asError, isTaskerError, errorLogFields } from "./errors.js";
import { describeType, isRecord } from "./utils/guards.js";
import type { ContentBlock, ToolDescriptor, ToolTransport } from "./mcp/index.js";
import type { CompletionToolDefinition, JsonSchemaObject } from "./drivers/types.js";

export const NO_RESULT_TEXT = "Tool executed but returned no result.";

export const DEFAULT_TOOL_TIMEOUT_MS = 5_000;

/**
 * Coerce an MCP input schema into a closed object schema.
 * Returns null when the schema cannot describe a keyword-argument call.
 */
export function normalizeSchema(schema: unknown): JsonSchemaObject | null {
  if (schema === undefined || schema === null) {
    return { type: "object", properties: {}, additionalProperties: false };
  }
  if (!isRecord(schema)) return null;
  if (schema.type !== undefined && schema.type !== "object") return null;
  if (schema.properties !== undefined && !isRecord(schema.properties)) return null;
  return {
    ...schema,
    type: "object",
    properties: schema.properties ?? {},
    additionalProperties: false,
  };
}

/**
 * Map MCP tool descriptors one-to-one onto completion tool definitions.
 * Tools whose schema is malformed are left out and logged.
 */
export function describeTools(
  tools: ToolDescriptor[],
  opts: { strict?: boolean } = {},
): CompletionToolDefinition[] {
  const strict = opts.strict ?? true;
  const defs: CompletionToolDefinition[] = [];
  for (const tool of tools) {
    const parameters = normalizeSchema(tool.inputSchema);
    if (!parameters) {
      Logger.warn(`Skipping tool "${tool.name}" (server: ${tool.serverName}): input schema is not an object schema`);
      continue;
    }
    defs.push({
      type: "function",
      function: {
        name: tool.name,
        description: tool.description ?? "",
        parameters,
        strict,
      },
    });
  }
  return defs;
}

/**
 * Decode a tool call's argument string. JSON is the only accepted encoding;
 * an empty string means "no arguments".
 */
export function parseToolArguments(raw: string): Record<string, unknown> {
  if (raw.trim() === "") return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e: unknown) {
    throw taskerError("argument_error", `Arguments are not valid JSON: ${asError(e).message}`, { cause: e });
  }
  if (!isRecord(parsed)) {
    throw taskerError("argument_error", `Arguments must be a JSON object, got ${describeType(parsed)}`);
  }
  return parsed;
}

/** Reduce a tool's content blocks to the text handed back to the model. */
export function toolResultText(blocks: ContentBlock[]): string {
  if (blocks.length === 0) return NO_RESULT_TEXT;
  const first = blocks[0];
  if (first.type === "text" && typeof first.text === "string") return first.text;
  return `Tool returned ${first.type} content which is not supported. Tell the user their MCP server is not supported yet.`;
}

export function toolErrorText(name: string, message: string): string {
  return `Error executing tool call '${name}': ${message.replace(/\.+$/, "")}. Try again with different arguments.`;
}

/** How a dispatched call ended. Tool errors still count as completed. */
export type ToolOutcome =
  | { status: "completed"; text: string }
  | { status: "cancelled" };

export interface ToolAdapterOptions {
  /** Per-call timeout; DEFAULT_TOOL_TIMEOUT_MS when omitted. */
  timeoutMs?: number;
  /** Mark schemas strict in the completion request. Default: true. */
  strict?: boolean;
}

export class ToolAdapter {
  readonly timeoutMs: number;
  private readonly strict: boolean;

  constructor(private readonly transport: ToolTransport, opts: ToolAdapterOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.strict = opts.strict ?? true;
  }

  /** Discover the transport's tools and describe them for the model. */
  async describe(): Promise<CompletionToolDefinition[]> {
    const tools = await this.transport.listTools();
    return describeTools(tools, { strict: this.strict });
  }

  /**
   * Run one tool call and return its text. Never throws: failures come back
   * as an error description addressed to the model.
   */
  async invoke(name: string, rawArguments: string, timeoutMs: number = this.timeoutMs): Promise<string> {
    const outcome = await this.dispatch(name, rawArguments, timeoutMs);
    return outcome.status === "completed" ? outcome.text : toolErrorText(name, "The operation was aborted");
  }

  /**
   * Like invoke(), but a call that failed because `signal` was aborted is
   * reported as cancelled instead of as error text. A call that returned
   * normally keeps its result even if the signal fired meanwhile.
   */
  async dispatch(
    name: string,
    rawArguments: string,
    timeoutMs: number = this.timeoutMs,
    signal?: AbortSignal,
  ): Promise<ToolOutcome> {
    const started = Date.now();
    try {
      const args = parseToolArguments(rawArguments);
      Logger.debug(`[tool →] ${name}(${rawArguments})`);
      const blocks = await this.transport.callTool(name, args, { timeoutMs, signal });
      const text = toolResultText(blocks);
      Logger.debug(`[tool ←] ${name}: ${text.length} chars in ${Date.now() - started}ms`);
      return { status: "completed", text };
    } catch (e: unknown) {
      if (signal?.aborted) {
        Logger.debug(`[tool ×] ${name}: cancelled (${asError(e).message})`);
        return { status: "cancelled" };
      }
      const te = isTaskerError(e)
        ? e
        : taskerError("tool_error", asError(e).message, { cause: e });
      if (te.latency_ms === undefined) te.latency_ms = Date.now() - started;
      Logger.error(`Tool call failed [${name}]:`, errorLogFields(te));
      return { status: "completed", text: toolErrorText(name, te.message) };
    }
  }
}
