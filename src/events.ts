/**
 * Turn events: the presentation-agnostic stream a turn produces.
 *
 * Projection is pure: the same reply always yields the same event, and
 * nothing here touches history, the network or the logger.
 */
import { asError } from "./errors.js";
import { parseToolArguments } from "./tool-adapter.js";
import type { AssistantReply, ToolCallRequest } from "./drivers/types.js";

export interface ToolCallSummary {
  name: string;
  id: string;
  args: Record<string, unknown>;
  /** The argument string exactly as the model produced it. */
  rawArguments: string;
  /** Set when rawArguments could not be decoded; args is then empty. */
  argumentsError?: string;
}

export interface AssistantEvent {
  type: "assistant";
  text: string | null;
  toolCalls: ToolCallSummary[];
}

export interface ToolEvent {
  type: "tool";
  name: string;
  id: string;
  content: string;
}

export type TurnEvent = AssistantEvent | ToolEvent;

export function summarizeToolCall(call: ToolCallRequest): ToolCallSummary {
  try {
    return { name: call.name, id: call.id, args: parseToolArguments(call.arguments), rawArguments: call.arguments };
  } catch (e: unknown) {
    return {
      name: call.name,
      id: call.id,
      args: {},
      rawArguments: call.arguments,
      argumentsError: asError(e).message,
    };
  }
}

export function projectAssistant(reply: AssistantReply): AssistantEvent {
  return {
    type: "assistant",
    text: reply.text,
    toolCalls: reply.toolCalls.map(summarizeToolCall),
  };
}

export function projectTool(call: ToolCallRequest, content: string): ToolEvent {
  return { type: "tool", name: call.name, id: call.id, content };
}

/** One-line label for a tool call: `view(path=".")`. */
export function formatToolCall(summary: ToolCallSummary): string {
  if (summary.argumentsError) return `${summary.name}(${summary.rawArguments})`;
  const pairs = Object.entries(summary.args).map(([k, v]) => {
    const valStr = JSON.stringify(v) ?? String(v);
    return `${k}=${valStr.length > 40 ? valStr.slice(0, 37) + "..." : valStr}`;
  });
  return `${summary.name}(${pairs.join(", ")})`;
}
