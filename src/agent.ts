/**
 * Agent turn loop.
 *
 * One turn: append the user's utterance, then alternate completions and tool
 * dispatch until the model answers without tool calls or the step budget
 * runs out. Events stream out as they happen; history is written before the
 * event that reports it.
 */
import { Logger } from "./logger.js";
import { taskerError, isAbortError } from "./errors.js";
import { MessageHistory } from "./history.js";
import type { HistoryView } from "./history.js";
import { stripThinking } from "./think-tags.js";
import { ToolAdapter } from "./tool-adapter.js";
import { projectAssistant, projectTool } from "./events.js";
import type { TurnEvent } from "./events.js";
import type { ToolTransport } from "./mcp/index.js";
import type { AssistantReply, CompletionClient, GenerationOptions, ToolCallRequest } from "./drivers/types.js";

export const DEFAULT_MAX_STEPS = 25;

/** Result recorded for calls that never ran or were interrupted by cancellation. */
export const CANCELLED_TOOL_TEXT = "Tool call cancelled by the user.";

export type TurnPhase =
  | "idle"
  | "awaiting_completion"
  | "has_tool_calls"
  | "dispatching_tools"
  | "done";

export interface AgentOptions {
  completion: CompletionClient;
  tools: ToolTransport;
  /** Model name as the completion backend expects it. */
  model: string;
  systemPrompt: string;
  /** Completion requests allowed per turn. Default: 25. */
  maxSteps?: number;
  toolTimeoutMs?: number;
  strictTools?: boolean;
  generation?: GenerationOptions;
}

export interface TurnOptions {
  /** Aborting ends the turn at the next boundary without corrupting history. */
  signal?: AbortSignal;
}

export class Agent {
  /** The conversation so far. Only turn() writes to it. */
  readonly history: HistoryView;
  readonly maxSteps: number;
  private readonly log: MessageHistory;
  private readonly completion: CompletionClient;
  private readonly adapter: ToolAdapter;
  private readonly model: string;
  private readonly generation: GenerationOptions;
  private _phase: TurnPhase = "idle";
  private inFlight = false;

  constructor(opts: AgentOptions) {
    this.completion = opts.completion;
    this.model = opts.model;
    this.maxSteps = opts.maxSteps ?? DEFAULT_MAX_STEPS;
    this.generation = opts.generation ?? {};
    this.adapter = new ToolAdapter(opts.tools, { timeoutMs: opts.toolTimeoutMs, strict: opts.strictTools });
    this.log = new MessageHistory(opts.systemPrompt);
    this.history = this.log.view();
  }

  get phase(): TurnPhase {
    return this._phase;
  }

  private setPhase(next: TurnPhase): void {
    Logger.debug(`[turn] ${this._phase} → ${next}`);
    this._phase = next;
  }

  /**
   * Run one turn. Not reentrant: iterating a second turn while one is in
   * flight throws a busy_error.
   */
  async *turn(utterance: string, opts: TurnOptions = {}): AsyncGenerator<TurnEvent, void, undefined> {
    if (this.inFlight) {
      throw taskerError("busy_error", "A turn is already in progress on this agent");
    }
    this.inFlight = true;
    const { signal } = opts;
    // Calls of the current batch that have no result in history yet.
    let unanswered: ToolCallRequest[] = [];

    try {
      const tools = await this.adapter.describe();
      this.log.append({ role: "user", content: utterance });

      for (let step = 0; step < this.maxSteps; step++) {
        if (signal?.aborted) return;
        this.setPhase("awaiting_completion");

        let reply: AssistantReply;
        try {
          reply = await this.completion.complete({
            model: this.model,
            messages: this.log.snapshotForCompletion(),
            tools,
            options: this.generation,
            signal,
          });
        } catch (e: unknown) {
          if (signal?.aborted && isAbortError(e)) {
            Logger.debug("[turn] completion cancelled");
            return;
          }
          throw e;
        }

        const text = stripThinking(reply.text) || null;
        this.log.append({ role: "assistant", content: text, toolCalls: reply.toolCalls });
        unanswered = [...reply.toolCalls];
        this.setPhase(reply.toolCalls.length > 0 ? "has_tool_calls" : "done");
        yield projectAssistant({ text, toolCalls: reply.toolCalls });

        if (reply.toolCalls.length === 0) return;

        this.setPhase("dispatching_tools");
        for (const call of reply.toolCalls) {
          if (signal?.aborted) return;
          const outcome = await this.adapter.dispatch(call.name, call.arguments, this.adapter.timeoutMs, signal);
          const content = outcome.status === "completed" ? outcome.text : CANCELLED_TOOL_TEXT;
          this.log.append({ role: "tool", toolCallId: call.id, name: call.name, content });
          unanswered.shift();
          if (signal?.aborted) return;
          yield projectTool(call, content);
        }
      }

      Logger.warn(`Step budget of ${this.maxSteps} exhausted; ending turn`);
    } finally {
      // Keep every assistant tool call paired with a result so the history
      // stays valid for the next completion request.
      for (const call of unanswered) {
        this.log.append({ role: "tool", toolCallId: call.id, name: call.name, content: CANCELLED_TOOL_TEXT });
      }
      this.setPhase("done");
      this.inFlight = false;
    }
  }
}
