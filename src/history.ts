import { randomUUID } from "node:crypto";
import type { CompletionMessage, ToolCallRequest } from "./drivers/types.js";

interface MessageMeta {
  readonly id: string;
  /** ISO-8601, taken when the message is appended. */
  readonly timestamp: string;
}

export interface SystemMessage extends MessageMeta {
  readonly role: "system";
  readonly content: string;
}

export interface UserMessage extends MessageMeta {
  readonly role: "user";
  readonly content: string;
}

export interface AssistantMessage extends MessageMeta {
  readonly role: "assistant";
  readonly content: string | null;
  readonly toolCalls: readonly ToolCallRequest[];
}

export interface ToolMessage extends MessageMeta {
  readonly role: "tool";
  readonly toolCallId: string;
  readonly name: string;
  readonly content: string;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

/** What callers hand to append(): a message minus the fields history assigns. */
export type NewMessage =
  | Omit<SystemMessage, keyof MessageMeta>
  | Omit<UserMessage, keyof MessageMeta>
  | Omit<AssistantMessage, keyof MessageMeta>
  | Omit<ToolMessage, keyof MessageMeta>;

function stamp<T extends NewMessage>(msg: T): T & MessageMeta {
  return { ...msg, id: randomUUID(), timestamp: new Date().toISOString() };
}

/** Read-only access to a history, for code outside the turn loop. */
export interface HistoryView {
  readonly length: number;
  /** Frozen copy of the entries, in insertion order. */
  readonly messages: readonly Message[];
  last(): Message | undefined;
  snapshotForCompletion(): CompletionMessage[];
}

/**
 * Append-only conversation log owned by one agent.
 *
 * The first entry is the system message and insertion order is conversation
 * order. Nothing here ever removes or rewrites an entry.
 */
export class MessageHistory {
  private readonly entries: Message[] = [];

  constructor(systemPrompt: string) {
    this.append({ role: "system", content: systemPrompt });
  }

  /** Stamp, freeze and add a message. Returns the stored entry. */
  append(msg: NewMessage): Message {
    const entry: Message = msg.role === "assistant"
      ? stamp({ ...msg, toolCalls: Object.freeze(msg.toolCalls.map((tc) => Object.freeze({ ...tc }))) })
      : stamp(msg);
    Object.freeze(entry);
    this.entries.push(entry);
    return entry;
  }

  get length(): number {
    return this.entries.length;
  }

  get messages(): readonly Message[] {
    return Object.freeze([...this.entries]);
  }

  last(): Message | undefined {
    return this.entries[this.entries.length - 1];
  }

  /** Plain role/content records for a completion request, in insertion order. */
  snapshotForCompletion(): CompletionMessage[] {
    return this.entries.map(toCompletionMessage);
  }

  /** A view that reads through to this history but cannot append. */
  view(): HistoryView {
    const log = this;
    return Object.freeze({
      get length() {
        return log.length;
      },
      get messages() {
        return log.messages;
      },
      last: () => log.last(),
      snapshotForCompletion: () => log.snapshotForCompletion(),
    });
  }
}

export function toCompletionMessage(msg: Message): CompletionMessage {
  switch (msg.role) {
    case "system":
      return { role: "system", content: msg.content };
    case "user":
      return { role: "user", content: msg.content };
    case "assistant": {
      if (msg.toolCalls.length === 0) return { role: "assistant", content: msg.content };
      return {
        role: "assistant",
        content: msg.content,
        tool_calls: msg.toolCalls.map((tc) => ({
          id: tc.id,
          type: "function",
          function: { name: tc.name, arguments: tc.arguments },
        })),
      };
    }
    case "tool":
      return { role: "tool", tool_call_id: msg.toolCallId, name: msg.name, content: msg.content };
  }
}
