/**
 * Pieces of the interactive loop that do not need a terminal:
 * event rendering and the double-interrupt rule.
 */
import { formatToolCall } from "../events.js";
import type { TurnEvent } from "../events.js";

export const DOUBLE_INTERRUPT_MS = 500;

export type InterruptAction = "cancel_turn" | "arm" | "quit";

/**
 * Tracks Ctrl+C presses. Two presses within DOUBLE_INTERRUPT_MS quit;
 * otherwise a press cancels the running turn, or just arms the quit when idle.
 */
export class InterruptTracker {
  private lastAt: number | null = null;

  constructor(private readonly windowMs = DOUBLE_INTERRUPT_MS) {}

  press(turnRunning: boolean, now: number = Date.now()): InterruptAction {
    const double = this.lastAt !== null && now - this.lastAt <= this.windowMs;
    this.lastAt = now;
    if (double) return "quit";
    return turnRunning ? "cancel_turn" : "arm";
  }

  reset(): void {
    this.lastAt = null;
  }
}

function firstLine(s: string): string {
  const line = s.split("\n", 1)[0] ?? "";
  return s.includes("\n") ? `${line} …` : line;
}

/**
 * Plain-text lines for one event: assistant text, then one `name(args)` per
 * tool call; a tool event shows the first line of its result.
 */
export function renderEvent(event: TurnEvent): string[] {
  switch (event.type) {
    case "assistant": {
      const lines: string[] = [];
      if (event.text) lines.push(event.text);
      for (const call of event.toolCalls) lines.push(`→ ${formatToolCall(call)}`);
      return lines;
    }
    case "tool":
      return [`  ${event.name}: ${firstLine(event.content)}`];
  }
}
