/**
 * Reasoning-model output cleanup.
 *
 * Local reasoning models (qwen3, deepseek-r1, ...) inline their chain of
 * thought as <think>…</think> in the message content. That text is neither
 * stored in history nor shown to the user.
 */

const THINK_RE = /<think>[\s\S]*?<\/think>/g;

/**
 * Remove every <think>…</think> segment and trim the remainder.
 * `null` and the empty string come back untouched.
 */
export function stripThinking(content: string | null): string | null {
  if (!content) return content;
  let out = content;
  // Removing one segment can splice a new one together ("<thi<think>…</think>nk>"),
  // so repeat until nothing matches.
  for (;;) {
    const next = out.replace(THINK_RE, "");
    if (next === out) break;
    out = next;
  }
  return out.trim();
}
