import { randomUUID } from "node:crypto";
import { Logger } from "../logger.js";
import { taskerError, asError, isAbortError } from "../errors.js";
import { timedFetch } from "../utils/timed-fetch.js";
import { getMaxRetries, isRetryable, retryDelay, sleep } from "../utils/retry.js";
import type { CompletionMessage } from "./types.js";

export interface PostJsonOptions {
  provider: string;
  model: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  timeoutMs: number;
}

/**
 * POST a JSON body and return the parsed JSON response.
 * 429/502/503/529 are retried with backoff; any other non-2xx is a
 * completion_error. Caller aborts propagate as the original AbortError.
 */
export async function postJson(url: string, body: unknown, opts: PostJsonOptions): Promise<unknown> {
  const { provider, model } = opts;
  const started = Date.now();
  const headers: Record<string, string> = { "Content-Type": "application/json", ...opts.headers };
  const payload = JSON.stringify(body);

  for (let attempt = 0; ; attempt++) {
    let res: Response;
    try {
      res = await timedFetch(url, {
        method: "POST",
        headers,
        body: payload,
        signal: opts.signal,
        where: `driver:${provider}`,
        timeoutMs: opts.timeoutMs,
      });
    } catch (e: unknown) {
      if (isAbortError(e)) throw e;
      throw taskerError("completion_error", asError(e).message, {
        provider,
        model,
        retryable: true,
        latency_ms: Date.now() - started,
        cause: e,
      });
    }

    if (res.ok) {
      try {
        return await res.json();
      } catch (e: unknown) {
        throw taskerError("completion_error", `${provider} returned a body that is not JSON`, {
          provider,
          model,
          status: res.status,
          latency_ms: Date.now() - started,
          cause: e,
        });
      }
    }

    if (isRetryable(res.status) && attempt < getMaxRetries()) {
      const delay = retryDelay(attempt, res.headers.get("retry-after"));
      Logger.warn(`${provider} ${res.status}, retry ${attempt + 1}/${getMaxRetries()} in ${Math.round(delay)}ms`);
      await sleep(delay);
      continue;
    }

    const text = await res.text().catch(() => "");
    throw taskerError("completion_error", `${provider} chat failed (${res.status}): ${text}`, {
      provider,
      model,
      status: res.status,
      retryable: isRetryable(res.status),
      latency_ms: Date.now() - started,
    });
  }
}

/** Observability line for an outgoing request: size, count and what prompted it. */
export function logRequest(provider: string, messages: CompletionMessage[]): void {
  const sizeKB = (JSON.stringify(messages).length / 1024).toFixed(1);
  const last = messages[messages.length - 1];
  let snippet = "";
  if (last?.content) {
    const content = last.content.trim().replace(/\n+/g, " ");
    snippet = content.length > 120 ? content.slice(0, 120) + "..." : content;
    if (last.role === "tool") snippet = `${last.name} → ${snippet}`;
  }
  Logger.debug(`[${provider} →] ${sizeKB} KB (${messages.length} messages)${snippet ? ` <${snippet}>` : ""}`);
}

export function malformedResponse(provider: string, model: string, detail: string): Error {
  return taskerError("completion_error", `Malformed completion response from ${provider}: ${detail}`, {
    provider,
    model,
    retryable: false,
  });
}

/** Id for a tool call the backend returned without one. */
export function newToolCallId(): string {
  return `call_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}
