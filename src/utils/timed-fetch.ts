import { asError } from "../errors.js";

export type TimedFetchInit = RequestInit & { timeoutMs?: number; where?: string };

/**
 * fetch with a timeout and call-site context in the error message.
 * A caller-supplied signal still cancels the request.
 */
export async function timedFetch(url: string, init: TimedFetchInit = {}): Promise<Response> {
  const { timeoutMs, where, signal: callerSignal, ...rest } = init;
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | null = null;
  let timedOut = false;

  const onCallerAbort = () => controller.abort();
  if (callerSignal) {
    if (callerSignal.aborted) controller.abort();
    else callerSignal.addEventListener("abort", onCallerAbort, { once: true });
  }
  if (timeoutMs && timeoutMs > 0) {
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
  }

  try {
    return await fetch(url, { ...rest, signal: controller.signal });
  } catch (e: unknown) {
    const wrapped = asError(e);
    // Caller cancellation passes through untouched so callers can tell it apart.
    if (wrapped.name === "AbortError" && !timedOut) throw wrapped;
    const tag = timedOut ? "fetch timeout" : "fetch error";
    throw new Error(`[${tag}] ${where ?? ""} ${url} -> ${wrapped.name}: ${wrapped.message}`, { cause: e });
  } finally {
    if (timer) clearTimeout(timer);
    if (callerSignal) callerSignal.removeEventListener("abort", onCallerAbort);
  }
}
