/**
 * Structured error types for tasker.
 *
 * Error boundaries wrap failures with taskerError() instead of passing
 * bare strings around, so stack, cause and retry hints survive into the log.
 */

export type TaskerErrorKind =
  | "completion_error"
  | "tool_error"
  | "argument_error"
  | "config_error"
  | "mcp_error"
  | "timeout_error"
  | "busy_error";

export interface TaskerError extends Error {
  kind: TaskerErrorKind;
  provider?: string;
  model?: string;
  status?: number;
  retryable: boolean;
  latency_ms?: number;
  cause?: unknown;
}

export interface TaskerErrorOptions {
  provider?: string;
  model?: string;
  status?: number;
  retryable?: boolean;
  latency_ms?: number;
  cause?: unknown;
}

/**
 * Create a TaskerError with structured fields.
 */
export function taskerError(
  kind: TaskerErrorKind,
  message: string,
  opts: TaskerErrorOptions = {},
): TaskerError {
  const err: TaskerError = Object.assign(new Error(message), {
    kind,
    retryable: opts.retryable ?? false,
  });
  if (opts.provider) err.provider = opts.provider;
  if (opts.model) err.model = opts.model;
  if (opts.status !== undefined) err.status = opts.status;
  if (opts.latency_ms !== undefined) err.latency_ms = opts.latency_ms;
  if (opts.cause !== undefined) err.cause = opts.cause;
  return err;
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (typeof e === "string") return new Error(e);
  if (e === null || e === undefined) return new Error("Unknown error");
  try {
    return new Error(String(e));
  } catch {
    return new Error("Unknown error");
  }
}

export function isTaskerError(e: unknown): e is TaskerError {
  return e instanceof Error && "kind" in e && "retryable" in e;
}

/**
 * Flatten a TaskerError into a plain object for structured logging.
 */
export function errorLogFields(e: TaskerError): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    kind: e.kind,
    message: e.message,
    retryable: e.retryable,
  };
  if (e.provider) fields.provider = e.provider;
  if (e.model) fields.model = e.model;
  if (e.status !== undefined) fields.status = e.status;
  if (e.latency_ms !== undefined) fields.latency_ms = e.latency_ms;
  if (e.cause) {
    const cause = asError(e.cause);
    fields.cause_message = cause.message;
    if (cause.stack) fields.cause_stack = cause.stack;
  }
  if (e.stack) fields.stack = e.stack;
  return fields;
}

/** True for the errors fetch and AbortController raise on cancellation. */
export function isAbortError(e: unknown): boolean {
  return asError(e).name === "AbortError";
}
