/**
 * Retry policy for completion backends: which HTTP statuses to retry and
 * how long to wait between attempts.
 */

export const MAX_RETRIES = 3;
export const RETRY_BASE_MS = 1000;

const RETRYABLE_STATUS = new Set([429, 502, 503, 529]);

function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 ? n : fallback;
}

/** TASKER_MAX_RETRIES, or MAX_RETRIES. */
export function getMaxRetries(): number {
  return envInt("TASKER_MAX_RETRIES", MAX_RETRIES);
}

/** TASKER_RETRY_BASE_MS, or RETRY_BASE_MS. */
export function getRetryBaseMs(): number {
  return envInt("TASKER_RETRY_BASE_MS", RETRY_BASE_MS);
}

export function isRetryable(status: number): boolean {
  return RETRYABLE_STATUS.has(status);
}

/**
 * Exponential backoff with up to 50% jitter: attempt n waits
 * base * 2^n plus [0, base * 2^(n-1)).
 * A numeric `retry-after` header (seconds) takes precedence.
 */
export function retryDelay(attempt: number, retryAfter?: string | null): number {
  if (retryAfter) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  }
  const base = getRetryBaseMs() * 2 ** attempt;
  return base + Math.random() * base * 0.5;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}
