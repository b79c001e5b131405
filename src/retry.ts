// Interview Voice Analyzer - Bounded exponential backoff for external calls

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Label used in retry log lines. */
  label?: string;
  /** Injected in tests to skip real waiting. */
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, err: unknown, waitMs: number) => void;
}

const RETRYABLE_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN", "EPIPE"]);

/**
 * Transient failures: an explicit `retryable` flag wins, then HTTP 408/429/5xx
 * statuses (OpenAI APIError shape), then socket-level error codes.
 */
export function isRetryable(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;
  if ("retryable" in error && typeof error.retryable === "boolean") {
    return error.retryable;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status === 408 || error.status === 429 || error.status >= 500;
  }
  if ("code" in error && typeof error.code === "string") {
    return RETRYABLE_CODES.has(error.code);
  }
  if (error instanceof TypeError && error.message.includes("fetch")) return true;
  return false;
}

function jitteredDelay(ms: number): Promise<void> {
  // ±25% jitter
  const jitter = ms * 0.25 * (Math.random() * 2 - 1);
  return new Promise((resolve) => setTimeout(resolve, ms + jitter));
}

export async function withRetry<T>(fn: () => Promise<T>, opts?: RetryOptions): Promise<T> {
  const maxRetries = opts?.maxRetries ?? 2;
  const baseDelayMs = opts?.baseDelayMs ?? 500;
  const maxDelayMs = opts?.maxDelayMs ?? 10_000;
  const sleep = opts?.sleep ?? jitteredDelay;
  const label = opts?.label ?? "withRetry";

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt < maxRetries && isRetryable(err)) {
        const wait = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
        const msg = err instanceof Error ? err.message : String(err);
        if (opts?.onRetry) {
          opts.onRetry(attempt + 1, err, wait);
        } else {
          console.warn(`[WARN] [${label}] attempt ${attempt + 1}/${maxRetries + 1} failed: ${msg}; retrying in ${Math.round(wait)}ms`);
        }
        await sleep(wait);
        continue;
      }
      throw err;
    }
  }
  throw lastError; // unreachable, satisfies TS
}
