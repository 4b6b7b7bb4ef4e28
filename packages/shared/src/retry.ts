import { HttpStatusError } from "./errors.js";

export type RetryDelayOptions = {
  initialDelayMs?: number;
  maxDelayMs?: number;
  multiplier?: number;
  jitterRatio?: number;
  random?: () => number;
};

export type RetryOptions = RetryDelayOptions & {
  retries?: number;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
};

const DEFAULT_RETRIES = 2;
const DEFAULT_INITIAL_DELAY_MS = 1_000;
const DEFAULT_MAX_DELAY_MS = 8_000;
const DEFAULT_MULTIPLIER = 2;
const DEFAULT_JITTER_RATIO = 0.25;

export function computeExponentialBackoffDelayMs(attempt: number, options: RetryDelayOptions = {}): number {
  const initialDelayMs = options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const multiplier = options.multiplier ?? DEFAULT_MULTIPLIER;
  const jitterRatio = options.jitterRatio ?? DEFAULT_JITTER_RATIO;
  const random = options.random ?? Math.random;

  const baseDelay = Math.min(maxDelayMs, initialDelayMs * Math.pow(multiplier, Math.max(0, Math.floor(attempt))));
  const jitter = baseDelay * jitterRatio * Math.max(0, Math.min(1, random()));
  return Math.floor(baseDelay + jitter);
}

/** Seconds or an HTTP date; null when absent, unparseable or already past. */
export function parseRetryAfterHeaderMs(headerValue: string | null | undefined, nowMs: number = Date.now()): number | null {
  const value = headerValue?.trim();
  if (!value) return null;

  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds > 0) {
    return Math.floor(seconds * 1_000);
  }

  const absoluteMs = Date.parse(value);
  if (Number.isFinite(absoluteMs)) {
    const delta = absoluteMs - nowMs;
    return delta > 0 ? Math.floor(delta) : null;
  }

  return null;
}

/**
 * Transient failures of network-like collaborators: request timeouts, aborted
 * fetches, connection resets and 408/409/429/5xx responses.
 */
export function isRetryableNetworkError(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;
  const status = "status" in error ? error.status : undefined;
  if (typeof status !== "number") {
    const name = "name" in error ? error.name : undefined;
    const code = "code" in error ? error.code : undefined;
    if (typeof code === "string" && ["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN"].includes(code)) {
      return true;
    }
    return (
      typeof name === "string" &&
      (name.includes("APIConnection") || name.includes("Timeout") || name === "AbortError" || name === "TypeError")
    );
  }
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

export async function defaultSleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `operation`, retrying transient failures with exponential backoff. A
 * status error carrying a Retry-After delay waits that long instead.
 */
export async function withExponentialBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const retries = Math.max(0, Math.floor(options.retries ?? DEFAULT_RETRIES));
  const sleep = options.sleep ?? defaultSleep;
  const shouldRetry = options.shouldRetry ?? isRetryableNetworkError;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= retries || !shouldRetry(error)) {
        throw error;
      }
      const retryAfterMs = error instanceof HttpStatusError ? error.retryAfterMs : null;
      const delayMs = retryAfterMs ?? computeExponentialBackoffDelayMs(attempt, options);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
