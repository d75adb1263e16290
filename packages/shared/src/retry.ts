export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Prefix for retry warnings */
  label?: string;
  shouldRetry?: (error: unknown) => boolean;
}

/** Errors flagged `{ retryable: true }` and fetch-level network failures. */
export function isRetryable(error: unknown): boolean {
  if (error && typeof error === "object" && "retryable" in error) {
    return (error as { retryable: unknown }).retryable === true;
  }
  if (error instanceof TypeError && error.message.includes("fetch")) return true;
  return false;
}

/** Marks an error so `withRetry` will try again. */
export function markRetryable<E extends Error>(error: E): E & { retryable: true } {
  return Object.assign(error, { retryable: true as const });
}

function delay(ms: number): Promise<void> {
  // ±25% jitter
  const jitter = ms * 0.25 * (Math.random() * 2 - 1);
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms + jitter)));
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const maxRetries = opts?.maxRetries ?? 2;
  const baseDelayMs = opts?.baseDelayMs ?? 500;
  const maxDelayMs = opts?.maxDelayMs ?? 10_000;
  const shouldRetry = opts?.shouldRetry ?? isRetryable;
  const label = opts?.label ?? "withRetry";

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt < maxRetries && shouldRetry(err)) {
        const wait = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
        const msg = err instanceof Error ? err.message : String(err);
        console.warn(`[${label}] attempt ${attempt + 1}/${maxRetries + 1} failed: ${msg}, retrying in ${Math.round(wait)}ms`);
        await delay(wait);
        continue;
      }
      throw err;
    }
  }
  throw lastError;
}
