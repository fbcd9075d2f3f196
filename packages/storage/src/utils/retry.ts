import { setTimeout as delay } from "node:timers/promises";

export interface RetryOptions {
  attempts: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitter?: boolean;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
  /** Stops retrying (and interrupts the backoff sleep) once aborted. */
  signal?: AbortSignal;
}

export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const {
    attempts,
    baseDelayMs = 100,
    maxDelayMs = 2_000,
    jitter = true,
    shouldRetry,
    onRetry,
    signal,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      const canRetry = shouldRetry ? shouldRetry(error) : true;
      if (!canRetry || attempt === attempts - 1 || signal?.aborted) {
        throw error;
      }

      onRetry?.(error, attempt + 1);
      const backoff = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
      const delayMs = jitter ? Math.random() * backoff : backoff;
      try {
        await delay(delayMs, undefined, { signal });
      } catch {
        // the sleep was aborted; surface the failure that triggered it
        throw error;
      }
    }
  }

  throw lastError;
}
