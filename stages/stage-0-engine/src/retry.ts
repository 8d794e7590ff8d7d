/**
 * Transport retry for engine adapters: 429, 5xx and transient network errors
 * are retried with capped exponential backoff. Semantic failures (bad JSON,
 * violated constraints) are never seen here; the repair loops own them.
 */

import { BackendCallError } from "./errors.js";
import type { RetryOptions } from "./types.js";

const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 2,
  backoffMs: 300,
  maxBackoffMs: 2000,
  jitter: 0.2,
};

const TRANSIENT_NETWORK_CODES = new Set(["ETIMEDOUT", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN"]);

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function readStringField(error: object, field: "name" | "code"): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
}

export function isRetryableError(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }
  if (error instanceof BackendCallError) {
    // 上下文超长重试也没用
    if (error.code === "context_length_exceeded") {
      return false;
    }
    const status = error.status ?? 0;
    return status === 429 || status >= 500;
  }
  if (readStringField(error, "name") === "AbortError") {
    return true;
  }
  const code = readStringField(error, "code");
  return code !== undefined && TRANSIENT_NETWORK_CODES.has(code);
}

/** Delay before retry number `attempt` (1-based), jittered by ±`jitter`. */
export function backoffDelay(
  attempt: number,
  retry: RetryOptions,
  random: () => number = Math.random
): number {
  const raw = retry.backoffMs * 2 ** (attempt - 1);
  const capped = Math.min(raw, retry.maxBackoffMs ?? raw);
  if (!retry.jitter) {
    return capped;
  }
  return Math.max(0, capped + (random() * 2 - 1) * capped * retry.jitter);
}

// retry 只负责退避策略，超时由调用方注入的 signal 控制
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const retry: RetryOptions = { ...DEFAULT_RETRY, ...options };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt > retry.maxRetries || !isRetryableError(error)) {
        throw error;
      }
      const delay = backoffDelay(attempt, retry);
      retry.onRetry?.({ attempt, delayMs: delay, error });
      await sleep(delay);
    }
  }
}
