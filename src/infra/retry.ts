import { setTimeout as delay } from "node:timers/promises";

export type RetryPolicy = {
  /** Extra attempts after the first one. */
  retries: number;
  /** Base delay; doubles on every attempt. */
  delayMs: number;
  maxDelayMs?: number;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  onRetry?: (err: unknown, attempt: number, waitMs: number) => void;
  sleep?: (ms: number) => Promise<unknown>;
};

export function resolveBackoffMs(params: {
  attempt: number;
  delayMs: number;
  maxDelayMs?: number;
}): number {
  const raw = params.delayMs * 2 ** Math.max(0, params.attempt - 1);
  return Math.min(raw, params.maxDelayMs ?? 30_000);
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, policy: RetryPolicy): Promise<T> {
  const sleep = policy.sleep ?? ((ms: number) => delay(ms));
  const maxAttempts = Math.max(0, policy.retries) + 1;
  let attempt = 1;
  for (;;) {
    try {
      return await fn(attempt);
    } catch (err) {
      const retryable = policy.shouldRetry ? policy.shouldRetry(err, attempt) : true;
      if (!retryable || attempt >= maxAttempts) {
        throw err;
      }
      const waitMs = resolveBackoffMs({
        attempt,
        delayMs: policy.delayMs,
        maxDelayMs: policy.maxDelayMs,
      });
      policy.onRetry?.(err, attempt, waitMs);
      await sleep(waitMs);
      attempt += 1;
    }
  }
}

/** Rejects with `onTimeout()` if `promise` has not settled within `timeoutMs`. */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return await promise;
  }
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
