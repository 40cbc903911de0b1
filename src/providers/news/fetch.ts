import { setTimeout as delay } from "node:timers/promises";

export type FetchLimits = {
  timeoutMs: number;
  maxBytes: number;
  userAgent: string;
  rateLimitPerHostPerMinute: number;
};

export type FetchResult = {
  ok: boolean;
  status: number;
  body: string;
  bytes: number;
  /** Set when the request never produced a response. */
  error?: string;
};

export type RateLimiter = (url: URL, rateLimitPerHostPerMinute: number) => Promise<void>;

function resolveMinIntervalMs(rateLimitPerHostPerMinute: number): number {
  if (!Number.isFinite(rateLimitPerHostPerMinute) || rateLimitPerHostPerMinute <= 0) {
    return 0;
  }
  return Math.ceil(60_000 / rateLimitPerHostPerMinute);
}

/**
 * Spaces requests to the same host. Slots are reserved before waiting, so concurrent
 * callers queue up instead of firing together.
 */
export function createRateLimiter(
  params: { now?: () => number; sleep?: (ms: number) => Promise<unknown> } = {},
): RateLimiter {
  const now = params.now ?? Date.now;
  const sleep = params.sleep ?? ((ms: number) => delay(ms));
  const nextSlotByHost = new Map<string, number>();
  return async (url, rateLimitPerHostPerMinute) => {
    const host = url.host;
    const minInterval = resolveMinIntervalMs(rateLimitPerHostPerMinute);
    if (!host || minInterval === 0) {
      return;
    }
    const current = now();
    const slot = Math.max(current, nextSlotByHost.get(host) ?? 0);
    nextSlotByHost.set(host, slot + minInterval);
    if (slot > current) {
      await sleep(slot - current);
    }
  };
}

export async function fetchWithLimits(url: string, limits: FetchLimits): Promise<FetchResult> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), limits.timeoutMs);
  try {
    const res = await fetch(url, {
      signal: controller.signal,
      headers: {
        "user-agent": limits.userAgent,
      },
    });
    const arrayBuf = await res.arrayBuffer();
    const bytes = arrayBuf.byteLength;
    const sliced = bytes > limits.maxBytes ? arrayBuf.slice(0, limits.maxBytes) : arrayBuf;
    return {
      ok: res.ok,
      status: res.status,
      body: Buffer.from(sliced).toString("utf8"),
      bytes,
    };
  } catch (err) {
    return {
      ok: false,
      status: 0,
      body: "",
      bytes: 0,
      error: err instanceof Error ? err.message : String(err),
    };
  } finally {
    clearTimeout(timeout);
  }
}
