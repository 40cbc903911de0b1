import { afterEach, describe, expect, it, vi } from "vitest";
import { NotFoundError, RateLimitError } from "../../errors.js";
import { calendarDaysFor, createYahooPriceProvider } from "./yahoo.js";

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
  });
}

function chartPayload(meta: Record<string, unknown> = {}) {
  return {
    chart: {
      result: [
        {
          meta,
          timestamp: [1772352000, 1772438400, 1772524800],
          indicators: {
            quote: [
              {
                open: [100, null, 102],
                high: [101, 103, 104],
                low: [99, 100, 101],
                close: [100.5, 102, 103.5],
                volume: [1000, 1100, null],
              },
            ],
          },
        },
      ],
      error: null,
    },
  };
}

describe("yahoo price provider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("requests a window wide enough for the lookback and drops incomplete bars", async () => {
    const fetchMock = vi.fn(async (_url: URL) => jsonResponse(chartPayload()));
    vi.stubGlobal("fetch", fetchMock);
    const provider = createYahooPriceProvider(
      { baseUrl: "https://chart.example/v8/finance/chart/" },
      { now: () => new Date("2026-03-04T00:00:00.000Z") },
    );

    const bars = await provider.getHistory("7203.T", 100);
    expect(bars).toEqual([
      { date: "2026-03-01", open: 100, high: 101, low: 99, close: 100.5, volume: 1000 },
      { date: "2026-03-03", open: 102, high: 104, low: 101, close: 103.5, volume: 0 },
    ]);

    const url = fetchMock.mock.calls[0][0];
    expect(url.pathname).toBe("/v8/finance/chart/7203.T");
    expect(url.searchParams.get("interval")).toBe("1d");
    expect(url.searchParams.get("period2")).toBe("1772582400");
    expect(url.searchParams.get("period1")).toBe(String(1772582400 - calendarDaysFor(100) * 86400));
    expect(calendarDaysFor(100)).toBe(154);
  });

  it("prefers the live market price", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse(chartPayload({ regularMarketPrice: 110 }))));
    const provider = createYahooPriceProvider();
    expect(await provider.getCurrentPrice("7203.T")).toBe(110);

    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse(chartPayload())));
    expect(await provider.getCurrentPrice("7203.T")).toBe(103.5);
  });

  it("maps 404, 429 and empty results to provider errors", async () => {
    const provider = createYahooPriceProvider();

    vi.stubGlobal("fetch", vi.fn(async () => new Response("", { status: 404 })));
    await expect(provider.getCurrentPrice("NOPE")).rejects.toBeInstanceOf(NotFoundError);

    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("", { status: 429, headers: { "retry-after": "3" } })),
    );
    const limited = await provider.getCurrentPrice("7203.T").catch((err: unknown) => err);
    expect(limited).toBeInstanceOf(RateLimitError);
    if (limited instanceof RateLimitError) {
      expect(limited.retryAfterMs).toBe(3000);
    }

    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        jsonResponse({ chart: { result: null, error: { code: "Not Found", description: "No data found" } } }),
      ),
    );
    await expect(provider.getHistory("GONE", 10)).rejects.toThrow("no chart for GONE: No data found");
  });

  it("rejects a malformed payload", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ unexpected: true })));
    await expect(createYahooPriceProvider().getCurrentPrice("7203.T")).rejects.toThrow(
      "unexpected chart payload for 7203.T",
    );
  });
});
