import { afterEach, describe, expect, it, vi } from "vitest";
import { RateLimitError } from "../../errors.js";
import { buildNewsSearchUrl, createGoogleNewsProvider } from "./google-news.js";

const FEED = `<?xml version="1.0"?>
<rss version="2.0"><channel>
  <item><title>First</title><link>https://news.example/1</link><description>one</description></item>
  <item><title>Second</title><link>https://news.example/2</link><description>two</description></item>
  <item><title>Third</title><link>https://news.example/3</link><description>three</description></item>
</channel></rss>`;

describe("google news provider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("builds the search url without the exchange suffix", () => {
    expect(buildNewsSearchUrl("7203.T")).toBe(
      "https://news.google.com/rss/search?q=7203&hl=ja&gl=JP&ceid=JP%3Aja",
    );
    expect(buildNewsSearchUrl("AAPL", { baseUrl: "https://feeds.example/search", locale: "hl=en" })).toBe(
      "https://feeds.example/search?q=AAPL&hl=en",
    );
  });

  it("returns at most maxItems articles", async () => {
    const fetchMock = vi.fn(async () => new Response(FEED, { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);
    const provider = createGoogleNewsProvider({ maxItems: 2 }, { rateLimiter: async () => {} });

    const items = await provider.getRecentNews("7203.T");
    expect(items).toEqual([
      { title: "First", url: "https://news.example/1", summary: "one" },
      { title: "Second", url: "https://news.example/2", summary: "two" },
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("maps 429 to a rate limit error and other failures to plain errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("slow down", { status: 429 })),
    );
    const provider = createGoogleNewsProvider({}, { rateLimiter: async () => {} });
    await expect(provider.getRecentNews("7203.T")).rejects.toBeInstanceOf(RateLimitError);

    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("", { status: 503 })),
    );
    await expect(provider.getRecentNews("7203.T")).rejects.toThrow(
      "news search failed for 7203.T: HTTP 503",
    );
  });
});
