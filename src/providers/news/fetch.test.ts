import { describe, expect, it } from "vitest";
import { createRateLimiter } from "./fetch.js";

describe("createRateLimiter", () => {
  it("spaces requests per host, including concurrent ones", async () => {
    const waits: number[] = [];
    const limiter = createRateLimiter({
      now: () => 1_000,
      sleep: async (ms) => {
        waits.push(ms);
      },
    });
    const url = new URL("https://news.example/rss");
    await Promise.all([limiter(url, 30), limiter(url, 30), limiter(url, 30)]);
    await limiter(new URL("https://other.example/rss"), 30);
    expect(waits).toEqual([2_000, 4_000]);
  });

  it("does nothing without a limit", async () => {
    const waits: number[] = [];
    const limiter = createRateLimiter({ sleep: async (ms) => waits.push(ms) });
    await limiter(new URL("https://news.example/rss"), 0);
    await limiter(new URL("https://news.example/rss"), 0);
    expect(waits).toEqual([]);
  });
});
