import type { NewsProviderConfig } from "../../config/types.providers.js";
import type { NewsItem, NewsProvider } from "../types.js";
import { RateLimitError } from "../../errors.js";
import { createRateLimiter, fetchWithLimits, type RateLimiter } from "./fetch.js";
import { parseRss } from "./rss.js";

const DEFAULT_BASE_URL = "https://news.google.com/rss/search";
const DEFAULT_LOCALE = "hl=ja&gl=JP&ceid=JP:ja";
const DEFAULT_MAX_ITEMS = 5;
const DEFAULT_MAX_BYTES = 1_000_000;
const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_RATE_LIMIT_PER_MINUTE = 30;
const DEFAULT_USER_AGENT = "scoreloop/0.1 (+news)";

/** Search term for a ticker: the exchange suffix means nothing to a news index. */
export function buildNewsQuery(ticker: string): string {
  const dot = ticker.lastIndexOf(".");
  return dot > 0 ? ticker.slice(0, dot) : ticker;
}

export function buildNewsSearchUrl(ticker: string, cfg: NewsProviderConfig = {}): string {
  const url = new URL(cfg.baseUrl ?? DEFAULT_BASE_URL);
  url.searchParams.set("q", buildNewsQuery(ticker));
  for (const [key, value] of new URLSearchParams(cfg.locale ?? DEFAULT_LOCALE)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

export function createGoogleNewsProvider(
  cfg: NewsProviderConfig = {},
  deps: { rateLimiter?: RateLimiter } = {},
): NewsProvider {
  const rateLimiter = deps.rateLimiter ?? createRateLimiter();
  const limits = {
    timeoutMs: cfg.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    maxBytes: cfg.maxBytes ?? DEFAULT_MAX_BYTES,
    userAgent: cfg.userAgent ?? DEFAULT_USER_AGENT,
    rateLimitPerHostPerMinute: cfg.rateLimitPerHostPerMinute ?? DEFAULT_RATE_LIMIT_PER_MINUTE,
  };
  const maxItems = cfg.maxItems ?? DEFAULT_MAX_ITEMS;

  return {
    async getRecentNews(ticker: string): Promise<NewsItem[]> {
      const url = buildNewsSearchUrl(ticker, cfg);
      await rateLimiter(new URL(url), limits.rateLimitPerHostPerMinute);
      const res = await fetchWithLimits(url, limits);
      if (res.status === 429) {
        throw new RateLimitError(`news search rate limited for ${ticker}`);
      }
      if (!res.ok) {
        throw new Error(
          `news search failed for ${ticker}: ${res.error ?? `HTTP ${res.status}`}`,
        );
      }
      return parseRss(res.body)
        .slice(0, maxItems)
        .map((item) => ({
          title: item.title,
          url: item.url,
          ...(item.publishedAt ? { publishedAt: item.publishedAt } : {}),
          summary: item.summary,
        }));
    },
  };
}
