import { z } from "zod";
import type { PriceProviderConfig } from "../../config/types.providers.js";
import type { PriceBar } from "../../analysis/types.js";
import type { PriceHistoryProvider } from "../types.js";
import { NotFoundError, RateLimitError } from "../../errors.js";
import { toDateKey } from "../../infra/utils.js";

const DEFAULT_BASE_URL = "https://query1.finance.yahoo.com/v8/finance/chart";
const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_USER_AGENT = "Mozilla/5.0 (compatible; scoreloop/0.1)";

const nullableSeries = z.array(z.number().nullable());

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({ regularMarketPrice: z.number().optional() }).passthrough(),
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                open: nullableSeries.optional(),
                high: nullableSeries.optional(),
                low: nullableSeries.optional(),
                close: nullableSeries.optional(),
                volume: nullableSeries.optional(),
              }),
            ),
          }),
        }),
      )
      .nullable(),
    error: z.object({ code: z.string(), description: z.string().nullable().optional() }).nullable().optional(),
  }),
});

type ChartResult = NonNullable<z.infer<typeof ChartResponseSchema>["chart"]["result"]>[number];

/** Calendar days that cover `bars` trading days, with slack for holidays. */
export function calendarDaysFor(bars: number): number {
  return Math.ceil((Math.max(1, bars) * 7) / 5) + 14;
}

export function chartToBars(result: ChartResult): PriceBar[] {
  const timestamps = result.timestamp ?? [];
  const quote = result.indicators.quote[0];
  if (!quote) {
    return [];
  }
  const bars: PriceBar[] = [];
  timestamps.forEach((ts, i) => {
    const open = quote.open?.[i];
    const high = quote.high?.[i];
    const low = quote.low?.[i];
    const close = quote.close?.[i];
    if (open == null || high == null || low == null || close == null) {
      return;
    }
    bars.push({
      date: toDateKey(new Date(ts * 1000)),
      open,
      high,
      low,
      close,
      volume: quote.volume?.[i] ?? 0,
    });
  });
  return bars;
}

export function createYahooPriceProvider(
  cfg: PriceProviderConfig = {},
  deps: { now?: () => Date } = {},
): PriceHistoryProvider {
  const baseUrl = (cfg.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
  const now = deps.now ?? (() => new Date());

  const fetchChart = async (ticker: string, query: Record<string, string>): Promise<ChartResult> => {
    const url = new URL(`${baseUrl}/${encodeURIComponent(ticker)}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), cfg.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    let res: Response;
    try {
      res = await fetch(url, {
        signal: controller.signal,
        headers: { "user-agent": cfg.userAgent ?? DEFAULT_USER_AGENT },
      });
    } finally {
      clearTimeout(timeout);
    }
    if (res.status === 404) {
      throw new NotFoundError(`no chart for ${ticker}`);
    }
    if (res.status === 429) {
      const retryAfter = Number(res.headers.get("retry-after"));
      throw new RateLimitError(`chart request for ${ticker} rate limited`, {
        retryAfterMs: Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter * 1000 : null,
      });
    }
    if (!res.ok) {
      throw new Error(`chart request for ${ticker} failed: HTTP ${res.status}`);
    }
    const parsed = ChartResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error(`unexpected chart payload for ${ticker}`, { cause: parsed.error });
    }
    const result = parsed.data.chart.result?.[0];
    if (!result) {
      throw new NotFoundError(
        `no chart for ${ticker}: ${parsed.data.chart.error?.description ?? "empty result"}`,
      );
    }
    return result;
  };

  return {
    async getHistory(ticker, lookback) {
      const end = now();
      const start = new Date(end.getTime() - calendarDaysFor(lookback) * 24 * 60 * 60 * 1000);
      const result = await fetchChart(ticker, {
        period1: String(Math.floor(start.getTime() / 1000)),
        period2: String(Math.floor(end.getTime() / 1000)),
        interval: "1d",
      });
      return chartToBars(result);
    },

    async getCurrentPrice(ticker) {
      const result = await fetchChart(ticker, { range: "5d", interval: "1d" });
      const live = result.meta.regularMarketPrice;
      if (live !== undefined) {
        return live;
      }
      const last = chartToBars(result).at(-1);
      if (!last) {
        throw new NotFoundError(`no recent price for ${ticker}`);
      }
      return last.close;
    },
  };
}
