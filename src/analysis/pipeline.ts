import crypto from "node:crypto";
import type { RetryPolicyConfig } from "../config/types.providers.js";
import type {
  AiAdvisor,
  MailNotifier,
  NewsItem,
  NewsProvider,
  PriceHistoryProvider,
  RationaleReply,
} from "../providers/types.js";
import type { ParameterSnapshot, ParameterStore } from "../tuning/types.js";
import type {
  AnalysisRepository,
  AnalysisResult,
  AnalysisRun,
  PriceBar,
  TickerOutcome,
} from "./types.js";
import {
  AIServiceError,
  InsufficientHistoryError,
  NotFoundError,
  RateLimitError,
  describeError,
  isRetryableProviderError,
} from "../errors.js";
import { mapWithConcurrency } from "../infra/concurrency.js";
import { withRetry, withTimeout } from "../infra/retry.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/logger.js";
import { PARAMETER_NAMES, validateParameterSnapshot } from "../tuning/registry.js";
import { computeIndicators, requiredHistoryLength } from "./indicators.js";
import { isGated, scoreIndicators } from "./scoring.js";

export type PipelineState =
  | "STARTED"
  | "PARAMETERS_RESOLVED"
  | "SCORED"
  | "GATED"
  | "PERSISTED"
  | "DONE";

export type PipelineTransition = { state: PipelineState; at: string };

export type PipelineCounts = {
  universe: number;
  scored: number;
  skipped: number;
  failed: number;
  gated: number;
  rationales: number;
  notified: number;
};

export type PipelineReport = {
  run: AnalysisRun;
  results: AnalysisResult[];
  outcomes: TickerOutcome[];
  transitions: PipelineTransition[];
  counts: PipelineCounts;
};

export type PipelineOptions = {
  concurrency?: number;
  lookbackBars?: number;
  requiredParameters?: readonly string[];
  prices?: RetryPolicyConfig;
  news?: RetryPolicyConfig;
  ai?: RetryPolicyConfig;
};

export type DecisionPipelineDeps = {
  parameters: ParameterStore;
  repository: AnalysisRepository;
  prices: PriceHistoryProvider;
  news: NewsProvider;
  ai: AiAdvisor;
  mail: MailNotifier;
  universe: readonly string[];
  options?: PipelineOptions;
  now?: () => Date;
  log?: SubsystemLogger;
  sleep?: (ms: number) => Promise<unknown>;
};

export type DecisionPipeline = {
  run: (params?: { signal?: AbortSignal }) => Promise<PipelineReport>;
};

type ResolvedPolicy = Required<RetryPolicyConfig>;

const DEFAULT_LOOKBACK_BARS = 100;
const DEFAULT_CONCURRENCY = 4;

const PRICE_POLICY: ResolvedPolicy = { timeoutMs: 15_000, retries: 2, retryDelayMs: 1_000 };
const NEWS_POLICY: ResolvedPolicy = { timeoutMs: 10_000, retries: 1, retryDelayMs: 500 };
const AI_POLICY: ResolvedPolicy = { timeoutMs: 60_000, retries: 1, retryDelayMs: 1_000 };

function resolvePolicy(cfg: RetryPolicyConfig | undefined, fallback: ResolvedPolicy): ResolvedPolicy {
  return {
    timeoutMs: cfg?.timeoutMs ?? fallback.timeoutMs,
    retries: cfg?.retries ?? fallback.retries,
    retryDelayMs: cfg?.retryDelayMs ?? fallback.retryDelayMs,
  };
}

type ScoredTicker =
  | { status: "scored"; result: AnalysisResult }
  | { status: "skipped"; reason: string }
  | { status: "failed"; reason: string };

function skipReason(err: unknown): string | null {
  if (err instanceof InsufficientHistoryError) {
    return "insufficient-history";
  }
  if (err instanceof NotFoundError) {
    return "not-found";
  }
  if (err instanceof RateLimitError) {
    return "rate-limit";
  }
  return null;
}

export function createDecisionPipeline(deps: DecisionPipelineDeps): DecisionPipeline {
  const log = deps.log ?? createSubsystemLogger("pipeline");
  const now = deps.now ?? (() => new Date());
  const options = deps.options ?? {};
  const pricePolicy = resolvePolicy(options.prices, PRICE_POLICY);
  const newsPolicy = resolvePolicy(options.news, NEWS_POLICY);
  const aiPolicy = resolvePolicy(options.ai, AI_POLICY);
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;

  const fetchHistory = (ticker: string, lookback: number): Promise<PriceBar[]> =>
    withRetry(
      () =>
        withTimeout(
          deps.prices.getHistory(ticker, lookback),
          pricePolicy.timeoutMs,
          () => new Error(`price history for ${ticker} timed out`),
        ),
      {
        retries: pricePolicy.retries,
        delayMs: pricePolicy.retryDelayMs,
        shouldRetry: isRetryableProviderError,
        sleep: deps.sleep,
        onRetry: (err, attempt, waitMs) =>
          log.debug("retrying price history", { ticker, attempt, waitMs, error: describeError(err) }),
      },
    );

  const fetchNews = (ticker: string): Promise<NewsItem[]> =>
    withRetry(
      () =>
        withTimeout(
          deps.news.getRecentNews(ticker),
          newsPolicy.timeoutMs,
          () => new Error(`news for ${ticker} timed out`),
        ),
      { retries: newsPolicy.retries, delayMs: newsPolicy.retryDelayMs, sleep: deps.sleep },
    );

  const requestRationale = (
    result: AnalysisResult,
    news: NewsItem[],
  ): Promise<RationaleReply> =>
    withRetry(
      () =>
        withTimeout(
          deps.ai.generateRationaleAndRisk({ ticker: result.ticker, result, news }),
          aiPolicy.timeoutMs,
          () => new AIServiceError(`rationale for ${result.ticker} timed out`),
        ),
      { retries: aiPolicy.retries, delayMs: aiPolicy.retryDelayMs, sleep: deps.sleep },
    );

  const scoreTicker = async (
    runId: string,
    ticker: string,
    params: ParameterSnapshot,
    lookback: number,
  ): Promise<ScoredTicker> => {
    try {
      const history = await fetchHistory(ticker, lookback);
      const indicators = computeIndicators(history, params);
      const score = scoreIndicators(indicators, params);
      return {
        status: "scored",
        result: {
          runId,
          ticker,
          ...indicators.values,
          signals: score.signals,
          buyScore: score.buyScore,
          shortScore: score.shortScore,
          gated: isGated(score, params),
        },
      };
    } catch (err) {
      const reason = skipReason(err);
      if (reason) {
        log.warn("ticker skipped", { ticker, reason, error: describeError(err) });
        return { status: "skipped", reason };
      }
      log.warn("ticker failed", { ticker, error: describeError(err) });
      return { status: "failed", reason: describeError(err) };
    }
  };

  /** Attaches rationale and risk in place; returns whether an operator mail went out. */
  const enrichGated = async (result: AnalysisResult): Promise<boolean> => {
    let news: NewsItem[];
    try {
      news = await fetchNews(result.ticker);
    } catch (err) {
      log.warn("news unavailable; result kept without rationale", {
        ticker: result.ticker,
        error: describeError(err),
      });
      return false;
    }
    result.newsCount = news.length;
    let reply: RationaleReply;
    try {
      reply = await requestRationale(result, news);
    } catch (err) {
      log.warn("rationale unavailable", { ticker: result.ticker, error: describeError(err) });
      return false;
    }
    result.rationale = reply.rationale;
    result.risk = reply.risk;
    if (reply.risk !== "none") {
      return false;
    }
    try {
      const delivery = await deps.mail.sendNotification({
        ticker: result.ticker,
        rationale: reply.rationale,
        risk: reply.risk,
        buyScore: result.buyScore,
        shortScore: result.shortScore,
        runId: result.runId,
      });
      if (!delivery.ok) {
        log.warn("notification not delivered", { ticker: result.ticker, reason: delivery.reason });
        return false;
      }
      return true;
    } catch (err) {
      log.warn("notification failed", { ticker: result.ticker, error: describeError(err) });
      return false;
    }
  };

  return {
    async run(params = {}) {
      const transitions: PipelineTransition[] = [];
      const enter = (state: PipelineState) => {
        transitions.push({ state, at: now().toISOString() });
        log.debug("state", { state });
      };

      const startedAt = now();
      const runId = `run-${crypto.randomUUID()}`;
      enter("STARTED");

      const snapshot = await deps.parameters.getCurrent(startedAt, {
        required: options.requiredParameters ?? PARAMETER_NAMES,
      });
      validateParameterSnapshot(snapshot);
      const parametersUsed: ParameterSnapshot = Object.freeze({ ...snapshot });
      const run: AnalysisRun = {
        runId,
        timestamp: startedAt.toISOString(),
        parametersUsed,
        universe: [...deps.universe],
      };
      enter("PARAMETERS_RESOLVED");

      const lookback = Math.max(
        options.lookbackBars ?? DEFAULT_LOOKBACK_BARS,
        requiredHistoryLength(parametersUsed),
      );
      log.info("scoring universe", { runId, tickers: run.universe.length, lookback });
      const scored = await mapWithConcurrency(run.universe, concurrency, (ticker) =>
        scoreTicker(runId, ticker, parametersUsed, lookback),
      );
      enter("SCORED");

      const results = scored.flatMap((entry) => (entry.status === "scored" ? [entry.result] : []));
      const gated = results.filter((result) => result.gated);
      const delivered = await mapWithConcurrency(gated, concurrency, enrichGated);
      const notifiedTickers = new Set(
        gated.filter((_, index) => delivered[index]).map((result) => result.ticker),
      );
      const outcomes = scored.map((entry, index): TickerOutcome => {
        const ticker = run.universe[index];
        if (entry.status !== "scored") {
          return { ticker, status: entry.status, reason: entry.reason };
        }
        return {
          ticker,
          status: "ok",
          gated: entry.result.gated,
          rationale: entry.result.rationale !== undefined,
          notified: notifiedTickers.has(ticker),
        };
      });
      enter("GATED");

      if (params.signal?.aborted) {
        log.warn("run aborted before commit", { runId });
        throw new Error(`analysis run ${runId} aborted`, { cause: params.signal.reason });
      }
      await deps.repository.commitRun(run, results);
      enter("PERSISTED");

      const counts: PipelineCounts = {
        universe: run.universe.length,
        scored: results.length,
        skipped: outcomes.filter((outcome) => outcome.status === "skipped").length,
        failed: outcomes.filter((outcome) => outcome.status === "failed").length,
        gated: gated.length,
        rationales: results.filter((result) => result.rationale !== undefined).length,
        notified: notifiedTickers.size,
      };
      enter("DONE");
      log.info("run complete", { runId, ...counts });
      return { run, results, outcomes, transitions, counts };
    },
  };
}
