import type { AnalysisResult, PriceBar, RiskLevel } from "../analysis/types.js";
import type { ParameterSnapshot } from "../tuning/types.js";

export type PriceHistoryProvider = {
  /** At least `lookback` daily bars when available, oldest first. */
  getHistory: (ticker: string, lookback: number) => Promise<PriceBar[]>;
  getCurrentPrice: (ticker: string) => Promise<number>;
};

export type NewsItem = {
  title: string;
  url: string;
  publishedAt?: string;
  summary: string;
};

export type NewsProvider = {
  getRecentNews: (ticker: string) => Promise<NewsItem[]>;
};

export type RationaleRequest = {
  ticker: string;
  result: Pick<
    AnalysisResult,
    | "price"
    | "rsi"
    | "deviationRate"
    | "smaTrend"
    | "macdLine"
    | "macdSignal"
    | "dmiPlus"
    | "dmiMinus"
    | "adx"
    | "buyScore"
    | "shortScore"
    | "signals"
  >;
  news: NewsItem[];
};

export type RationaleReply = {
  rationale: string;
  risk: RiskLevel;
};

export type TuningSuggestion = {
  name: string;
  value: number;
  reason?: string;
};

export type TuningRequest = {
  decision: AnalysisResult;
  decidedAt: string;
  parametersUsed: ParameterSnapshot;
  outcome: {
    currentPrice: number;
    returnPct: number;
    direction: "up" | "down" | "flat";
  };
};

export type AiAdvisor = {
  generateRationaleAndRisk: (input: RationaleRequest) => Promise<RationaleReply>;
  suggestTuning: (input: TuningRequest) => Promise<TuningSuggestion[]>;
};

export type MailMessage = {
  ticker: string;
  rationale: string;
  risk: RiskLevel;
  buyScore: number;
  shortScore: number;
  runId: string;
};

export type DeliveryResult = { ok: true } | { ok: false; reason: string };

export type MailNotifier = {
  sendNotification: (message: MailMessage) => Promise<DeliveryResult>;
  /** Plain-text operator mail (run summaries). */
  sendText?: (subject: string, body: string) => Promise<DeliveryResult>;
};
