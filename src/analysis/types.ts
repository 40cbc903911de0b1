import type { ParameterSnapshot } from "../tuning/types.js";

/** One daily OHLCV bar; histories are ordered oldest first. */
export type PriceBar = {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export type TrendDirection = "up" | "down" | "flat";

export type IndicatorValues = {
  price: number;
  rsi: number;
  deviationRate: number;
  smaTrend: TrendDirection;
  macdLine: number;
  macdSignal: number;
  dmiPlus: number;
  dmiMinus: number;
  adx: number;
  volume: number;
};

export type IndicatorSignals = {
  rsiOversold: boolean;
  rsiBuyReady: boolean;
  rsiOverbought: boolean;
  rsiSellReady: boolean;
  deviationBuy: boolean;
  deviationShort: boolean;
  trendUp: boolean;
  trendDown: boolean;
  macdBullish: boolean;
  dmiBullish: boolean;
  adxTrending: boolean;
};

export type IndicatorSnapshot = {
  values: IndicatorValues;
  signals: IndicatorSignals;
};

export type RsiSignal = "buy" | "buy-ready" | "neutral" | "sell-ready" | "sell";
export type DeviationSignal = "buy" | "neutral" | "sell";
export type MacdSignal = "bullish" | "bearish";
export type DmiSignal = "golden-cross" | "dead-cross";
export type AdxSignal = "strong-uptrend" | "strong-downtrend" | "trendless";

export type SignalFlags = IndicatorSignals & {
  rsi: RsiSignal;
  deviation: DeviationSignal;
  trend: TrendDirection;
  macd: MacdSignal;
  dmi: DmiSignal;
  adx: AdxSignal;
};

export type ScoreResult = {
  buyScore: number;
  shortScore: number;
  signals: SignalFlags;
};

export type RiskLevel = "none" | "low" | "medium" | "high";

export const RISK_LEVELS: readonly RiskLevel[] = ["none", "low", "medium", "high"];

export type AnalysisRun = {
  runId: string;
  timestamp: string;
  /** Frozen at parameter resolution; never changes afterwards. */
  parametersUsed: ParameterSnapshot;
  universe: string[];
};

export type AnalysisResult = IndicatorValues & {
  runId: string;
  ticker: string;
  signals: SignalFlags;
  buyScore: number;
  shortScore: number;
  gated: boolean;
  rationale?: string;
  risk?: RiskLevel;
  newsCount?: number;
};

export type TickerOutcome =
  | { ticker: string; status: "ok"; gated: boolean; rationale: boolean; notified: boolean }
  | { ticker: string; status: "skipped"; reason: string }
  | { ticker: string; status: "failed"; reason: string };

export type RunRecord = {
  run: AnalysisRun;
  results: AnalysisResult[];
};

export type MaturedResult = {
  run: AnalysisRun;
  result: AnalysisResult;
};

export type AnalysisRepository = {
  /** Persists the run and all of its results together, or nothing. */
  commitRun: (run: AnalysisRun, results: readonly AnalysisResult[]) => Promise<void>;
  getRun: (runId: string) => Promise<RunRecord | null>;
  /** Oldest first. */
  listRuns: () => Promise<RunRecord[]>;
  getLatestRun: () => Promise<RunRecord | null>;
  /** Results of runs whose timestamp is before `cutoff`, oldest run first. */
  listMaturedResults: (cutoff: Date) => Promise<MaturedResult[]>;
};
