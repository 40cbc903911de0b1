import type { AnalysisResult, AnalysisRun, SignalFlags } from "./types.js";
import { defaultParameterSnapshot } from "../tuning/registry.js";

const NEUTRAL_SIGNALS: SignalFlags = {
  rsiOversold: false,
  rsiBuyReady: false,
  rsiOverbought: false,
  rsiSellReady: false,
  deviationBuy: false,
  deviationShort: false,
  trendUp: false,
  trendDown: false,
  macdBullish: false,
  dmiBullish: false,
  adxTrending: false,
  rsi: "neutral",
  deviation: "neutral",
  trend: "flat",
  macd: "bearish",
  dmi: "dead-cross",
  adx: "trendless",
};

export function makeRun(overrides: Partial<AnalysisRun> & { runId: string }): AnalysisRun {
  return {
    timestamp: "2026-03-01T06:00:00.000Z",
    parametersUsed: defaultParameterSnapshot(),
    universe: [],
    ...overrides,
  };
}

export function makeResult(
  overrides: Partial<AnalysisResult> & { runId: string; ticker: string },
): AnalysisResult {
  return {
    price: 100,
    rsi: 50,
    deviationRate: 0,
    smaTrend: "flat",
    macdLine: 0,
    macdSignal: 0,
    dmiPlus: 20,
    dmiMinus: 20,
    adx: 15,
    volume: 1000,
    signals: NEUTRAL_SIGNALS,
    buyScore: 0,
    shortScore: 0,
    gated: false,
    ...overrides,
  };
}
