import technicalindicators from "technicalindicators";
import type { ParameterSnapshot } from "../tuning/types.js";
import type { IndicatorSignals, IndicatorSnapshot, IndicatorValues, PriceBar, TrendDirection } from "./types.js";
import { InsufficientHistoryError } from "../errors.js";
import { round } from "../infra/utils.js";
import { requireParameter } from "../tuning/registry.js";

const { ADX, MACD, RSI, SMA } = technicalindicators;

type IndicatorPeriods = {
  rsi: number;
  deviation: number;
  trend: number;
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  dmi: number;
};

function resolvePeriods(params: ParameterSnapshot): IndicatorPeriods {
  return {
    rsi: requireParameter(params, "rsi_period"),
    deviation: requireParameter(params, "deviation_period"),
    trend: requireParameter(params, "trend_sma_period"),
    macdFast: requireParameter(params, "macd_fast_period"),
    macdSlow: requireParameter(params, "macd_slow_period"),
    macdSignal: requireParameter(params, "macd_signal_period"),
    dmi: requireParameter(params, "dmi_period"),
  };
}

function minimumBars(periods: IndicatorPeriods): Record<string, number> {
  return {
    rsi: periods.rsi + 1,
    deviation: periods.deviation,
    // Slope needs the average on the last two bars.
    trend: periods.trend + 1,
    macd: periods.macdSlow + periods.macdSignal - 1,
    // Wilder smoothing of DX starts after one full period of DI values.
    adx: periods.dmi * 2 + 1,
  };
}

/** Smallest history that lets every indicator produce a value. */
export function requiredHistoryLength(params: ParameterSnapshot): number {
  return Math.max(...Object.values(minimumBars(resolvePeriods(params))));
}

function last<T>(values: readonly T[]): T | undefined {
  return values[values.length - 1];
}

function ensureHistory(indicator: string, required: number, available: number): void {
  if (available < required) {
    throw new InsufficientHistoryError({ indicator, required, available });
  }
}

function computeRsi(closes: number[], period: number): number {
  ensureHistory("rsi", period + 1, closes.length);
  const value = last(RSI.calculate({ values: closes, period }));
  if (value === undefined) {
    throw new InsufficientHistoryError({ indicator: "rsi", required: period + 1, available: closes.length });
  }
  return value;
}

function computeDeviationRate(closes: number[], period: number): number {
  ensureHistory("deviation", period, closes.length);
  const sma = last(SMA.calculate({ values: closes, period }));
  const close = last(closes);
  if (sma === undefined || close === undefined || sma === 0) {
    throw new InsufficientHistoryError({ indicator: "deviation", required: period, available: closes.length });
  }
  return ((close - sma) / sma) * 100;
}

function computeTrend(closes: number[], period: number): TrendDirection {
  ensureHistory("trend", period + 1, closes.length);
  const averages = SMA.calculate({ values: closes, period });
  const current = averages[averages.length - 1];
  const previous = averages[averages.length - 2];
  if (current === undefined || previous === undefined) {
    throw new InsufficientHistoryError({ indicator: "trend", required: period + 1, available: closes.length });
  }
  if (current > previous) {
    return "up";
  }
  return current < previous ? "down" : "flat";
}

function computeMacd(closes: number[], periods: IndicatorPeriods): { line: number; signal: number } {
  const required = periods.macdSlow + periods.macdSignal - 1;
  ensureHistory("macd", required, closes.length);
  const latest = last(
    MACD.calculate({
      values: closes,
      fastPeriod: periods.macdFast,
      slowPeriod: periods.macdSlow,
      signalPeriod: periods.macdSignal,
      SimpleMAOscillator: false,
      SimpleMASignal: false,
    }),
  );
  if (latest?.MACD === undefined) {
    throw new InsufficientHistoryError({ indicator: "macd", required, available: closes.length });
  }
  // The library drops a signal of exactly 0; the histogram still carries it.
  const signal =
    latest.signal ?? (latest.histogram === undefined ? undefined : latest.MACD - latest.histogram);
  if (signal === undefined) {
    throw new InsufficientHistoryError({ indicator: "macd", required, available: closes.length });
  }
  return { line: latest.MACD, signal };
}

function computeDmi(
  history: readonly PriceBar[],
  period: number,
): { plus: number; minus: number; adx: number } {
  const required = period * 2 + 1;
  ensureHistory("adx", required, history.length);
  const latest = last(
    ADX.calculate({
      high: history.map((bar) => bar.high),
      low: history.map((bar) => bar.low),
      close: history.map((bar) => bar.close),
      period,
    }),
  );
  if (!latest) {
    throw new InsufficientHistoryError({ indicator: "adx", required, available: history.length });
  }
  // A range-less or movement-less window divides by zero; it has no direction.
  const directional = (value: number): number => (Number.isFinite(value) ? value : 0);
  return { plus: directional(latest.pdi), minus: directional(latest.mdi), adx: directional(latest.adx) };
}

export function deriveSignals(values: IndicatorValues, params: ParameterSnapshot): IndicatorSignals {
  const oversold = requireParameter(params, "rsi_oversold_threshold");
  const buyReady = requireParameter(params, "rsi_buy_ready_threshold");
  const sellReady = requireParameter(params, "rsi_sell_ready_threshold");
  const overbought = requireParameter(params, "rsi_overbought_threshold");
  return {
    rsiOversold: values.rsi < oversold,
    rsiBuyReady: values.rsi >= oversold && values.rsi < buyReady,
    rsiOverbought: values.rsi > overbought,
    rsiSellReady: values.rsi >= sellReady && values.rsi <= overbought,
    deviationBuy: values.deviationRate <= requireParameter(params, "deviation_buy_threshold"),
    deviationShort: values.deviationRate >= requireParameter(params, "deviation_short_threshold"),
    trendUp: values.smaTrend === "up",
    trendDown: values.smaTrend === "down",
    macdBullish: values.macdLine > values.macdSignal,
    dmiBullish: values.dmiPlus > values.dmiMinus,
    adxTrending: values.adx > requireParameter(params, "adx_trend_threshold"),
  };
}

/**
 * Computes every indicator for the latest bar of `history`.
 * Stored values are rounded to 2 places and signals are derived from the stored values,
 * so a persisted result can be re-explained from its own fields.
 */
export function computeIndicators(
  history: readonly PriceBar[],
  params: ParameterSnapshot,
): IndicatorSnapshot {
  const periods = resolvePeriods(params);
  const latestBar = last(history);
  if (!latestBar) {
    throw new InsufficientHistoryError({ indicator: "price", required: 1, available: 0 });
  }
  const closes = history.map((bar) => bar.close);
  const rsi = computeRsi(closes, periods.rsi);
  const deviationRate = computeDeviationRate(closes, periods.deviation);
  const smaTrend = computeTrend(closes, periods.trend);
  const macd = computeMacd(closes, periods);
  const dmi = computeDmi(history, periods.dmi);
  const values: IndicatorValues = {
    price: latestBar.close,
    rsi: round(rsi, 2),
    deviationRate: round(deviationRate, 2),
    smaTrend,
    macdLine: round(macd.line, 2),
    macdSignal: round(macd.signal, 2),
    dmiPlus: round(dmi.plus, 2),
    dmiMinus: round(dmi.minus, 2),
    adx: round(dmi.adx, 2),
    volume: latestBar.volume,
  };
  return { values, signals: deriveSignals(values, params) };
}
