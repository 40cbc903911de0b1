import type { ParameterSnapshot } from "../tuning/types.js";
import type {
  AdxSignal,
  DeviationSignal,
  IndicatorSnapshot,
  RsiSignal,
  ScoreResult,
  SignalFlags,
} from "./types.js";
import { requireParameter } from "../tuning/registry.js";

function weightOf(params: ParameterSnapshot, name: string): number {
  return Math.round(requireParameter(params, name));
}

function classifyRsi(signals: IndicatorSnapshot["signals"]): RsiSignal {
  if (signals.rsiOversold) {
    return "buy";
  }
  if (signals.rsiBuyReady) {
    return "buy-ready";
  }
  if (signals.rsiOverbought) {
    return "sell";
  }
  return signals.rsiSellReady ? "sell-ready" : "neutral";
}

function classifyDeviation(signals: IndicatorSnapshot["signals"]): DeviationSignal {
  if (signals.deviationBuy) {
    return "buy";
  }
  return signals.deviationShort ? "sell" : "neutral";
}

function classifyAdx(signals: IndicatorSnapshot["signals"]): AdxSignal {
  if (!signals.adxTrending) {
    return "trendless";
  }
  return signals.dmiBullish ? "strong-uptrend" : "strong-downtrend";
}

/**
 * Adds each signal's weight to the side it favours. Pure: the same indicators and
 * snapshot always give the same scores.
 */
export function scoreIndicators(
  indicators: IndicatorSnapshot,
  params: ParameterSnapshot,
): ScoreResult {
  const { signals: base, values } = indicators;
  const signals: SignalFlags = {
    ...base,
    rsi: classifyRsi(base),
    deviation: classifyDeviation(base),
    trend: values.smaTrend,
    macd: base.macdBullish ? "bullish" : "bearish",
    dmi: base.dmiBullish ? "golden-cross" : "dead-cross",
    adx: classifyAdx(base),
  };

  let buyScore = 0;
  let shortScore = 0;

  switch (signals.rsi) {
    case "buy":
      buyScore += weightOf(params, "rsi_buy_weight");
      break;
    case "buy-ready":
      buyScore += weightOf(params, "rsi_buy_ready_weight");
      break;
    case "sell":
      shortScore += weightOf(params, "rsi_short_weight");
      break;
    case "sell-ready":
      shortScore += weightOf(params, "rsi_sell_ready_weight");
      break;
    case "neutral":
      break;
  }

  if (signals.deviation === "buy") {
    buyScore += weightOf(params, "deviation_buy_weight");
  } else if (signals.deviation === "sell") {
    shortScore += weightOf(params, "deviation_short_weight");
  }

  if (signals.trend === "up") {
    buyScore += weightOf(params, "trend_weight");
  } else if (signals.trend === "down") {
    shortScore += weightOf(params, "trend_weight");
  }

  const macdWeight = weightOf(params, "macd_weight");
  if (signals.macd === "bullish") {
    buyScore += macdWeight;
  } else {
    shortScore += macdWeight;
  }

  const dmiWeight = weightOf(params, "dmi_weight");
  if (signals.dmi === "golden-cross") {
    buyScore += dmiWeight;
  } else {
    shortScore += dmiWeight;
  }

  if (signals.adx === "strong-uptrend") {
    buyScore += weightOf(params, "adx_trend_weight");
  } else if (signals.adx === "strong-downtrend") {
    shortScore += weightOf(params, "adx_trend_weight");
  }

  return { buyScore, shortScore, signals };
}

export function isGated(
  score: Pick<ScoreResult, "buyScore" | "shortScore">,
  params: ParameterSnapshot,
): boolean {
  return Math.max(score.buyScore, score.shortScore) >= requireParameter(params, "score_threshold");
}
