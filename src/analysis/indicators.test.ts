import { describe, expect, it } from "vitest";
import type { PriceBar } from "./types.js";
import { InsufficientHistoryError, MissingParameterError } from "../errors.js";
import { defaultParameterSnapshot } from "../tuning/registry.js";
import { computeIndicators, requiredHistoryLength } from "./indicators.js";

function risingHistory(count: number): PriceBar[] {
  return Array.from({ length: count }, (_, i) => ({
    date: `day-${i}`,
    open: 100 + i,
    high: 101 + i,
    low: 99 + i,
    close: 100 + i,
    volume: 1000 + i,
  }));
}

function flatHistory(count: number, close: number): PriceBar[] {
  return Array.from({ length: count }, (_, i) => ({
    date: `day-${i}`,
    open: close,
    high: close,
    low: close,
    close,
    volume: 500,
  }));
}

describe("computeIndicators", () => {
  const params = defaultParameterSnapshot();

  it("sizes the lookback from the longest indicator", () => {
    expect(requiredHistoryLength(params)).toBe(76);
    expect(requiredHistoryLength({ ...params, trend_sma_period: 20 })).toBe(34);
  });

  it("computes values and signals for a steady rise", () => {
    const { values, signals } = computeIndicators(risingHistory(100), params);
    expect(values.price).toBe(199);
    expect(values.volume).toBe(1099);
    expect(values.rsi).toBe(100);
    expect(values.deviationRate).toBeCloseTo(6.42, 2);
    expect(values.smaTrend).toBe("up");
    expect(values.macdLine).toBeGreaterThan(0);
    expect(values.dmiPlus).toBeGreaterThan(values.dmiMinus);
    expect(values.adx).toBeGreaterThan(25);

    expect(signals.rsiOverbought).toBe(true);
    expect(signals.rsiSellReady).toBe(false);
    expect(signals.rsiOversold).toBe(false);
    expect(signals.deviationShort).toBe(true);
    expect(signals.deviationBuy).toBe(false);
    expect(signals.trendUp).toBe(true);
    expect(signals.trendDown).toBe(false);
    expect(signals.dmiBullish).toBe(true);
    expect(signals.adxTrending).toBe(true);
  });

  it("scores a flat history instead of reporting it short", () => {
    const { values, signals } = computeIndicators(flatHistory(100, 50), params);
    expect(values).toEqual({
      price: 50,
      rsi: 100,
      deviationRate: 0,
      smaTrend: "flat",
      macdLine: 0,
      macdSignal: 0,
      dmiPlus: 0,
      dmiMinus: 0,
      adx: 0,
      volume: 500,
    });
    expect(signals.macdBullish).toBe(false);
    expect(signals.dmiBullish).toBe(false);
    expect(signals.adxTrending).toBe(false);
  });

  it("reads every threshold from the snapshot", () => {
    const { signals } = computeIndicators(risingHistory(100), {
      ...params,
      rsi_overbought_threshold: 100,
      deviation_short_threshold: 10,
    });
    expect(signals.rsiOverbought).toBe(false);
    expect(signals.rsiSellReady).toBe(true);
    expect(signals.deviationShort).toBe(false);
  });

  it("names the first indicator that lacks history", () => {
    const err = (() => {
      try {
        computeIndicators(risingHistory(20), params);
        return null;
      } catch (error) {
        return error;
      }
    })();
    expect(err).toBeInstanceOf(InsufficientHistoryError);
    if (err instanceof InsufficientHistoryError) {
      expect(err.indicator).toBe("deviation");
      expect(err.required).toBe(25);
      expect(err.available).toBe(20);
    }
  });

  it("needs period + 1 closes for RSI", () => {
    expect(() => computeIndicators(risingHistory(14), params)).toThrow("rsi needs 15 bars, got 14");
    expect(() => computeIndicators([], params)).toThrow(InsufficientHistoryError);
  });

  it("fails on a snapshot without a needed parameter", () => {
    const { dmi_period: _dropped, ...rest } = params;
    expect(() => computeIndicators(risingHistory(100), rest)).toThrow(MissingParameterError);
  });
});
