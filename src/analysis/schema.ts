import { z } from "zod";

const TrendSchema = z.enum(["up", "down", "flat"]);

export const SignalFlagsSchema = z.object({
  rsiOversold: z.boolean(),
  rsiBuyReady: z.boolean(),
  rsiOverbought: z.boolean(),
  rsiSellReady: z.boolean(),
  deviationBuy: z.boolean(),
  deviationShort: z.boolean(),
  trendUp: z.boolean(),
  trendDown: z.boolean(),
  macdBullish: z.boolean(),
  dmiBullish: z.boolean(),
  adxTrending: z.boolean(),
  rsi: z.enum(["buy", "buy-ready", "neutral", "sell-ready", "sell"]),
  deviation: z.enum(["buy", "neutral", "sell"]),
  trend: TrendSchema,
  macd: z.enum(["bullish", "bearish"]),
  dmi: z.enum(["golden-cross", "dead-cross"]),
  adx: z.enum(["strong-uptrend", "strong-downtrend", "trendless"]),
});

export const RiskLevelSchema = z.enum(["none", "low", "medium", "high"]);

export const AnalysisResultSchema = z.object({
  runId: z.string().min(1),
  ticker: z.string().min(1),
  price: z.number(),
  rsi: z.number(),
  deviationRate: z.number(),
  smaTrend: TrendSchema,
  macdLine: z.number(),
  macdSignal: z.number(),
  dmiPlus: z.number(),
  dmiMinus: z.number(),
  adx: z.number(),
  volume: z.number(),
  signals: SignalFlagsSchema,
  buyScore: z.number().int(),
  shortScore: z.number().int(),
  gated: z.boolean(),
  rationale: z.string().optional(),
  risk: RiskLevelSchema.optional(),
  newsCount: z.number().int().nonnegative().optional(),
});

export const AnalysisRunSchema = z.object({
  runId: z.string().min(1),
  timestamp: z.string().datetime(),
  parametersUsed: z.record(z.number()),
  universe: z.array(z.string()),
});

export const RunDocumentSchema = z.object({
  version: z.literal(1),
  run: AnalysisRunSchema,
  results: z.array(AnalysisResultSchema),
});
