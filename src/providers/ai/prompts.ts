import type { RationaleRequest, TuningRequest } from "../types.js";
import { PARAMETER_DEFINITIONS } from "../../tuning/registry.js";

export const RATIONALE_SYSTEM_PROMPT = [
  "You are an equity analyst reviewing a technical screening result.",
  "Weigh the indicator scores against the recent headlines.",
  'Reply with JSON only: {"rationale": string, "risk": "none" | "low" | "medium" | "high"}.',
  'Use "none" only when the headlines contain nothing that contradicts the technical setup.',
].join(" ");

export const TUNING_SYSTEM_PROMPT = [
  "You tune the thresholds and weights of a technical stock screener.",
  "You receive one past decision, the parameters it was scored with and how the price moved since.",
  "Suggest only changes that would have improved this decision and stay inside the allowed ranges.",
  'Reply with JSON only: {"suggestions": [{"name": string, "value": number, "reason": string}]}.',
  "An empty list is a valid answer.",
].join(" ");

function formatNews(news: RationaleRequest["news"]): string {
  if (news.length === 0) {
    return "(no recent headlines)";
  }
  return news
    .map((item, i) => {
      const date = item.publishedAt ? ` [${item.publishedAt.slice(0, 10)}]` : "";
      const summary = item.summary && item.summary !== item.title ? `\n   ${item.summary}` : "";
      return `${i + 1}. ${item.title}${date}${summary}`;
    })
    .join("\n");
}

export function buildRationalePrompt(input: RationaleRequest): string {
  const { result } = input;
  return [
    `Ticker: ${input.ticker}`,
    `Price: ${result.price}`,
    `Buy score: ${result.buyScore}  Short score: ${result.shortScore}`,
    `RSI: ${result.rsi} (${result.signals.rsi})`,
    `Deviation from moving average: ${result.deviationRate}% (${result.signals.deviation})`,
    `Moving-average trend: ${result.smaTrend}`,
    `MACD: ${result.macdLine} vs signal ${result.macdSignal} (${result.signals.macd})`,
    `DMI: +DI ${result.dmiPlus} / -DI ${result.dmiMinus} (${result.signals.dmi}), ADX ${result.adx} (${result.signals.adx})`,
    "",
    "Recent headlines:",
    formatNews(input.news),
  ].join("\n");
}

export function buildTuningPrompt(input: TuningRequest): string {
  const { decision, outcome } = input;
  const ranges = PARAMETER_DEFINITIONS.map((definition) => {
    const used = input.parametersUsed[definition.name];
    const kind = definition.integer ? "integer" : "number";
    return `- ${definition.name} = ${used ?? "unset"} (${kind} in [${definition.min}, ${definition.max}]): ${definition.description}`;
  });
  return [
    `Ticker: ${decision.ticker}, decided at ${input.decidedAt}`,
    `Buy score ${decision.buyScore}, short score ${decision.shortScore}, gated: ${decision.gated}`,
    `Signals: ${JSON.stringify(decision.signals)}`,
    `Recorded price ${decision.price}, current price ${outcome.currentPrice}`,
    `Realized return ${outcome.returnPct}% (${outcome.direction})`,
    "",
    "Parameters used:",
    ...ranges,
  ].join("\n");
}
