import type { DecisionSide, OutcomeDirection } from "./types.js";
import { addDays, round } from "../infra/utils.js";

export function computeReturnPct(entry: number, exit: number): number {
  if (!Number.isFinite(entry) || entry <= 0) {
    return 0;
  }
  return round(((exit - entry) / entry) * 100, 4);
}

export function classifyDirection(params: {
  returnPct: number;
  holdEpsilonReturnPct: number;
}): OutcomeDirection {
  const epsilon = Math.max(0, params.holdEpsilonReturnPct);
  if (Math.abs(params.returnPct) < epsilon) {
    return "flat";
  }
  return params.returnPct > 0 ? "up" : "down";
}

/** Buy wins ties, matching how a result is presented in the summary. */
export function resolveDecisionSide(score: { buyScore: number; shortScore: number }): DecisionSide {
  return score.buyScore >= score.shortScore ? "buy" : "short";
}

export function isDirectionalHit(params: { side: DecisionSide; returnPct: number }): boolean {
  return params.side === "buy" ? params.returnPct > 0 : params.returnPct < 0;
}

export function resolveMaturityCutoff(now: Date, maturityDays: number): Date {
  return addDays(now, -Math.max(0, maturityDays));
}
