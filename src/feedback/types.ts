export type OutcomeDirection = "up" | "down" | "flat";

export type DecisionSide = "buy" | "short";

export type SuggestionStatus = "applied" | "superseded" | "invalid" | "duplicate";

export type SuggestionOutcome = {
  name: string;
  value: number;
  status: SuggestionStatus;
  reason?: string;
};

export type DecisionEvaluation = {
  evaluationId: string;
  runId: string;
  ticker: string;
  decidedAt: string;
  evaluatedAt: string;
  side: DecisionSide;
  recordedPrice: number;
  currentPrice: number;
  returnPct: number;
  direction: OutcomeDirection;
  hit: boolean;
  suggestions: SuggestionOutcome[];
  provenance: { runId: string; agent: string; version: string };
};

export type EvaluationIndex = Record<string, string>;

export type DecisionOutcome =
  | { key: string; status: "evaluated"; applied: number; rejected: number }
  | { key: string; status: "failed"; reason: string };
