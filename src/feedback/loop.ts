import crypto from "node:crypto";
import type { RetryPolicyConfig } from "../config/types.providers.js";
import type { AnalysisRepository, MaturedResult } from "../analysis/types.js";
import type { AiAdvisor, PriceHistoryProvider, TuningSuggestion } from "../providers/types.js";
import type { ParameterStore } from "../tuning/types.js";
import type { DecisionEvaluation, DecisionOutcome, SuggestionOutcome } from "./types.js";
import type { EvaluationStore } from "./store.js";
import {
  AIServiceError,
  ConfigurationError,
  DuplicateVersionError,
  InvalidTuningValueError,
  describeError,
  isRetryableProviderError,
} from "../errors.js";
import { withRetry, withTimeout } from "../infra/retry.js";
import { toDateKey } from "../infra/utils.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/logger.js";
import { validateTuningChange } from "../tuning/registry.js";
import { VERSION } from "../version.js";
import {
  classifyDirection,
  computeReturnPct,
  isDirectionalHit,
  resolveDecisionSide,
  resolveMaturityCutoff,
} from "./metrics.js";
import { buildEvaluationKey, isEvaluated } from "./store.js";

export type FeedbackLoopOptions = {
  maturityDays?: number;
  maxDecisionsPerRun?: number;
  gatedDecisionsOnly?: boolean;
  holdEpsilonReturnPct?: number;
  prices?: RetryPolicyConfig;
  ai?: RetryPolicyConfig;
};

export type TuningFeedbackDeps = {
  parameters: ParameterStore;
  repository: AnalysisRepository;
  evaluations: EvaluationStore;
  prices: PriceHistoryProvider;
  ai: AiAdvisor;
  options?: FeedbackLoopOptions;
  now?: () => Date;
  log?: SubsystemLogger;
  sleep?: (ms: number) => Promise<unknown>;
};

export type FeedbackCounts = {
  matured: number;
  alreadyEvaluated: number;
  notGated: number;
  deferred: number;
  evaluated: number;
  failed: number;
  applied: number;
  superseded: number;
  invalid: number;
  duplicate: number;
};

export type FeedbackReport = {
  runId: string;
  today: string;
  evaluations: DecisionEvaluation[];
  outcomes: DecisionOutcome[];
  counts: FeedbackCounts;
};

export type TuningFeedbackLoop = {
  run: () => Promise<FeedbackReport>;
};

const DEFAULT_MATURITY_DAYS = 10;
const DEFAULT_MAX_DECISIONS = 50;
const DEFAULT_HOLD_EPSILON_PCT = 0.1;

export function createTuningFeedbackLoop(deps: TuningFeedbackDeps): TuningFeedbackLoop {
  const log = deps.log ?? createSubsystemLogger("feedback");
  const now = deps.now ?? (() => new Date());
  const options = deps.options ?? {};
  const maturityDays = options.maturityDays ?? DEFAULT_MATURITY_DAYS;
  const maxDecisions = options.maxDecisionsPerRun ?? DEFAULT_MAX_DECISIONS;
  const gatedOnly = options.gatedDecisionsOnly ?? true;
  const holdEpsilon = options.holdEpsilonReturnPct ?? DEFAULT_HOLD_EPSILON_PCT;

  const fetchCurrentPrice = (ticker: string): Promise<number> =>
    withRetry(
      () =>
        withTimeout(
          deps.prices.getCurrentPrice(ticker),
          options.prices?.timeoutMs ?? 15_000,
          () => new Error(`current price for ${ticker} timed out`),
        ),
      {
        retries: options.prices?.retries ?? 2,
        delayMs: options.prices?.retryDelayMs ?? 1_000,
        shouldRetry: isRetryableProviderError,
        sleep: deps.sleep,
      },
    );

  const requestSuggestions = (
    input: Parameters<AiAdvisor["suggestTuning"]>[0],
  ): Promise<TuningSuggestion[]> =>
    withRetry(
      () =>
        withTimeout(
          deps.ai.suggestTuning(input),
          options.ai?.timeoutMs ?? 60_000,
          () => new AIServiceError(`tuning suggestion for ${input.decision.ticker} timed out`),
        ),
      {
        retries: options.ai?.retries ?? 1,
        delayMs: options.ai?.retryDelayMs ?? 1_000,
        sleep: deps.sleep,
      },
    );

  const applySuggestions = async (params: {
    suggestions: TuningSuggestion[];
    today: string;
    writtenToday: Set<string>;
    source: string;
  }): Promise<SuggestionOutcome[]> => {
    const results: SuggestionOutcome[] = [];
    for (const suggestion of params.suggestions) {
      const { name, value } = suggestion;
      if (params.writtenToday.has(name)) {
        results.push({ name, value, status: "superseded" });
        continue;
      }
      try {
        const current = await deps.parameters.getCurrent(params.today);
        validateTuningChange(name, value, current);
        await deps.parameters.writeNewVersion({
          date: params.today,
          name,
          value,
          description: suggestion.reason
            ? `${params.source}: ${suggestion.reason}`
            : params.source,
        });
        params.writtenToday.add(name);
        results.push({ name, value, status: "applied" });
      } catch (err) {
        if (err instanceof InvalidTuningValueError) {
          results.push({ name, value, status: "invalid", reason: err.message });
        } else if (err instanceof DuplicateVersionError) {
          results.push({ name, value, status: "duplicate", reason: err.message });
        } else {
          throw err;
        }
      }
    }
    return results;
  };

  const evaluate = async (params: {
    entry: MaturedResult;
    loopRunId: string;
    evaluatedAt: Date;
    today: string;
    writtenToday: Set<string>;
    claimed: Set<string>;
  }): Promise<DecisionEvaluation | null> => {
    const { run, result } = params.entry;
    const evaluationId = crypto.randomUUID();
    const currentPrice = await fetchCurrentPrice(result.ticker);
    const returnPct = computeReturnPct(result.price, currentPrice);
    const direction = classifyDirection({ returnPct, holdEpsilonReturnPct: holdEpsilon });
    const side = resolveDecisionSide(result);
    const suggestions = await requestSuggestions({
      decision: result,
      decidedAt: run.timestamp,
      parametersUsed: run.parametersUsed,
      outcome: { currentPrice, returnPct, direction },
    });
    if (!(await deps.evaluations.claimDecision(run.runId, result.ticker, evaluationId))) {
      return null;
    }
    params.claimed.add(buildEvaluationKey(run.runId, result.ticker));
    const applied = await applySuggestions({
      suggestions,
      today: params.today,
      writtenToday: params.writtenToday,
      source: `feedback ${run.runId}/${result.ticker}`,
    });
    return {
      evaluationId,
      runId: run.runId,
      ticker: result.ticker,
      decidedAt: run.timestamp,
      evaluatedAt: params.evaluatedAt.toISOString(),
      side,
      recordedPrice: result.price,
      currentPrice,
      returnPct,
      direction,
      hit: isDirectionalHit({ side, returnPct }),
      suggestions: applied,
      provenance: { runId: params.loopRunId, agent: "tuning_feedback", version: VERSION },
    };
  };

  return {
    async run() {
      const startedAt = now();
      const loopRunId = `tuning-feedback-${crypto.randomUUID()}`;
      const today = toDateKey(startedAt);
      const counts: FeedbackCounts = {
        matured: 0,
        alreadyEvaluated: 0,
        notGated: 0,
        deferred: 0,
        evaluated: 0,
        failed: 0,
        applied: 0,
        superseded: 0,
        invalid: 0,
        duplicate: 0,
      };

      const matured = await deps.repository.listMaturedResults(
        resolveMaturityCutoff(startedAt, maturityDays),
      );
      const index = await deps.evaluations.readIndex();
      counts.matured = matured.length;
      const pending = matured.filter((entry) => {
        if (isEvaluated(index, entry.run.runId, entry.result.ticker)) {
          counts.alreadyEvaluated += 1;
          return false;
        }
        if (gatedOnly && !entry.result.gated) {
          counts.notGated += 1;
          return false;
        }
        return true;
      });
      const batch = pending.slice(0, Math.max(0, maxDecisions));
      counts.deferred = pending.length - batch.length;
      log.info("re-evaluating decisions", { runId: loopRunId, pending: pending.length, batch: batch.length });

      const writtenToday = new Set<string>();
      const claimed = new Set<string>();
      const evaluations: DecisionEvaluation[] = [];
      const outcomes: DecisionOutcome[] = [];
      for (const entry of batch) {
        const key = buildEvaluationKey(entry.run.runId, entry.result.ticker);
        try {
          const evaluation = await evaluate({
            entry,
            loopRunId,
            evaluatedAt: now(),
            today,
            writtenToday,
            claimed,
          });
          if (!evaluation) {
            counts.alreadyEvaluated += 1;
            log.info("decision claimed by another run", { key });
            continue;
          }
          await deps.evaluations.recordEvaluation(evaluation);
          evaluations.push(evaluation);
          let applied = 0;
          for (const suggestion of evaluation.suggestions) {
            counts[suggestion.status] += 1;
            if (suggestion.status === "applied") {
              applied += 1;
            }
          }
          counts.evaluated += 1;
          outcomes.push({
            key,
            status: "evaluated",
            applied,
            rejected: evaluation.suggestions.length - applied,
          });
        } catch (err) {
          if (err instanceof ConfigurationError) {
            throw err;
          }
          counts.failed += 1;
          log.warn(
            claimed.has(key)
              ? "decision claimed but not recorded; it will not be retried"
              : "decision not evaluated; will retry next run",
            { key, error: describeError(err) },
          );
          outcomes.push({ key, status: "failed", reason: describeError(err) });
        }
      }

      log.info("feedback run complete", { runId: loopRunId, ...counts });
      return { runId: loopRunId, today, evaluations, outcomes, counts };
    },
  };
}
