import path from "node:path";
import { z } from "zod";
import type { DecisionEvaluation, EvaluationIndex } from "./types.js";
import { resolveStateDir } from "../config/paths.js";
import { ConfigurationError } from "../errors.js";
import { appendNdjsonLines, readJsonFile, withFileLock, writeJsonFileAtomic } from "../infra/json-file.js";
import { readNdjsonFile } from "../infra/ndjson.js";

export const EVALUATIONS_PATH = path.join("tuning", "evaluations.ndjson");
export const EVALUATIONS_INDEX_PATH = path.join("tuning", "evaluations.index.json");

const EvaluationIndexSchema = z.record(z.string());

const DecisionEvaluationSchema = z.object({
  evaluationId: z.string(),
  runId: z.string(),
  ticker: z.string(),
  decidedAt: z.string(),
  evaluatedAt: z.string(),
  side: z.enum(["buy", "short"]),
  recordedPrice: z.number(),
  currentPrice: z.number(),
  returnPct: z.number(),
  direction: z.enum(["up", "down", "flat"]),
  hit: z.boolean(),
  suggestions: z.array(
    z.object({
      name: z.string(),
      value: z.number(),
      status: z.enum(["applied", "superseded", "invalid", "duplicate"]),
      reason: z.string().optional(),
    }),
  ),
  provenance: z.object({ runId: z.string(), agent: z.string(), version: z.string() }),
});

export function buildEvaluationKey(runId: string, ticker: string): string {
  return `${runId}::${ticker}`;
}

export function isEvaluated(index: EvaluationIndex, runId: string, ticker: string): boolean {
  return Object.prototype.hasOwnProperty.call(index, buildEvaluationKey(runId, ticker));
}

/** Index value of a decision claimed by a loop that has not yet recorded its evaluation. */
export function buildPendingMarker(evaluationId: string): string {
  return `pending:${evaluationId}`;
}

export type EvaluationStore = {
  readIndex: () => Promise<EvaluationIndex>;
  /**
   * Marks the decision before any parameter is written for it.
   * Returns false when the decision is already marked, pending or recorded.
   */
  claimDecision: (runId: string, ticker: string, evaluationId: string) => Promise<boolean>;
  /** Appends the evaluation, then marks its decision; a marked decision is never re-evaluated. */
  recordEvaluation: (evaluation: DecisionEvaluation) => Promise<void>;
  loadEvaluations: () => Promise<DecisionEvaluation[]>;
};

export function createFileEvaluationStore(
  params: { stateDir?: string } = {},
): EvaluationStore {
  const stateDir = params.stateDir ?? resolveStateDir();
  const evaluationsPath = path.join(stateDir, EVALUATIONS_PATH);
  const indexPath = path.join(stateDir, EVALUATIONS_INDEX_PATH);

  const readIndex = async (): Promise<EvaluationIndex> => {
    const raw = await readJsonFile(indexPath);
    if (raw === null) {
      return {};
    }
    const parsed = EvaluationIndexSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`evaluation index ${indexPath} is corrupt`, { cause: parsed.error });
    }
    return parsed.data;
  };

  return {
    readIndex,

    async claimDecision(runId, ticker, evaluationId) {
      return await withFileLock(indexPath, {}, async () => {
        const index = await readIndex();
        const key = buildEvaluationKey(runId, ticker);
        if (Object.prototype.hasOwnProperty.call(index, key)) {
          return false;
        }
        await writeJsonFileAtomic(indexPath, { ...index, [key]: buildPendingMarker(evaluationId) });
        return true;
      });
    },

    async recordEvaluation(evaluation) {
      await withFileLock(indexPath, {}, async () => {
        const index = await readIndex();
        const key = buildEvaluationKey(evaluation.runId, evaluation.ticker);
        const existing = index[key];
        if (existing !== undefined && existing !== buildPendingMarker(evaluation.evaluationId)) {
          return;
        }
        await appendNdjsonLines(evaluationsPath, [evaluation]);
        await writeJsonFileAtomic(indexPath, { ...index, [key]: evaluation.evaluationId });
      });
    },

    async loadEvaluations() {
      const { entries } = await readNdjsonFile(evaluationsPath, DecisionEvaluationSchema);
      return entries;
    },
  };
}
