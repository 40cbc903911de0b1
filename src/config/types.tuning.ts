export type TuningConfig = {
  enabled?: boolean;
  /** Minimum age of a run before its decisions are re-evaluated. */
  maturityDays?: number;
  maxDecisionsPerRun?: number;
  /** Parameter names that must resolve; defaults to every registered name. */
  requiredParameters?: string[];
  /** Only re-evaluate results that passed their run's score threshold. */
  gatedDecisionsOnly?: boolean;
};
