export { runScheduledAnalysis, triggerReEvaluation, createDefaultDependencies } from "./jobs.js";
export type { JobDependencies, JobOptions, JobResult } from "./jobs.js";

export { createDecisionPipeline } from "./analysis/pipeline.js";
export type {
  DecisionPipeline,
  DecisionPipelineDeps,
  PipelineCounts,
  PipelineReport,
  PipelineState,
} from "./analysis/pipeline.js";
export { computeIndicators, deriveSignals, requiredHistoryLength } from "./analysis/indicators.js";
export { isGated, scoreIndicators } from "./analysis/scoring.js";
export { createFileAnalysisRepository } from "./analysis/store.js";
export { getTopSummary, searchResults } from "./analysis/queries.js";
export { loadUniverse, parseUniverseCsv } from "./analysis/universe.js";
export type * from "./analysis/types.js";

export { createTuningFeedbackLoop } from "./feedback/loop.js";
export type { FeedbackCounts, FeedbackReport, TuningFeedbackLoop } from "./feedback/loop.js";
export { createFileEvaluationStore } from "./feedback/store.js";
export type { EvaluationStore } from "./feedback/store.js";
export type * from "./feedback/types.js";

export { createFileParameterStore } from "./tuning/store.js";
export { seedDefaultParameters } from "./tuning/seed.js";
export {
  PARAMETER_DEFINITIONS,
  PARAMETER_NAMES,
  defaultParameterSnapshot,
  validateTuningChange,
  validateTuningValue,
} from "./tuning/registry.js";
export type * from "./tuning/types.js";

export type * from "./providers/types.js";
export { createYahooPriceProvider } from "./providers/prices/yahoo.js";
export { createGoogleNewsProvider } from "./providers/news/google-news.js";
export { createOpenAiAdvisor } from "./providers/ai/openai.js";
export { createSmtpMailNotifier } from "./providers/mail/smtp.js";

export { loadConfig, parseConfig } from "./config/config.js";
export type { ScoreloopConfig } from "./config/config.js";
export * from "./errors.js";
