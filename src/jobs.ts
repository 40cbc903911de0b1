import crypto from "node:crypto";
import type { ScoreloopConfig } from "./config/config.js";
import type { AnalysisRepository } from "./analysis/types.js";
import type { PipelineReport } from "./analysis/pipeline.js";
import type { EvaluationStore } from "./feedback/store.js";
import type { FeedbackReport } from "./feedback/loop.js";
import type {
  AiAdvisor,
  MailNotifier,
  NewsProvider,
  PriceHistoryProvider,
} from "./providers/types.js";
import type { ParameterStore } from "./tuning/types.js";
import { createDecisionPipeline } from "./analysis/pipeline.js";
import { createFileAnalysisRepository, resolveRunsDir } from "./analysis/store.js";
import { loadUniverse } from "./analysis/universe.js";
import { loadConfig } from "./config/config.js";
import { resolveStateDir } from "./config/paths.js";
import { describeError } from "./errors.js";
import { createTuningFeedbackLoop } from "./feedback/loop.js";
import { createFileEvaluationStore } from "./feedback/store.js";
import { createSubsystemLogger, setLogLevel, type SubsystemLogger } from "./logging/logger.js";
import { appendRunRecord, buildRunRecord, formatCounts, notifyOperators } from "./ops/notify.js";
import { createOpenAiAdvisor } from "./providers/ai/openai.js";
import { createSmtpMailNotifier } from "./providers/mail/smtp.js";
import { createGoogleNewsProvider } from "./providers/news/google-news.js";
import { createYahooPriceProvider } from "./providers/prices/yahoo.js";
import { createFileParameterStore, resolveParameterStorePath } from "./tuning/store.js";

export type JobDependencies = {
  parameters: ParameterStore;
  repository: AnalysisRepository;
  evaluations: EvaluationStore;
  prices: PriceHistoryProvider;
  news: NewsProvider;
  ai: AiAdvisor;
  mail: MailNotifier;
};

export type JobOptions = {
  /** Skips reading the config file. */
  config?: ScoreloopConfig;
  env?: NodeJS.ProcessEnv;
  /** Replaces individual default collaborators. */
  deps?: Partial<JobDependencies>;
  /** Replaces the configured universe (analysis only). */
  universe?: readonly string[];
  now?: () => Date;
  sleep?: (ms: number) => Promise<unknown>;
  log?: SubsystemLogger;
  signal?: AbortSignal;
};

export type JobResult<T> = { status: "ok"; report: T } | { status: "skipped"; reason: string };

export function createDefaultDependencies(
  cfg: ScoreloopConfig,
  env: NodeJS.ProcessEnv = process.env,
  now?: () => Date,
): JobDependencies {
  const stateDir = resolveStateDir(env);
  const providers = cfg.providers ?? {};
  return {
    parameters: createFileParameterStore({ filePath: resolveParameterStorePath(env), now }),
    repository: createFileAnalysisRepository({ dir: resolveRunsDir(env) }),
    evaluations: createFileEvaluationStore({ stateDir }),
    prices: createYahooPriceProvider(providers.prices ?? {}, { now }),
    news: createGoogleNewsProvider(providers.news ?? {}),
    ai: createOpenAiAdvisor(providers.ai ?? {}, { env }),
    mail: createSmtpMailNotifier(providers.mail ?? {}, { env }),
  };
}

type JobContext = {
  job: string;
  cfg: ScoreloopConfig;
  env: NodeJS.ProcessEnv;
  deps: JobDependencies;
  now: () => Date;
  log: SubsystemLogger;
  startedAt: string;
};

function prepareJob(job: string, options: JobOptions): JobContext {
  const env = options.env ?? process.env;
  const cfg = options.config ?? loadConfig(env);
  if (cfg.logging?.level) {
    setLogLevel(cfg.logging.level);
  }
  const now = options.now ?? (() => new Date());
  const defaults = createDefaultDependencies(cfg, env, options.now);
  return {
    job,
    cfg,
    env,
    deps: { ...defaults, ...options.deps },
    now,
    log: options.log ?? createSubsystemLogger(job),
    startedAt: now().toISOString(),
  };
}

async function skipJob<T>(ctx: JobContext, reason: string): Promise<JobResult<T>> {
  ctx.log.info("job skipped", { reason });
  await appendRunRecord(
    buildRunRecord({
      runId: `${ctx.job}-${crypto.randomUUID()}`,
      job: ctx.job,
      status: "skipped",
      startedAt: ctx.startedAt,
      finishedAt: ctx.now().toISOString(),
    }),
    ctx.env,
  );
  return { status: "skipped", reason };
}

async function executeJob<T>(
  ctx: JobContext,
  body: () => Promise<T>,
  describe: (report: T) => { runId: string; counts: Record<string, number> },
): Promise<JobResult<T>> {
  const summaryEnabled = ctx.cfg.notifications?.runSummary === true;
  let report: T;
  try {
    report = await body();
  } catch (err) {
    const runId = `${ctx.job}-${crypto.randomUUID()}`;
    ctx.log.error("job failed", { runId, error: describeError(err) });
    try {
      await appendRunRecord(
        buildRunRecord({
          runId,
          job: ctx.job,
          status: "failed",
          startedAt: ctx.startedAt,
          finishedAt: ctx.now().toISOString(),
          error: describeError(err),
        }),
        ctx.env,
      );
    } catch (recordErr) {
      ctx.log.warn("run record not written", { runId, error: describeError(recordErr) });
    }
    if (summaryEnabled) {
      await notifyOperators(ctx.deps.mail, `${ctx.job} failed`, describeError(err), ctx.log);
    }
    throw err;
  }
  const { runId, counts } = describe(report);
  await appendRunRecord(
    buildRunRecord({
      runId,
      job: ctx.job,
      status: "ok",
      startedAt: ctx.startedAt,
      finishedAt: ctx.now().toISOString(),
      counts,
    }),
    ctx.env,
  );
  if (summaryEnabled) {
    await notifyOperators(
      ctx.deps.mail,
      `${ctx.job} ${runId} finished`,
      `${formatCounts(counts)}\n\nRun: ${runId}`,
      ctx.log,
    );
  }
  return { status: "ok", report };
}

/** Scores the configured universe once and persists the run. */
export async function runScheduledAnalysis(
  options: JobOptions = {},
): Promise<JobResult<PipelineReport>> {
  const ctx = prepareJob("analysis", options);
  const analysisCfg = ctx.cfg.analysis;
  if (analysisCfg?.enabled === false) {
    return await skipJob(ctx, "analysis disabled");
  }
  const providers = ctx.cfg.providers ?? {};
  return await executeJob(
    ctx,
    async () => {
      const universe =
        options.universe ?? (await loadUniverse(analysisCfg, resolveStateDir(ctx.env)));
      const pipeline = createDecisionPipeline({
        parameters: ctx.deps.parameters,
        repository: ctx.deps.repository,
        prices: ctx.deps.prices,
        news: ctx.deps.news,
        ai: ctx.deps.ai,
        mail: ctx.deps.mail,
        universe,
        options: {
          concurrency: analysisCfg?.concurrency,
          lookbackBars: analysisCfg?.lookbackBars,
          requiredParameters: ctx.cfg.tuning?.requiredParameters,
          prices: providers.prices,
          news: providers.news,
          ai: providers.ai,
        },
        now: ctx.now,
        log: ctx.log.child("pipeline"),
        sleep: options.sleep,
      });
      return await pipeline.run({ signal: options.signal });
    },
    (report) => ({ runId: report.run.runId, counts: report.counts }),
  );
}

/** Re-evaluates matured decisions and writes any accepted parameter changes for today. */
export async function triggerReEvaluation(
  options: JobOptions = {},
): Promise<JobResult<FeedbackReport>> {
  const ctx = prepareJob("tuning-feedback", options);
  const tuningCfg = ctx.cfg.tuning;
  if (tuningCfg?.enabled === false) {
    return await skipJob(ctx, "tuning disabled");
  }
  const providers = ctx.cfg.providers ?? {};
  return await executeJob(
    ctx,
    async () => {
      const loop = createTuningFeedbackLoop({
        parameters: ctx.deps.parameters,
        repository: ctx.deps.repository,
        evaluations: ctx.deps.evaluations,
        prices: ctx.deps.prices,
        ai: ctx.deps.ai,
        options: {
          maturityDays: tuningCfg?.maturityDays,
          maxDecisionsPerRun: tuningCfg?.maxDecisionsPerRun,
          gatedDecisionsOnly: tuningCfg?.gatedDecisionsOnly,
          prices: providers.prices,
          ai: providers.ai,
        },
        now: ctx.now,
        log: ctx.log.child("loop"),
        sleep: options.sleep,
      });
      return await loop.run();
    },
    (report) => ({ runId: report.runId, counts: report.counts }),
  );
}
