import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { AiAdvisor, MailMessage, MailNotifier, NewsProvider, PriceHistoryProvider } from "../providers/types.js";
import type { ParameterStore } from "../tuning/types.js";
import type { AnalysisRepository, PriceBar } from "./types.js";
import { AIServiceError, MissingParameterError, NotFoundError } from "../errors.js";
import { createSubsystemLogger } from "../logging/logger.js";
import { seedDefaultParameters } from "../tuning/seed.js";
import { createFileParameterStore } from "../tuning/store.js";
import { createDecisionPipeline, type DecisionPipelineDeps } from "./pipeline.js";
import { createFileAnalysisRepository } from "./store.js";

function decliningHistory(count: number): PriceBar[] {
  return Array.from({ length: count }, (_, i) => ({
    date: `day-${i}`,
    open: 200 - i,
    high: 201 - i,
    low: 199 - i,
    close: 200 - i,
    volume: 5000,
  }));
}

const ZERO_WEIGHTS = [
  "rsi_buy_ready_weight",
  "rsi_short_weight",
  "rsi_sell_ready_weight",
  "deviation_buy_weight",
  "deviation_short_weight",
  "trend_weight",
  "macd_weight",
  "dmi_weight",
  "adx_trend_weight",
];

describe("decision pipeline", () => {
  let tempDir: string;
  let parameters: ParameterStore;
  let repository: AnalysisRepository;
  let mailed: MailMessage[];
  const log = createSubsystemLogger("test", { sink: () => {} });

  const prices: PriceHistoryProvider = {
    getHistory: vi.fn(async (ticker: string) => {
      if (ticker === "GONE") {
        throw new NotFoundError(`no chart for ${ticker}`);
      }
      return decliningHistory(ticker === "SHORT" ? 10 : 100);
    }),
    getCurrentPrice: async () => 100,
  };
  const news: NewsProvider = {
    getRecentNews: vi.fn(async (ticker: string) => [
      { title: `${ticker} headline`, url: "https://news.example/1", summary: "summary" },
    ]),
  };

  function buildDeps(overrides: Partial<DecisionPipelineDeps> = {}): DecisionPipelineDeps {
    const ai: AiAdvisor = {
      generateRationaleAndRisk: async () => ({ rationale: "Oversold bounce", risk: "none" }),
      suggestTuning: async () => [],
    };
    const mail: MailNotifier = {
      sendNotification: async (message) => {
        mailed.push(message);
        return { ok: true };
      },
    };
    return {
      parameters,
      repository,
      prices,
      news,
      ai,
      mail,
      universe: ["AAA", "SHORT", "GONE"],
      now: () => new Date("2026-03-02T06:00:00.000Z"),
      log,
      sleep: async () => undefined,
      ...overrides,
    };
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    mailed = [];
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "scoreloop-pipeline-"));
    parameters = createFileParameterStore({ filePath: path.join(tempDir, "parameters.json") });
    repository = createFileAnalysisRepository({ dir: path.join(tempDir, "runs"), log });
    const date = "2026-03-01";
    await parameters.writeNewVersion({ date, name: "rsi_oversold_threshold", value: 30 });
    await parameters.writeNewVersion({ date, name: "score_threshold", value: 5 });
    await parameters.writeNewVersion({ date, name: "rsi_buy_weight", value: 6 });
    for (const name of ZERO_WEIGHTS) {
      await parameters.writeNewVersion({ date, name, value: 0 });
    }
    await seedDefaultParameters({ store: parameters, date });
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it("gates an oversold ticker through news, rationale and mail", async () => {
    const report = await createDecisionPipeline(buildDeps()).run();

    expect(report.transitions.map((entry) => entry.state)).toEqual([
      "STARTED",
      "PARAMETERS_RESOLVED",
      "SCORED",
      "GATED",
      "PERSISTED",
      "DONE",
    ]);
    expect(report.counts).toEqual({
      universe: 3,
      scored: 1,
      skipped: 2,
      failed: 0,
      gated: 1,
      rationales: 1,
      notified: 1,
    });
    expect(report.outcomes).toEqual([
      { ticker: "AAA", status: "ok", gated: true, rationale: true, notified: true },
      { ticker: "SHORT", status: "skipped", reason: "insufficient-history" },
      { ticker: "GONE", status: "skipped", reason: "not-found" },
    ]);
    expect(prices.getHistory).toHaveBeenCalledTimes(1 + 1 + 3);
    expect(prices.getHistory).toHaveBeenCalledWith("AAA", 100);

    expect(mailed).toEqual([
      {
        ticker: "AAA",
        rationale: "Oversold bounce",
        risk: "none",
        buyScore: 6,
        shortScore: 0,
        runId: report.run.runId,
      },
    ]);

    const stored = await repository.getRun(report.run.runId);
    expect(stored?.run.timestamp).toBe("2026-03-02T06:00:00.000Z");
    expect(stored?.run.parametersUsed.rsi_oversold_threshold).toBe(30);
    expect(stored?.results).toHaveLength(1);
    expect(stored?.results[0]).toMatchObject({
      ticker: "AAA",
      rsi: 0,
      buyScore: 6,
      shortScore: 0,
      gated: true,
      rationale: "Oversold bounce",
      risk: "none",
      newsCount: 1,
    });
    expect(stored?.results[0].signals.rsi).toBe("buy");
  });

  it("persists without rationale when the AI call fails", async () => {
    const generateRationaleAndRisk = vi.fn(async () => {
      throw new AIServiceError("malformed reply");
    });
    const report = await createDecisionPipeline(
      buildDeps({
        universe: ["AAA"],
        ai: { generateRationaleAndRisk, suggestTuning: async () => [] },
      }),
    ).run();

    expect(report.transitions[report.transitions.length - 1].state).toBe("DONE");
    expect(generateRationaleAndRisk).toHaveBeenCalledTimes(2);
    expect(mailed).toEqual([]);
    const stored = await repository.getRun(report.run.runId);
    expect(stored?.results[0].buyScore).toBe(6);
    expect(stored?.results[0].rationale).toBeUndefined();
    expect(stored?.results[0].risk).toBeUndefined();
  });

  it("keeps the result when the mail collaborator throws", async () => {
    const report = await createDecisionPipeline(
      buildDeps({
        universe: ["AAA"],
        mail: {
          sendNotification: async () => {
            throw new Error("smtp down");
          },
        },
      }),
    ).run();
    expect(report.counts.notified).toBe(0);
    const stored = await repository.getRun(report.run.runId);
    expect(stored?.results[0].rationale).toBe("Oversold bounce");
  });

  it("skips news and AI below the threshold", async () => {
    await parameters.writeNewVersion({ date: "2026-03-02", name: "score_threshold", value: 7 });
    const report = await createDecisionPipeline(buildDeps({ universe: ["AAA"] })).run();
    expect(report.counts.gated).toBe(0);
    expect(news.getRecentNews).not.toHaveBeenCalled();
    expect(report.results[0].newsCount).toBeUndefined();
  });

  it("aborts with nothing persisted when parameters are missing", async () => {
    const run = createDecisionPipeline(
      buildDeps({ now: () => new Date("2026-02-01T06:00:00.000Z") }),
    ).run();
    await expect(run).rejects.toBeInstanceOf(MissingParameterError);
    expect(prices.getHistory).not.toHaveBeenCalled();
    expect(await repository.listRuns()).toEqual([]);
  });

  it("commits nothing once aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      createDecisionPipeline(buildDeps({ universe: ["AAA"] })).run({ signal: controller.signal }),
    ).rejects.toThrow(/aborted/);
    expect(await repository.listRuns()).toEqual([]);
  });
});
