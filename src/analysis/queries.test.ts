import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { AnalysisRepository } from "./types.js";
import { getTopSummary, searchResults } from "./queries.js";
import { createFileAnalysisRepository } from "./store.js";
import { makeResult, makeRun } from "./test-fixtures.js";

describe("result queries", () => {
  let tempDir: string;
  let repo: AnalysisRepository;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "scoreloop-queries-"));
    repo = createFileAnalysisRepository({ dir: tempDir });
    await repo.commitRun(makeRun({ runId: "run-old", timestamp: "2026-03-01T06:00:00.000Z" }), [
      makeResult({ runId: "run-old", ticker: "OLD", buyScore: 20 }),
    ]);
    await repo.commitRun(makeRun({ runId: "run-new", timestamp: "2026-03-02T06:00:00.000Z" }), [
      makeResult({ runId: "run-new", ticker: "A", buyScore: 3, shortScore: 1 }),
      makeResult({ runId: "run-new", ticker: "B", buyScore: 7, shortScore: 0 }),
      makeResult({ runId: "run-new", ticker: "C", buyScore: 3, shortScore: 6 }),
      makeResult({ runId: "run-new", ticker: "D", buyScore: 0, shortScore: 9 }),
    ]);
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it("summarizes the latest run only", async () => {
    const summary = await getTopSummary(repo, 2);
    expect(summary?.run.runId).toBe("run-new");
    expect(summary?.topBuys.map((result) => result.ticker)).toEqual(["B", "A"]);
    expect(summary?.topShorts.map((result) => result.ticker)).toEqual(["D", "C"]);
  });

  it("filters, sorts and limits", async () => {
    const byShort = await searchResults(repo, { minShortScore: 1, sortBy: "shortScore" });
    expect(byShort.map((result) => result.ticker)).toEqual(["D", "C", "A"]);

    const ascending = await searchResults(repo, { minBuyScore: 3, sortOrder: "asc", limit: 2 });
    expect(ascending.map((result) => result.ticker)).toEqual(["A", "C"]);
  });

  it("returns nothing without runs", async () => {
    const empty = createFileAnalysisRepository({ dir: path.join(tempDir, "none") });
    expect(await getTopSummary(empty)).toBeNull();
    expect(await searchResults(empty)).toEqual([]);
  });
});
