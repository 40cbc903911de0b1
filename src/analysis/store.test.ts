import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createSubsystemLogger } from "../logging/logger.js";
import { createFileAnalysisRepository } from "./store.js";
import { makeResult, makeRun } from "./test-fixtures.js";

describe("file analysis repository", () => {
  let tempDir: string;
  const warnings: string[] = [];
  const log = createSubsystemLogger("test", {
    level: "debug",
    sink: (level, line) => {
      if (level === "warn") {
        warnings.push(line);
      }
    },
  });

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "scoreloop-runs-"));
    warnings.length = 0;
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it("commits a run with its results and reads it back", async () => {
    const repo = createFileAnalysisRepository({ dir: tempDir, log });
    const run = makeRun({ runId: "run-a", universe: ["7203.T", "6758.T"] });
    const results = [
      makeResult({ runId: "run-a", ticker: "7203.T", buyScore: 6, gated: true, rationale: "ok", risk: "none" }),
      makeResult({ runId: "run-a", ticker: "6758.T" }),
    ];
    await repo.commitRun(run, results);

    const stored = await repo.getRun("run-a");
    expect(stored?.run).toEqual(run);
    expect(stored?.results).toEqual(results);
    expect(await repo.getRun("run-missing")).toBeNull();
    const leftovers = (await fs.promises.readdir(tempDir)).filter((name) => name.endsWith(".tmp"));
    expect(leftovers).toEqual([]);
  });

  it("refuses to overwrite an existing run", async () => {
    const repo = createFileAnalysisRepository({ dir: tempDir, log });
    await repo.commitRun(makeRun({ runId: "run-a" }), [makeResult({ runId: "run-a", ticker: "A" })]);
    await expect(
      repo.commitRun(makeRun({ runId: "run-a" }), [makeResult({ runId: "run-a", ticker: "B" })]),
    ).rejects.toThrow("run run-a already exists");
    expect((await repo.getRun("run-a"))?.results.map((result) => result.ticker)).toEqual(["A"]);
  });

  it("rejects results from another run", async () => {
    const repo = createFileAnalysisRepository({ dir: tempDir, log });
    await expect(
      repo.commitRun(makeRun({ runId: "run-a" }), [makeResult({ runId: "run-b", ticker: "A" })]),
    ).rejects.toThrow("result for A belongs to run run-b");
    expect(await repo.listRuns()).toEqual([]);
  });

  it("orders runs by timestamp and selects matured results", async () => {
    const repo = createFileAnalysisRepository({ dir: tempDir, log });
    await repo.commitRun(makeRun({ runId: "run-late", timestamp: "2026-03-12T06:00:00.000Z" }), [
      makeResult({ runId: "run-late", ticker: "X" }),
    ]);
    await repo.commitRun(makeRun({ runId: "run-early", timestamp: "2026-03-01T06:00:00.000Z" }), [
      makeResult({ runId: "run-early", ticker: "Z" }),
      makeResult({ runId: "run-early", ticker: "Y" }),
    ]);
    await fs.promises.writeFile(path.join(tempDir, "broken.json"), "{\"version\":1}\n");

    const runs = await repo.listRuns();
    expect(runs.map((record) => record.run.runId)).toEqual(["run-early", "run-late"]);
    expect((await repo.getLatestRun())?.run.runId).toBe("run-late");
    expect(warnings).toHaveLength(2);

    const matured = await repo.listMaturedResults(new Date("2026-03-10T00:00:00.000Z"));
    expect(matured.map((entry) => `${entry.run.runId}/${entry.result.ticker}`)).toEqual([
      "run-early/Y",
      "run-early/Z",
    ]);
  });

  it("is empty before the first run", async () => {
    const repo = createFileAnalysisRepository({ dir: path.join(tempDir, "missing"), log });
    expect(await repo.listRuns()).toEqual([]);
    expect(await repo.getLatestRun()).toBeNull();
  });
});
