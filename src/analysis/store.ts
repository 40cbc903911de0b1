import fs from "node:fs";
import path from "node:path";
import type { AnalysisRepository, AnalysisResult, AnalysisRun, MaturedResult, RunRecord } from "./types.js";
import { resolveStateDir } from "../config/paths.js";
import { ConfigurationError } from "../errors.js";
import { readJsonFile, writeJsonFileExclusive } from "../infra/json-file.js";
import { parseIsoDate } from "../infra/utils.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/logger.js";
import { RunDocumentSchema } from "./schema.js";

const RUN_ID_RE = /^[A-Za-z0-9._-]+$/;

export function resolveRunsDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveStateDir(env), "analysis", "runs");
}

function compareRuns(a: RunRecord, b: RunRecord): number {
  return a.run.timestamp.localeCompare(b.run.timestamp) || a.run.runId.localeCompare(b.run.runId);
}

function runFilePath(dir: string, runId: string): string {
  if (!RUN_ID_RE.test(runId)) {
    throw new RangeError(`invalid run id: ${runId}`);
  }
  return path.join(dir, `${runId}.json`);
}

/**
 * One JSON document per run under `analysis/runs/`. A run and its results land in a
 * single file, so a crash before the link leaves no trace of the run.
 */
export function createFileAnalysisRepository(
  params: { dir?: string; log?: SubsystemLogger } = {},
): AnalysisRepository {
  const dir = params.dir ?? resolveRunsDir();
  const log = params.log ?? createSubsystemLogger("analysis-store");

  const readRun = async (filePath: string): Promise<RunRecord | null> => {
    const raw = await readJsonFile(filePath);
    if (raw === null) {
      return null;
    }
    const parsed = RunDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`run document ${filePath} is corrupt`, { cause: parsed.error });
    }
    return { run: parsed.data.run, results: parsed.data.results };
  };

  const listRuns = async (): Promise<RunRecord[]> => {
    let names: string[];
    try {
      names = await fs.promises.readdir(dir);
    } catch (err) {
      if ((err as { code?: string }).code === "ENOENT") {
        return [];
      }
      throw err;
    }
    const records: RunRecord[] = [];
    for (const name of names.filter((entry) => entry.endsWith(".json"))) {
      try {
        const record = await readRun(path.join(dir, name));
        if (record) {
          records.push(record);
        }
      } catch (err) {
        log.warn("skipping unreadable run document", { file: name, error: String(err) });
      }
    }
    return records.sort(compareRuns);
  };

  return {
    async commitRun(run: AnalysisRun, results: readonly AnalysisResult[]) {
      const foreign = results.find((result) => result.runId !== run.runId);
      if (foreign) {
        throw new RangeError(`result for ${foreign.ticker} belongs to run ${foreign.runId}`);
      }
      const document = RunDocumentSchema.parse({ version: 1, run, results });
      const written = await writeJsonFileExclusive(runFilePath(dir, run.runId), document);
      if (!written) {
        throw new RangeError(`run ${run.runId} already exists`);
      }
    },

    async getRun(runId) {
      return await readRun(runFilePath(dir, runId));
    },

    listRuns,

    async getLatestRun() {
      const runs = await listRuns();
      return runs[runs.length - 1] ?? null;
    },

    async listMaturedResults(cutoff) {
      const cutoffMs = cutoff.getTime();
      const matured: MaturedResult[] = [];
      for (const record of await listRuns()) {
        const ts = parseIsoDate(record.run.timestamp);
        if (ts === null || ts >= cutoffMs) {
          continue;
        }
        const results = [...record.results].sort((a, b) => a.ticker.localeCompare(b.ticker));
        for (const result of results) {
          matured.push({ run: record.run, result });
        }
      }
      return matured;
    },
  };
}
