import path from "node:path";
import type { SubsystemLogger } from "../logging/logger.js";
import type { MailNotifier } from "../providers/types.js";
import { resolveStateDir } from "../config/paths.js";
import { appendNdjsonLines } from "../infra/json-file.js";
import { VERSION } from "../version.js";

export type JobRunRecord = {
  runId: string;
  job: string;
  status: "ok" | "skipped" | "failed";
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  counts?: Record<string, number>;
  error?: string;
  provenance: { runId: string; agent: string; version: string };
};

export const OPS_RUNS_PATH = path.join("ops", "runs.ndjson");

export function resolveOpsRunsPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveStateDir(env), OPS_RUNS_PATH);
}

export async function appendRunRecord(
  record: JobRunRecord,
  env: NodeJS.ProcessEnv = process.env,
): Promise<void> {
  await appendNdjsonLines(resolveOpsRunsPath(env), [record]);
}

export function buildRunRecord(params: {
  runId: string;
  job: string;
  status: JobRunRecord["status"];
  startedAt: string;
  finishedAt: string;
  counts?: Record<string, number>;
  error?: string;
}): JobRunRecord {
  const durationMs = new Date(params.finishedAt).getTime() - new Date(params.startedAt).getTime();
  return {
    runId: params.runId,
    job: params.job,
    status: params.status,
    startedAt: params.startedAt,
    finishedAt: params.finishedAt,
    durationMs: Math.max(0, durationMs),
    counts: params.counts,
    error: params.error,
    provenance: {
      runId: params.runId,
      agent: params.job,
      version: VERSION,
    },
  };
}

export function formatCounts(counts: Record<string, number>): string {
  return Object.entries(counts)
    .map(([key, value]) => `${key}: ${value}`)
    .join("\n");
}

/** Best effort: a failed operator mail is logged, never thrown. */
export async function notifyOperators(
  mail: MailNotifier,
  subject: string,
  body: string,
  log?: SubsystemLogger,
): Promise<boolean> {
  if (!mail.sendText) {
    return false;
  }
  try {
    const result = await mail.sendText(subject, body);
    if (!result.ok) {
      log?.warn("operator mail not sent", { subject, reason: result.reason });
    }
    return result.ok;
  } catch (err) {
    log?.warn("operator mail failed", { subject, error: String(err) });
    return false;
  }
}
