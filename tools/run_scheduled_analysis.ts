import { runScheduledAnalysis } from "../src/jobs.js";

const controller = new AbortController();
process.once("SIGTERM", () => controller.abort(new Error("received SIGTERM")));

const result = await runScheduledAnalysis({ signal: controller.signal });
if (result.status === "skipped") {
  console.log(`analysis skipped: ${result.reason}`);
} else {
  const { run, counts } = result.report;
  console.log(
    `analysis ${run.runId}: scored ${counts.scored}/${counts.universe}, skipped ${counts.skipped}, failed ${counts.failed}, gated ${counts.gated}, notified ${counts.notified}`,
  );
}
