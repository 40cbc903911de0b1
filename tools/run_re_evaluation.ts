import { triggerReEvaluation } from "../src/jobs.js";

const result = await triggerReEvaluation();
if (result.status === "skipped") {
  console.log(`re-evaluation skipped: ${result.reason}`);
} else {
  const { runId, counts } = result.report;
  console.log(
    `re-evaluation ${runId}: evaluated ${counts.evaluated}/${counts.matured}, failed ${counts.failed}, applied ${counts.applied}, rejected ${counts.invalid + counts.duplicate + counts.superseded}`,
  );
}
