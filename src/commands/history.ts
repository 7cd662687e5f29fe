import type { AppContext } from "../cli/context.js";
import { formatReport } from "../orchestration/report.js";
import type { RuntimeEnv } from "../runtime.js";

export type HistoryOptions = {
  runId?: string;
  limit?: number;
  json?: boolean;
};

export async function historyCommand(opts: HistoryOptions, ctx: AppContext, runtime: RuntimeEnv): Promise<number> {
  const history = await ctx.openHistory();

  if (opts.runId) {
    const report = await history.getRun(opts.runId);
    if (!report) {
      runtime.error(`No run with id ${opts.runId}`);
      return 1;
    }
    runtime.log(opts.json ? JSON.stringify(report, null, 2) : formatReport(report));
    return 0;
  }

  const runs = await history.listRuns(opts.limit ?? 20);
  if (opts.json) {
    runtime.log(JSON.stringify(runs, null, 2));
    return 0;
  }
  if (runs.length === 0) {
    runtime.log("No runs recorded.");
    return 0;
  }

  for (const run of runs) {
    const outcome = run.aborted ? "ABORTED" : run.success ? "SUCCESS" : "FAILED";
    const mode = run.dryRun ? " (dry run)" : "";
    runtime.log(
      `${run.startedAt}  ${run.runId}  ${outcome}${mode}  ${run.applied} applied, ${run.failed} failed, ${run.skipped} skipped`,
    );
  }
  return 0;
}
