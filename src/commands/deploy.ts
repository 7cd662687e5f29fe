import { selectDevices, type AppContext } from "../cli/context.js";
import { errorMessage } from "../errors.js";
import { Pipeline } from "../orchestration/pipeline.js";
import { formatReport } from "../orchestration/report.js";
import type { PipelineReport } from "../orchestration/types.js";
import type { RuntimeEnv } from "../runtime.js";
import type { ConfirmationGate, DeviceName } from "../types.js";

export type DeployOptions = {
  device?: DeviceName;
  dryRun?: boolean;
  json?: boolean;
};

export async function deployCommand(
  opts: DeployOptions,
  ctx: AppContext,
  runtime: RuntimeEnv,
  gate: ConfirmationGate,
): Promise<number> {
  // Unknown names fail here rather than as an empty run.
  if (opts.device) selectDevices(ctx, opts.device);

  const pipeline = new Pipeline({
    intents: ctx.intents,
    renderer: ctx.renderer,
    store: ctx.store,
    executor: ctx.executor,
    validator: ctx.validator,
    gate,
    planner: ctx.planner,
    concurrency: ctx.config.concurrency,
    clock: ctx.clock,
    logger: ctx.logger.child("pipeline"),
  });

  const events = ctx.logger.child("events");
  const unsubscribe = pipeline.on((event) => {
    if (event.type === "pipeline:aborted") events.warn(event.message, { phase: event.phase });
    else events.debug(event.message, { phase: event.phase });
  });

  let report: PipelineReport;
  try {
    report = await pipeline.run({ devices: opts.device ? [opts.device] : undefined, dryRun: opts.dryRun });
  } finally {
    unsubscribe();
    gate.close?.();
  }

  await recordRun(ctx, report);

  runtime.log(opts.json ? JSON.stringify(report, null, 2) : formatReport(report));
  return report.success ? 0 : 1;
}

async function recordRun(ctx: AppContext, report: PipelineReport): Promise<void> {
  try {
    const history = await ctx.openHistory();
    await history.saveRun(report);
  } catch (error) {
    ctx.logger.warn(`Run ${report.runId} was not recorded in history: ${errorMessage(error)}`);
  }
}
