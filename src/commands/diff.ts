import { selectDevices, type AppContext } from "../cli/context.js";
import { formatDiff } from "../diff/engine.js";
import { TemplateError } from "../errors.js";
import type { RuntimeEnv } from "../runtime.js";
import type { DeviceName, DiffSummary, ErrorDetail } from "../types.js";
import { processPooled } from "../utils/concurrency.js";

export type DiffOptions = {
  device?: DeviceName;
  json?: boolean;
};

type DiffEntry = { device: DeviceName; diff?: DiffSummary; error?: ErrorDetail };

export async function diffCommand(opts: DiffOptions, ctx: AppContext, runtime: RuntimeEnv): Promise<number> {
  const devices = selectDevices(ctx, opts.device);

  const entries = await processPooled(
    devices,
    async (device): Promise<DiffEntry> => {
      const intent = ctx.intents.get(device.name);
      if (!intent.ok) return { device: device.name, error: intent.error.toDetail("PREVIEW") };
      let desired: string;
      try {
        desired = ctx.renderer.render(intent.value);
      } catch (error) {
        if (!(error instanceof TemplateError)) throw error;
        return { device: device.name, error: error.toDetail("GENERATE") };
      }
      const result = await ctx.executor.preview(device, desired);
      return result.ok
        ? { device: device.name, diff: result.value }
        : { device: device.name, error: result.error.toDetail("PREVIEW") };
    },
    ctx.config.concurrency,
  );

  if (opts.json) {
    runtime.log(JSON.stringify(entries, null, 2));
  } else {
    for (const entry of entries) {
      runtime.log(`=== ${entry.device} ===`);
      if (entry.error) runtime.error(`${entry.error.kind}: ${entry.error.message}`);
      else if (entry.diff) runtime.log(formatDiff(entry.diff));
      runtime.log("");
    }
  }

  return entries.some((e) => e.error) ? 1 : 0;
}
