import { selectDevices, type AppContext } from "../cli/context.js";
import type { RuntimeEnv } from "../runtime.js";
import type { DeviceName } from "../types.js";
import { processPooled } from "../utils/concurrency.js";

export type BackupOptions = {
  device?: DeviceName;
};

export async function backupCommand(opts: BackupOptions, ctx: AppContext, runtime: RuntimeEnv): Promise<number> {
  const devices = selectDevices(ctx, opts.device);
  const results = await processPooled(
    devices,
    async (device) => ({ device: device.name, result: await ctx.executor.captureBackup(device) }),
    ctx.config.concurrency,
  );

  let failed = 0;
  for (const { device, result } of results) {
    if (result.ok) {
      runtime.log(`${device}: ${result.value.location}`);
    } else {
      failed++;
      runtime.error(`${device}: ${result.error.kind}: ${result.error.message}`);
    }
  }
  runtime.log(`\nBacked up ${results.length - failed}/${results.length} device(s)`);
  return failed > 0 ? 1 : 0;
}
