import { selectDevices, type AppContext } from "../cli/context.js";
import { rollbackDevice } from "../deploy/rollback.js";
import type { RuntimeEnv } from "../runtime.js";
import type { DeviceName } from "../types.js";

export async function rollbackCommand(device: DeviceName, ctx: AppContext, runtime: RuntimeEnv): Promise<number> {
  const [target] = selectDevices(ctx, device);
  const result = await rollbackDevice(target, {
    sessions: ctx.sessions,
    store: ctx.store,
    clock: ctx.clock,
    operationTimeoutMs: ctx.config.operationTimeoutMs,
    logger: ctx.logger.child("rollback"),
  });

  if (result.status === "failed") {
    runtime.error(`Rollback of ${device} failed: ${result.error?.kind ?? "Error"}: ${result.error?.message ?? "unknown"}`);
    if (result.preRollbackBackup) runtime.error(`Pre-rollback config saved at ${result.preRollbackBackup.location}`);
    return 1;
  }

  runtime.log(`Rolled back ${device} to backup captured at ${result.restoredFrom ?? "unknown time"}`);
  if (result.preRollbackBackup) runtime.log(`Previous config saved at ${result.preRollbackBackup.location}`);
  return 0;
}
