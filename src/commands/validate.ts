import { selectDevices, type AppContext } from "../cli/context.js";
import type { RuntimeEnv } from "../runtime.js";
import type { DeviceName, ValidationPhase, ValidationStatus } from "../types.js";
import { countValidation } from "../validation/runner.js";

export type ValidateOptions = {
  phase: ValidationPhase;
  device?: DeviceName;
  json?: boolean;
};

const STATUS_LABEL: Record<ValidationStatus, string> = { pass: "PASS", fail: "FAIL", skip: "SKIP" };

export async function validateCommand(opts: ValidateOptions, ctx: AppContext, runtime: RuntimeEnv): Promise<number> {
  const devices = selectDevices(ctx, opts.device);
  const results = await ctx.validator.runChecks(devices, opts.phase);
  const counts = countValidation(results);

  if (opts.json) {
    runtime.log(JSON.stringify({ phase: opts.phase, counts, results }, null, 2));
  } else {
    for (const result of results) {
      runtime.log(`${STATUS_LABEL[result.status]}  ${result.device.padEnd(16)}${result.check.padEnd(20)}${result.detail}`);
    }
    runtime.log(`\n${opts.phase}-validation: ${counts.pass} passed, ${counts.fail} failed, ${counts.skip} skipped`);
  }
  return counts.fail > 0 ? 1 : 0;
}
