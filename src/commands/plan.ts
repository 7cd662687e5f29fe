import type { AppContext } from "../cli/context.js";
import type { RuntimeEnv } from "../runtime.js";

export type PlanOptions = {
  json?: boolean;
};

export async function planCommand(opts: PlanOptions, ctx: AppContext, runtime: RuntimeEnv): Promise<number> {
  const tiers = ctx.planner.planTiers(ctx.intents.devices());

  if (opts.json) {
    runtime.log(
      JSON.stringify(
        tiers.map((devices) => ({ tier: devices[0].tier, devices: devices.map((d) => d.name) })),
        null,
        2,
      ),
    );
    return 0;
  }

  let step = 1;
  for (const devices of tiers) {
    runtime.log(`Tier ${devices[0].tier}:`);
    for (const device of devices) {
      const deps = device.dependsOn.length > 0 ? ` (after ${device.dependsOn.join(", ")})` : "";
      runtime.log(`  ${String(step++).padStart(2)}. ${device.name}${deps}`);
    }
  }
  return 0;
}
