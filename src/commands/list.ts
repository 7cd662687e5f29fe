import type { AppContext } from "../cli/context.js";
import type { RuntimeEnv } from "../runtime.js";

export type ListOptions = {
  json?: boolean;
};

export async function listCommand(opts: ListOptions, ctx: AppContext, runtime: RuntimeEnv): Promise<number> {
  const devices = ctx.intents.devices();

  if (opts.json) {
    runtime.log(
      JSON.stringify(
        devices.map((d) => ({ name: d.name, role: d.role, tier: d.tier, template: d.template })),
        null,
        2,
      ),
    );
    return 0;
  }

  if (devices.length === 0) {
    runtime.log("No devices declared.");
    return 0;
  }

  const width = Math.max(6, ...devices.map((d) => d.name.length)) + 2;
  runtime.log(`${"DEVICE".padEnd(width)}${"ROLE".padEnd(14)}${"TIER".padEnd(6)}TEMPLATE`);
  for (const d of devices) {
    runtime.log(`${d.name.padEnd(width)}${d.role.padEnd(14)}${String(d.tier).padEnd(6)}${d.template}`);
  }
  return 0;
}
