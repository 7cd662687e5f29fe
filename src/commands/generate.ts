import { selectDevices, type AppContext } from "../cli/context.js";
import { errorMessage, TemplateError } from "../errors.js";
import type { RuntimeEnv } from "../runtime.js";
import type { DeviceName } from "../types.js";
import { processPooled } from "../utils/concurrency.js";

export type GenerateOptions = {
  device?: DeviceName;
  /** Compare with the stored configs instead of writing. */
  check?: boolean;
};

export type GenerateStatus = "generated" | "new" | "changed" | "unchanged" | "error";

export type GenerateOutcome = {
  device: DeviceName;
  status: GenerateStatus;
  detail?: string;
};

export async function generateConfigs(opts: GenerateOptions, ctx: AppContext): Promise<GenerateOutcome[]> {
  const devices = selectDevices(ctx, opts.device);

  return processPooled(
    devices,
    async (device): Promise<GenerateOutcome> => {
      const intent = ctx.intents.get(device.name);
      if (!intent.ok) return { device: device.name, status: "error", detail: intent.error.message };

      let text: string;
      try {
        text = ctx.renderer.render(intent.value);
      } catch (error) {
        if (!(error instanceof TemplateError)) throw error;
        ctx.logger.withContext({ device: device.name }).error(error.message);
        return { device: device.name, status: "error", detail: error.message };
      }

      if (opts.check) {
        const current = await ctx.store.readCurrent(device.name);
        if (current === null) return { device: device.name, status: "new" };
        return { device: device.name, status: current === text ? "unchanged" : "changed" };
      }

      try {
        await ctx.store.save(device.name, text);
      } catch (error) {
        return { device: device.name, status: "error", detail: `Cannot save: ${errorMessage(error)}` };
      }
      return { device: device.name, status: "generated" };
    },
    ctx.config.concurrency,
  );
}

export async function generateCommand(opts: GenerateOptions, ctx: AppContext, runtime: RuntimeEnv): Promise<number> {
  const outcomes = await generateConfigs(opts, ctx);

  for (const outcome of outcomes) {
    const line = `${outcome.status.padEnd(10)} ${outcome.device}`;
    if (outcome.status === "error") runtime.error(`${line}: ${outcome.detail ?? "unknown error"}`);
    else runtime.log(line);
  }

  const errors = outcomes.filter((o) => o.status === "error").length;
  if (opts.check) {
    const count = (status: GenerateStatus) => outcomes.filter((o) => o.status === status).length;
    runtime.log(`\n${count("new")} new, ${count("changed")} changed, ${count("unchanged")} unchanged`);
  } else {
    runtime.log(`\nGenerated ${outcomes.length - errors}/${outcomes.length} config(s) in ${ctx.config.generatedDir}`);
  }
  return errors > 0 ? 1 : 0;
}
