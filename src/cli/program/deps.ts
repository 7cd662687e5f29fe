import type { Command } from "commander";
import { z } from "zod";

import { logLevelSchema } from "../../config/schema.js";
import type { RuntimeEnv } from "../../runtime.js";
import type { ConfirmationGate } from "../../types.js";
import { runCommandWithRuntime } from "../cli-utils.js";
import type { AppContext, ContextFactory, GlobalOptions } from "../context.js";

export type ProgramDeps = {
  runtime: RuntimeEnv;
  createContext: ContextFactory;
  /** Gate for interactive runs; `--yes` bypasses it. */
  createGate: () => ConfirmationGate;
};

const globalOptionsSchema = z.object({
  config: z.string().optional(),
  logLevel: logLevelSchema.optional(),
});

export function globalOptions(command: Command): GlobalOptions {
  return globalOptionsSchema.parse(command.optsWithGlobals());
}

/**
 * Build the app context from the global options, run the command body and
 * always release the context afterwards.
 */
export async function runInContext(
  deps: ProgramDeps,
  command: Command,
  body: (ctx: AppContext) => Promise<number>,
): Promise<void> {
  await runCommandWithRuntime(deps.runtime, async () => {
    const ctx = await deps.createContext(globalOptions(command));
    try {
      return await body(ctx);
    } finally {
      await ctx.close();
    }
  });
}
