import type { Command } from "commander";
import { z } from "zod";

import { listCommand } from "../../commands/list.js";
import { planCommand } from "../../commands/plan.js";
import { runInContext, type ProgramDeps } from "./deps.js";

const jsonOptionsSchema = z.object({ json: z.boolean().optional() });

export function registerListCommands(program: Command, deps: ProgramDeps) {
  program
    .command("list")
    .description("List devices declared in the intent with role and tier")
    .option("--json", "Output JSON instead of a table")
    .action(async (opts: unknown, command: Command) => {
      await runInContext(deps, command, (ctx) =>
        listCommand(jsonOptionsSchema.parse(opts), ctx, deps.runtime),
      );
    });

  program
    .command("plan")
    .description("Print the tiered deployment order")
    .option("--json", "Output JSON instead of text")
    .action(async (opts: unknown, command: Command) => {
      await runInContext(deps, command, (ctx) =>
        planCommand(jsonOptionsSchema.parse(opts), ctx, deps.runtime),
      );
    });
}
