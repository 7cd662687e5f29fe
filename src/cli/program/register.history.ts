import type { Command } from "commander";
import { z } from "zod";

import { historyCommand } from "../../commands/history.js";
import { parsePositiveInt } from "../cli-utils.js";
import { runInContext, type ProgramDeps } from "./deps.js";

const historyOptionsSchema = z.object({
  limit: z.number().int().positive().optional(),
  json: z.boolean().optional(),
});

export function registerHistoryCommand(program: Command, deps: ProgramDeps) {
  program
    .command("history")
    .description("Show recent pipeline runs, or one run's full report")
    .argument("[runId]", "Run id to show in full")
    .option("--limit <n>", "Number of runs to list", (value) => parsePositiveInt(value, "--limit"))
    .option("--json", "Output JSON instead of text")
    .action(async (runId: string | undefined, opts: unknown, command: Command) => {
      await runInContext(deps, command, (ctx) =>
        historyCommand({ ...historyOptionsSchema.parse(opts), runId }, ctx, deps.runtime),
      );
    });
}
