import type { Command } from "commander";
import { z } from "zod";

import { diffCommand } from "../../commands/diff.js";
import { generateCommand } from "../../commands/generate.js";
import { runInContext, type ProgramDeps } from "./deps.js";

const generateOptionsSchema = z.object({
  device: z.string().optional(),
  check: z.boolean().optional(),
});

const diffOptionsSchema = z.object({
  device: z.string().optional(),
  json: z.boolean().optional(),
});

export function registerGenerateCommands(program: Command, deps: ProgramDeps) {
  program
    .command("generate")
    .description("Render device configs from the intent and save them")
    .option("--device <name>", "Only this device")
    .option("--check", "Compare with the stored configs without writing")
    .action(async (opts: unknown, command: Command) => {
      await runInContext(deps, command, (ctx) =>
        generateCommand(generateOptionsSchema.parse(opts), ctx, deps.runtime),
      );
    });

  program
    .command("diff")
    .description("Capture live configs and diff them against the rendered intent")
    .option("--device <name>", "Only this device")
    .option("--json", "Output JSON instead of text")
    .action(async (opts: unknown, command: Command) => {
      await runInContext(deps, command, (ctx) =>
        diffCommand(diffOptionsSchema.parse(opts), ctx, deps.runtime),
      );
    });
}
