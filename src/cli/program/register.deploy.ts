import type { Command } from "commander";
import { z } from "zod";

import { deployCommand } from "../../commands/deploy.js";
import { rollbackCommand } from "../../commands/rollback.js";
import { AutoConfirmGate } from "../../gates.js";
import { runInContext, type ProgramDeps } from "./deps.js";

const deployOptionsSchema = z.object({
  device: z.string().optional(),
  dryRun: z.boolean().optional(),
  yes: z.boolean().optional(),
  json: z.boolean().optional(),
});

export function registerDeployCommands(program: Command, deps: ProgramDeps) {
  program
    .command("deploy")
    .description("Run the full pipeline: generate, validate, preview, deploy, validate, report")
    .option("--device <name>", "Restrict the run to one device")
    .option("--dry-run", "Back up and diff, but apply nothing")
    .option("-y, --yes", "Answer yes at every confirmation gate")
    .option("--json", "Print the report as JSON")
    .addHelpText(
      "after",
      "\nRollback is never automatic. After a failed run use `fleetconf rollback <device>`.\n",
    )
    .action(async (opts: unknown, command: Command) => {
      await runInContext(deps, command, (ctx) => {
        const { yes, ...options } = deployOptionsSchema.parse(opts);
        return deployCommand(options, ctx, deps.runtime, yes ? new AutoConfirmGate(true) : deps.createGate());
      });
    });

  program
    .command("rollback")
    .description("Restore a device to its most recent backup")
    .argument("<device>", "Device name")
    .action(async (device: string, _opts: unknown, command: Command) => {
      await runInContext(deps, command, (ctx) => rollbackCommand(device, ctx, deps.runtime));
    });
}
