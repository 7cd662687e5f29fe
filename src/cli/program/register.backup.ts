import type { Command } from "commander";
import { z } from "zod";

import { backupCommand } from "../../commands/backup.js";
import { runInContext, type ProgramDeps } from "./deps.js";

const backupOptionsSchema = z.object({ device: z.string().optional() });

export function registerBackupCommand(program: Command, deps: ProgramDeps) {
  program
    .command("backup")
    .description("Capture and back up live configs")
    .option("--device <name>", "Only this device")
    .action(async (opts: unknown, command: Command) => {
      await runInContext(deps, command, (ctx) =>
        backupCommand(backupOptionsSchema.parse(opts), ctx, deps.runtime),
      );
    });
}
