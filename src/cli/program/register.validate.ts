import { Option, type Command } from "commander";
import { z } from "zod";

import { validateCommand } from "../../commands/validate.js";
import { runInContext, type ProgramDeps } from "./deps.js";

const validateOptionsSchema = z.object({
  phase: z.enum(["pre", "post"]),
  device: z.string().optional(),
  json: z.boolean().optional(),
});

export function registerValidateCommand(program: Command, deps: ProgramDeps) {
  program
    .command("validate")
    .description("Run the pre- or post-deployment checks")
    .addOption(new Option("--phase <phase>", "Validation phase").choices(["pre", "post"]).makeOptionMandatory())
    .option("--device <name>", "Only this device")
    .option("--json", "Output JSON instead of text")
    .action(async (opts: unknown, command: Command) => {
      await runInContext(deps, command, (ctx) =>
        validateCommand(validateOptionsSchema.parse(opts), ctx, deps.runtime),
      );
    });
}
