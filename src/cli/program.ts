import { Command, Option } from "commander";

import { PromptGate } from "../gates.js";
import { LOG_LEVELS } from "../logging/index.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { VERSION } from "../version.js";
import { createAppContext } from "./context.js";
import type { ProgramDeps } from "./program/deps.js";
import { registerBackupCommand } from "./program/register.backup.js";
import { registerDeployCommands } from "./program/register.deploy.js";
import { registerGenerateCommands } from "./program/register.generate.js";
import { registerHistoryCommand } from "./program/register.history.js";
import { registerListCommands } from "./program/register.list.js";
import { registerValidateCommand } from "./program/register.validate.js";

export type { ProgramDeps } from "./program/deps.js";

export function buildProgram(overrides: Partial<ProgramDeps> = {}): Command {
  const runtime: RuntimeEnv = overrides.runtime ?? defaultRuntime;
  const deps: ProgramDeps = {
    runtime,
    createContext: overrides.createContext ?? ((options) => createAppContext(options)),
    createGate: overrides.createGate ?? (() => new PromptGate()),
  };

  const program = new Command();
  program
    .name("fleetconf")
    .description("Render, validate and deploy network device configs from a declarative intent")
    .version(VERSION)
    .option("-c, --config <path>", "Path to fleetconf.json (default: $FLEETCONF_CONFIG or ./fleetconf.json)")
    .addOption(new Option("--log-level <level>", "Override the configured log level").choices(LOG_LEVELS))
    .showHelpAfterError()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => runtime.log(text.trimEnd()),
      writeErr: (text) => runtime.error(text.trimEnd()),
    });

  registerListCommands(program, deps);
  registerGenerateCommands(program, deps);
  registerDeployCommands(program, deps);
  registerBackupCommand(program, deps);
  registerValidateCommand(program, deps);
  registerHistoryCommand(program, deps);

  return program;
}
