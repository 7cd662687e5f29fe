#!/usr/bin/env node
import { CommanderError } from "commander";

import { buildProgram } from "./cli/program.js";

try {
  await buildProgram().parseAsync(process.argv);
} catch (error) {
  // --help, --version and usage errors arrive here under exitOverride.
  if (!(error instanceof CommanderError)) throw error;
  process.exitCode = error.exitCode;
}
