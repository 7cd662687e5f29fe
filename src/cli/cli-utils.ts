import { InvalidArgumentError } from "commander";

import { errorMessage } from "../errors.js";
import type { RuntimeEnv } from "../runtime.js";

/**
 * Run a command body, turning its result into the exit code. Errors that
 * escape the command (bad config, invalid intent) are printed, not thrown.
 */
export async function runCommandWithRuntime(runtime: RuntimeEnv, action: () => Promise<number>): Promise<void> {
  try {
    runtime.exit(await action());
  } catch (error) {
    runtime.error(errorMessage(error));
    runtime.exit(1);
  }
}

export function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError(`${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}
