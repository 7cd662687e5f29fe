/**
 * Configuration loading.
 *
 * Reads fleetconf.json, validates it and resolves every path against the
 * directory that holds the file.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { ZodIssue } from "zod";

import { ConfigError, errorMessage } from "../errors.js";
import { isLogLevel, type LogDestination, type LoggingOptions } from "../logging/index.js";
import { isNotFound } from "../utils/fs.js";
import { resolveConfigPath, resolveUserPath } from "./paths.js";
import { fleetConfigSchema, type FleetConfig } from "./schema.js";

export type ResolvedConfig = FleetConfig & {
  /** Absolute path of the config file (which may not exist). */
  configPath: string;
  /** Directory relative paths were resolved against. */
  baseDir: string;
};

export type LoadConfigOptions = {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const location = resolveConfigPath(env, cwd, options.configPath);

  const raw = await readConfigFile(location.path, location.explicit);
  const config = parseConfig(raw, location.path);
  const baseDir = path.dirname(location.path);

  const resolved: ResolvedConfig = {
    ...config,
    intentFile: resolveUserPath(config.intentFile, baseDir, env),
    templatesDir: resolveUserPath(config.templatesDir, baseDir, env),
    generatedDir: resolveUserPath(config.generatedDir, baseDir, env),
    backupDir: resolveUserPath(config.backupDir, baseDir, env),
    historyDb: resolveUserPath(config.historyDb, baseDir, env),
    lab: { ...config.lab, dir: resolveUserPath(config.lab.dir, baseDir, env) },
    logging: {
      ...config.logging,
      destinations: config.logging.destinations.map((dest) =>
        dest.type === "file" ? { ...dest, path: resolveUserPath(dest.path, baseDir, env) } : dest,
      ),
    },
    configPath: location.path,
    baseDir,
  };

  const envLevel = env.FLEETCONF_LOG_LEVEL?.trim();
  if (envLevel) {
    if (!isLogLevel(envLevel)) {
      throw new ConfigError(`FLEETCONF_LOG_LEVEL has an unknown level "${envLevel}"`);
    }
    resolved.logging.level = envLevel;
  }

  return resolved;
}

/**
 * Validate an already-parsed config object. Paths are left as written.
 */
export function parseConfig(raw: unknown, source = "<inline>"): FleetConfig {
  const result = fleetConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${source}`, result.error.issues.map(formatIssue));
  }
  return result.data;
}

export function loggingOptionsFrom(config: FleetConfig): LoggingOptions {
  const destinations: LogDestination[] = config.logging.destinations.map((dest) => ({ ...dest }));
  return {
    level: config.logging.level,
    destinations,
    redactPatterns: [...config.logging.redactPatterns],
  };
}

// =============================================================================
// Helpers
// =============================================================================

async function readConfigFile(filePath: string, explicit: boolean): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isNotFound(error) && !explicit) return {};
    throw new ConfigError(`Cannot read config file ${filePath}: ${errorMessage(error)}`);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }
}

export function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
}
