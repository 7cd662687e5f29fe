import path from "node:path";

export const CONFIG_FILENAME = "fleetconf.json";

export type ConfigLocation = {
  path: string;
  /** True when the path came from --config or FLEETCONF_CONFIG. */
  explicit: boolean;
};

/**
 * Config lookup order: explicit override, then FLEETCONF_CONFIG, then
 * ./fleetconf.json in the working directory.
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  override?: string,
): ConfigLocation {
  const explicit = override?.trim() || env.FLEETCONF_CONFIG?.trim();
  if (explicit) return { path: path.resolve(cwd, expandHome(explicit, env)), explicit: true };
  return { path: path.join(cwd, CONFIG_FILENAME), explicit: false };
}

/** Resolve a config-relative path. `:memory:` passes through untouched. */
export function resolveUserPath(input: string, baseDir: string, env: NodeJS.ProcessEnv = process.env): string {
  if (input === ":memory:") return input;
  return path.resolve(baseDir, expandHome(input, env));
}

function expandHome(input: string, env: NodeJS.ProcessEnv): string {
  const home = env.HOME ?? env.USERPROFILE;
  if (!home) return input;
  if (input === "~") return home;
  if (input.startsWith("~/")) return path.join(home, input.slice(2));
  return input;
}
