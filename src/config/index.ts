export { loadConfig, parseConfig, loggingOptionsFrom, formatIssue, type ResolvedConfig, type LoadConfigOptions } from "./config.js";
export { resolveConfigPath, resolveUserPath, CONFIG_FILENAME, type ConfigLocation } from "./paths.js";
export { fleetConfigSchema, checkCategorySchema, logLevelSchema, type FleetConfig, type FleetConfigInput } from "./schema.js";
