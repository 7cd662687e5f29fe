/**
 * fleetconf.json schema.
 */

import { z } from "zod";

import type { LogLevel } from "../logging/index.js";
import type { CheckCategory } from "../types.js";

// =============================================================================
// Zod Schemas
// =============================================================================

export const logLevelSchema = z.enum([
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
]) satisfies z.ZodType<LogLevel>;

export const checkCategorySchema = z.enum([
  "reachability",
  "interfaces",
  "routing-peers",
  "igp-adjacency",
  "label-distribution",
  "partitions",
]) satisfies z.ZodType<CheckCategory>;

export const logDestinationSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("console"), minLevel: logLevelSchema.optional() }),
  z.object({ type: z.literal("file"), path: z.string().min(1), minLevel: logLevelSchema.optional() }),
]);

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default("info"),
  destinations: z.array(logDestinationSchema).default([{ type: "console" }]),
  redactPatterns: z.array(z.string()).default([]),
});

export const labConfigSchema = z.object({
  kind: z.enum(["files", "memory"]).default("files"),
  dir: z.string().min(1).default("lab"),
});

export const validationConfigSchema = z.object({
  pre: z.array(checkCategorySchema).default(["reachability", "interfaces"]),
  post: z
    .array(checkCategorySchema)
    .default(["reachability", "interfaces", "routing-peers", "igp-adjacency", "label-distribution", "partitions"]),
});

export const fleetConfigSchema = z
  .object({
    intentFile: z.string().min(1).default("intent.json"),
    templatesDir: z.string().min(1).default("templates"),
    generatedDir: z.string().min(1).default("configs/generated"),
    backupDir: z.string().min(1).default("configs/backups"),
    historyDb: z.string().min(1).default("fleetconf-history.db"),
    lab: labConfigSchema.default({}),
    concurrency: z.number().int().positive().default(5),
    operationTimeoutMs: z.number().int().nonnegative().default(30_000),
    validation: validationConfigSchema.default({}),
    logging: loggingConfigSchema.default({}),
  })
  .strict();

export type FleetConfigInput = z.input<typeof fleetConfigSchema>;
export type FleetConfig = z.output<typeof fleetConfigSchema>;
