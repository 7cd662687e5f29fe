/**
 * Stored report shape. Reports are written as JSON and validated again on
 * the way out of the database.
 */

import { z } from "zod";

import { checkCategorySchema } from "../config/schema.js";
import type { PipelineReport } from "../orchestration/types.js";

const phaseSchema = z.enum(["GENERATE", "PRE_VALIDATE", "PREVIEW", "DEPLOY", "POST_VALIDATE", "REPORT", "ABORTED"]);

const errorDetailSchema = z.object({
  kind: z.enum([
    "IntentNotFound",
    "TemplateError",
    "BackupFailure",
    "ApplyRejected",
    "SessionError",
    "ParseUnavailable",
    "CyclicDependency",
    "StoreFailure",
  ]),
  message: z.string(),
  phase: phaseSchema.optional(),
});

const diffSummarySchema = z.object({
  added: z.number(),
  removed: z.number(),
  linesToAdd: z.array(z.string()),
  linesToRemove: z.array(z.string()),
});

const deploymentResultSchema = z.object({
  device: z.string(),
  status: z.enum(["applied", "failed", "skipped"]),
  error: errorDetailSchema.optional(),
  reason: z.string().optional(),
  diff: diffSummarySchema.optional(),
  backup: z.object({ device: z.string(), capturedAt: z.string(), location: z.string() }).optional(),
  attemptedAt: z.string().optional(),
  dryRun: z.boolean().optional(),
});

const validationResultSchema = z.object({
  check: z.string(),
  category: checkCategorySchema,
  device: z.string(),
  phase: z.enum(["pre", "post"]),
  status: z.enum(["pass", "fail", "skip"]),
  detail: z.string(),
});

const countsSchema = z.object({ pass: z.number(), fail: z.number(), skip: z.number() });

export const pipelineReportSchema = z.object({
  runId: z.string(),
  startedAt: z.string(),
  completedAt: z.string(),
  dryRun: z.boolean(),
  success: z.boolean(),
  aborted: z.boolean(),
  abortedIn: phaseSchema.optional(),
  abortReason: z.string().optional(),
  phases: z.array(phaseSchema),
  postValidationRun: z.boolean(),
  devices: z.array(
    z.object({
      device: z.string(),
      generation: z.enum(["generated", "failed"]),
      generationError: errorDetailSchema.optional(),
      diff: diffSummarySchema.optional(),
      previewError: errorDetailSchema.optional(),
      deployment: deploymentResultSchema,
      preValidation: z.array(validationResultSchema),
      postValidation: z.array(validationResultSchema),
    }),
  ),
  totals: z.object({
    devices: z.number(),
    generated: z.number(),
    applied: z.number(),
    failed: z.number(),
    skipped: z.number(),
    preValidation: countsSchema,
    postValidation: countsSchema,
  }),
  rollbackCandidates: z.array(z.string()),
}) satisfies z.ZodType<PipelineReport>;

export const runRowSchema = z.object({
  run_id: z.string(),
  started_at: z.string(),
  completed_at: z.string(),
  dry_run: z.number(),
  success: z.number(),
  aborted: z.number(),
  devices: z.number(),
  applied: z.number(),
  failed: z.number(),
  skipped: z.number(),
});

export type RunRow = z.output<typeof runRowSchema>;
