/**
 * Orchestration: Type Definitions
 */

import type { ValidationCounts } from "../validation/runner.js";
import type {
  DeploymentResult,
  DeviceName,
  DiffSummary,
  ErrorDetail,
  PipelinePhase,
  ValidationResult,
} from "../types.js";

// =============================================================================
// Events
// =============================================================================

export type PipelineEvent =
  | { type: "phase:start"; phase: PipelinePhase; timestamp: string; message: string }
  | { type: "phase:complete"; phase: PipelinePhase; timestamp: string; message: string }
  | {
      type: "device:result";
      phase: PipelinePhase;
      device: DeviceName;
      status: string;
      timestamp: string;
      message: string;
    }
  | { type: "pipeline:aborted"; phase: PipelinePhase; timestamp: string; message: string };

export type PipelineEventListener = (event: PipelineEvent) => void;

// =============================================================================
// Report
// =============================================================================

export type GenerationStatus = "generated" | "failed";

export type DeviceReport = {
  device: DeviceName;
  generation: GenerationStatus;
  generationError?: ErrorDetail;
  diff?: DiffSummary;
  previewError?: ErrorDetail;
  deployment: DeploymentResult;
  preValidation: ValidationResult[];
  postValidation: ValidationResult[];
};

export type ReportTotals = {
  devices: number;
  generated: number;
  applied: number;
  failed: number;
  skipped: number;
  preValidation: ValidationCounts;
  postValidation: ValidationCounts;
};

export type PipelineReport = {
  runId: string;
  startedAt: string;
  completedAt: string;
  dryRun: boolean;
  success: boolean;
  aborted: boolean;
  /** Phase during which the run was aborted. */
  abortedIn?: PipelinePhase;
  abortReason?: string;
  /** Phases visited, in order. */
  phases: PipelinePhase[];
  postValidationRun: boolean;
  devices: DeviceReport[];
  totals: ReportTotals;
  /** Devices an operator may want to roll back. Rollback is never automatic. */
  rollbackCandidates: DeviceName[];
};

export type PipelineRunOptions = {
  /** Restrict the run to these devices; default is every device in the intent. */
  devices?: readonly DeviceName[];
  dryRun?: boolean;
};
