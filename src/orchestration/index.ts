export { Pipeline, type PipelineDeps } from "./pipeline.js";
export { buildReport, formatReport, type ReportInput } from "./report.js";
export type {
  DeviceReport,
  GenerationStatus,
  PipelineEvent,
  PipelineEventListener,
  PipelineReport,
  PipelineRunOptions,
  ReportTotals,
} from "./types.js";
