export { pipelineReportSchema } from "./schema.js";
export {
  InMemoryRunHistory,
  SQLiteRunHistory,
  summarizeRun,
  type RunHistoryStorage,
  type RunSummary,
} from "./storage.js";
