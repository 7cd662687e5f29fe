export { diffConfigs, formatDiff, isEmptyDiff, significantLines, summarizeDiff } from "./engine.js";
