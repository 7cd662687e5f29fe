/**
 * Diff Engine
 *
 * Flat line-set comparison of two configuration texts. Lines are compared
 * as whole strings with their indentation; block structure is not
 * considered, so an identical child line under two different parents
 * counts as unchanged.
 */

import type { ConfigDiff, DiffSummary } from "../types.js";
import { naturalCompare } from "../utils/collections.js";

const PREAMBLE_PATTERNS: readonly RegExp[] = [/^Building configuration/, /^Current configuration\s*:\s*\d+\s+bytes/];

/**
 * Lines that carry configuration. Drops blanks, `!` comments and the
 * preamble devices print before a running config.
 */
export function significantLines(text: string): Set<string> {
  const lines = new Set<string>();
  for (const raw of text.split("\n")) {
    const line = raw.trimEnd();
    const content = line.trimStart();
    if (content === "" || content.startsWith("!")) continue;
    if (PREAMBLE_PATTERNS.some((pattern) => pattern.test(content))) continue;
    lines.add(line);
  }
  return lines;
}

export function diffConfigs(liveText: string, desiredText: string): ConfigDiff {
  const live = significantLines(liveText);
  const desired = significantLines(desiredText);

  return {
    linesToAdd: new Set([...desired].filter((line) => !live.has(line))),
    linesToRemove: new Set([...live].filter((line) => !desired.has(line))),
  };
}

export function isEmptyDiff(diff: ConfigDiff): boolean {
  return diff.linesToAdd.size === 0 && diff.linesToRemove.size === 0;
}

export function summarizeDiff(diff: ConfigDiff): DiffSummary {
  return {
    added: diff.linesToAdd.size,
    removed: diff.linesToRemove.size,
    linesToAdd: [...diff.linesToAdd].sort(naturalCompare),
    linesToRemove: [...diff.linesToRemove].sort(naturalCompare),
  };
}

export function formatDiff(summary: DiffSummary): string {
  if (summary.added === 0 && summary.removed === 0) return "No significant differences";
  return [
    ...summary.linesToAdd.map((line) => `+ ${line}`),
    ...summary.linesToRemove.map((line) => `- ${line}`),
  ].join("\n");
}
