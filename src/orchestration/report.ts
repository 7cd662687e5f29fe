/**
 * Pipeline report assembly and text rendering.
 */

import type { PipelinePhase } from "../types.js";
import { countValidation } from "../validation/runner.js";
import type { DeviceReport, PipelineReport } from "./types.js";

export type ReportInput = {
  runId: string;
  startedAt: string;
  completedAt: string;
  dryRun: boolean;
  phases: PipelinePhase[];
  postValidationRun: boolean;
  devices: DeviceReport[];
  abort?: { phase: PipelinePhase; reason: string };
};

export function buildReport(input: ReportInput): PipelineReport {
  const deployments = input.devices.map((d) => d.deployment);
  const pre = input.devices.flatMap((d) => d.preValidation);
  const post = input.devices.flatMap((d) => d.postValidation);

  const totals = {
    devices: input.devices.length,
    generated: input.devices.filter((d) => d.generation === "generated").length,
    applied: deployments.filter((d) => d.status === "applied").length,
    failed: deployments.filter((d) => d.status === "failed").length,
    skipped: deployments.filter((d) => d.status === "skipped").length,
    preValidation: countValidation(pre),
    postValidation: countValidation(post),
  };

  const rollbackCandidates = input.devices
    .filter(
      (d) =>
        d.deployment.status === "failed" ||
        (d.deployment.status === "applied" && d.postValidation.some((r) => r.status === "fail")),
    )
    .map((d) => d.device);

  const aborted = input.abort !== undefined;

  return {
    runId: input.runId,
    startedAt: input.startedAt,
    completedAt: input.completedAt,
    dryRun: input.dryRun,
    success: !aborted && totals.failed === 0 && totals.postValidation.fail === 0,
    aborted,
    ...(input.abort ? { abortedIn: input.abort.phase, abortReason: input.abort.reason } : {}),
    phases: [...input.phases],
    postValidationRun: input.postValidationRun,
    devices: input.devices,
    totals,
    rollbackCandidates,
  };
}

// =============================================================================
// Text rendering
// =============================================================================

export function formatReport(report: PipelineReport): string {
  const lines: string[] = [];
  const outcome = report.aborted ? "ABORTED" : report.success ? "SUCCESS" : "FAILED";

  lines.push(`Run ${report.runId}${report.dryRun ? " (dry run)" : ""}: ${outcome}`);
  lines.push(`Phases: ${report.phases.join(" → ")}`);
  if (report.aborted) lines.push(`Aborted in ${report.abortedIn ?? "?"}: ${report.abortReason ?? "no reason given"}`);
  lines.push("");

  for (const device of report.devices) {
    lines.push(formatDeviceLine(device, report.postValidationRun));
    for (const detail of deviceProblems(device)) lines.push(`    ${detail}`);
  }

  const t = report.totals;
  lines.push("");
  lines.push(
    `Devices: ${t.devices}  generated: ${t.generated}  applied: ${t.applied}  failed: ${t.failed}  skipped: ${t.skipped}`,
  );
  lines.push(`Pre-validation: ${formatCounts(t.preValidation)}`);
  lines.push(
    report.postValidationRun ? `Post-validation: ${formatCounts(t.postValidation)}` : "Post-validation: not run",
  );

  if (report.rollbackCandidates.length > 0) {
    lines.push("");
    lines.push("Rollback is not automatic. To restore a device's last backup:");
    for (const device of report.rollbackCandidates) lines.push(`  fleetconf rollback ${device}`);
  }

  return lines.join("\n");
}

function formatDeviceLine(device: DeviceReport, postRun: boolean): string {
  const parts = [device.device.padEnd(16), device.deployment.status.padEnd(8)];
  if (device.diff) parts.push(`+${device.diff.added}/-${device.diff.removed}`);
  if (device.deployment.reason) parts.push(`(${device.deployment.reason})`);
  if (device.preValidation.length > 0) parts.push(`pre ${formatCounts(countValidation(device.preValidation))}`);
  if (postRun && device.postValidation.length > 0) {
    parts.push(`post ${formatCounts(countValidation(device.postValidation))}`);
  }
  return parts.join(" ").trimEnd();
}

function deviceProblems(device: DeviceReport): string[] {
  const problems: string[] = [];
  if (device.generationError) problems.push(`generate: ${device.generationError.kind}: ${device.generationError.message}`);
  if (device.previewError) problems.push(`preview: ${device.previewError.kind}: ${device.previewError.message}`);
  const error = device.deployment.error;
  if (error && error !== device.generationError) problems.push(`deploy: ${error.kind}: ${error.message}`);
  for (const result of [...device.preValidation, ...device.postValidation]) {
    if (result.status === "fail") problems.push(`${result.phase} ${result.check}: ${result.detail}`);
  }
  return problems;
}

function formatCounts(counts: { pass: number; fail: number; skip: number }): string {
  return `${counts.pass} pass, ${counts.fail} fail, ${counts.skip} skip`;
}
