/**
 * Pipeline
 *
 * Drives one run through GENERATE → PRE_VALIDATE → PREVIEW → DEPLOY →
 * POST_VALIDATE → REPORT. The confirmation gate is asked before PREVIEW and
 * before DEPLOY; a "no" at either point aborts the run. DEPLOY is strictly
 * sequential and halts at the first live failure.
 */

import { randomUUID } from "node:crypto";

import type { DeploymentExecutor } from "../deploy/executor.js";
import { DeploymentPlanner } from "../deploy/planner.js";
import { CyclicDependencyError, errorMessage, FleetError, StoreError, TemplateError, toFleetError } from "../errors.js";
import type { IntentRepository } from "../intent/repository.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import type { ConfigRenderer } from "../render/renderer.js";
import type { ConfigStore } from "../store/config-store.js";
import type {
  ConfirmationGate,
  DeploymentResult,
  Device,
  DeviceName,
  DiffSummary,
  ErrorDetail,
  PipelinePhase,
  ValidationResult,
} from "../types.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { processPooled } from "../utils/concurrency.js";
import { countValidation, type ValidationRunner } from "../validation/runner.js";
import { buildReport } from "./report.js";
import type {
  DeviceReport,
  PipelineEvent,
  PipelineEventListener,
  PipelineReport,
  PipelineRunOptions,
} from "./types.js";

export type PipelineDeps = {
  intents: IntentRepository;
  renderer: ConfigRenderer;
  store: ConfigStore;
  executor: DeploymentExecutor;
  validator: ValidationRunner;
  gate: ConfirmationGate;
  planner?: DeploymentPlanner;
  concurrency?: number;
  clock?: Clock;
  logger?: Logger;
};

/** Mutable per-device state while a run is in progress. */
type DeviceState = {
  name: DeviceName;
  device?: Device;
  desired?: string;
  generationError?: ErrorDetail;
  diff?: DiffSummary;
  previewError?: ErrorDetail;
  deployment?: DeploymentResult;
  preValidation: ValidationResult[];
  postValidation: ValidationResult[];
};

class PipelineAbort extends Error {
  constructor(readonly phase: PipelinePhase, readonly reason: string) {
    super(reason);
    this.name = "PipelineAbort";
  }
}

export class Pipeline {
  private readonly deps: PipelineDeps;
  private readonly planner: DeploymentPlanner;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private listeners: PipelineEventListener[] = [];

  constructor(deps: PipelineDeps) {
    this.deps = deps;
    this.planner = deps.planner ?? new DeploymentPlanner();
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createSilentLogger();
  }

  /** Subscribe to lifecycle events. Returns an unsubscribe function. */
  on(listener: PipelineEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async run(options: PipelineRunOptions = {}): Promise<PipelineReport> {
    const runId = randomUUID();
    const dryRun = options.dryRun ?? false;
    const startedAt = this.clock.now().toISOString();
    const log = this.logger.withContext({ runId });
    const phases: PipelinePhase[] = [];
    const states = this.initialStates(options.devices);
    let postValidationRun = false;
    let abort: { phase: PipelinePhase; reason: string } | undefined;

    const enter = (phase: PipelinePhase, message: string) => {
      phases.push(phase);
      log.withContext({ phase }).info(message);
      this.emit({ type: "phase:start", phase, timestamp: this.timestamp(), message });
    };
    const leave = (phase: PipelinePhase, message: string) => {
      log.withContext({ phase }).info(message);
      this.emit({ type: "phase:complete", phase, timestamp: this.timestamp(), message });
    };

    log.info(`Starting ${dryRun ? "dry run" : "run"} for ${states.length} device(s)`);

    try {
      // ── GENERATE ──
      enter("GENERATE", `Rendering ${states.length} device(s)`);
      await this.generate(states);
      const generated = states.filter((s) => s.device && s.desired !== undefined);
      leave("GENERATE", `${generated.length}/${states.length} device(s) rendered`);

      // ── PRE_VALIDATE ──
      enter("PRE_VALIDATE", "Running pre-deployment checks");
      const pre = await this.validate(generated, "pre");
      const preCounts = countValidation(pre);
      leave("PRE_VALIDATE", `Pre-validation: ${preCounts.pass} pass, ${preCounts.fail} fail, ${preCounts.skip} skip`);
      await this.confirm(
        "PRE_VALIDATE",
        `Pre-validation finished (${preCounts.fail} failing check(s)). Preview changes for ${generated.length} device(s)?`,
      );

      // ── PREVIEW ──
      enter("PREVIEW", `Capturing live configs for ${generated.length} device(s)`);
      await this.preview(generated);
      const changed = generated.filter((s) => s.diff && s.diff.added + s.diff.removed > 0).length;
      leave("PREVIEW", `${changed} device(s) with changes`);
      await this.confirm(
        "PREVIEW",
        dryRun
          ? `Dry run: back up and diff ${generated.length} device(s) without applying?`
          : `Apply configuration to ${generated.length} device(s) (${changed} with changes)?`,
      );

      // ── DEPLOY ──
      enter("DEPLOY", dryRun ? "Dry-run deployment" : "Deploying in tier order");
      await this.deploy(generated, dryRun, log);
      leave("DEPLOY", "Deployment finished");

      // ── POST_VALIDATE ──
      if (!dryRun) {
        enter("POST_VALIDATE", "Running post-deployment checks");
        const post = await this.validate(generated, "post");
        postValidationRun = true;
        const postCounts = countValidation(post);
        leave(
          "POST_VALIDATE",
          `Post-validation: ${postCounts.pass} pass, ${postCounts.fail} fail, ${postCounts.skip} skip`,
        );
      }

      enter("REPORT", "Building report");
    } catch (error) {
      if (!(error instanceof PipelineAbort)) throw error;
      abort = { phase: error.phase, reason: error.reason };
      phases.push("ABORTED");
      log.warn(`Run aborted in ${error.phase}: ${error.reason}`);
      this.emit({ type: "pipeline:aborted", phase: error.phase, timestamp: this.timestamp(), message: error.reason });
    }

    const report = buildReport({
      runId,
      startedAt,
      completedAt: this.timestamp(),
      dryRun,
      phases,
      postValidationRun,
      devices: states.map((s) => this.toDeviceReport(s, abort)),
      abort,
    });

    if (!abort) leave("REPORT", report.success ? "Run succeeded" : "Run finished with failures");
    return report;
  }

  // ===========================================================================
  // Phases
  // ===========================================================================

  private initialStates(requested?: readonly DeviceName[]): DeviceState[] {
    const names = requested ? [...new Set(requested)] : this.deps.intents.names();
    return names.map((name) => ({ name, preValidation: [], postValidation: [] }));
  }

  private async generate(states: DeviceState[]): Promise<void> {
    await processPooled(
      states,
      async (state) => {
        const intent = this.deps.intents.get(state.name);
        if (!intent.ok) {
          state.generationError = intent.error.toDetail("GENERATE");
          this.deviceResult("GENERATE", state.name, "failed", intent.error.message);
          return;
        }

        const { device } = intent.value;
        const fail = (failure: FleetError) => {
          state.generationError = failure.toDetail("GENERATE");
          this.deviceResult("GENERATE", device.name, "failed", failure.message);
        };

        let text: string;
        try {
          text = this.deps.renderer.render(intent.value);
        } catch (error) {
          fail(
            toFleetError(error, device.name, (message, name, options) =>
              new TemplateError(message, name, device.template, options),
            ),
          );
          return;
        }

        try {
          await this.deps.store.save(device.name, text);
        } catch (error) {
          fail(
            toFleetError(error, device.name, (message, name, options) =>
              new StoreError(`Cannot store rendered config: ${message}`, name, options),
            ),
          );
          return;
        }

        state.device = device;
        state.desired = text;
        this.deviceResult("GENERATE", device.name, "generated", "Rendered");
      },
      this.deps.concurrency,
    );
  }

  private async validate(states: DeviceState[], phase: "pre" | "post"): Promise<ValidationResult[]> {
    const devices = states.flatMap((s) => (s.device ? [s.device] : []));
    const results = await this.deps.validator.runChecks(devices, phase);
    for (const state of states) {
      const own = results.filter((r) => r.device === state.name);
      if (phase === "pre") state.preValidation = own;
      else state.postValidation = own;
    }
    return results;
  }

  private async preview(states: DeviceState[]): Promise<void> {
    await processPooled(
      states,
      async (state) => {
        if (!state.device || state.desired === undefined) return;
        const result = await this.deps.executor.preview(state.device, state.desired);
        if (result.ok) {
          state.diff = result.value;
          this.deviceResult("PREVIEW", state.name, "previewed", `+${result.value.added}/-${result.value.removed}`);
        } else {
          state.previewError = result.error.toDetail("PREVIEW");
          this.deviceResult("PREVIEW", state.name, "failed", result.error.message);
        }
      },
      this.deps.concurrency,
    );
  }

  private async deploy(states: DeviceState[], dryRun: boolean, log: Logger): Promise<void> {
    const byName = new Map(states.map((s) => [s.name, s]));
    const devices = states.flatMap((s) => (s.device ? [s.device] : []));

    let order: Device[];
    try {
      order = this.planner.plan(devices);
    } catch (error) {
      if (!(error instanceof CyclicDependencyError)) throw error;
      for (const state of states) {
        state.deployment = {
          device: state.name,
          status: "skipped",
          reason: "contradictory deployment order",
          error: error.toDetail("DEPLOY"),
        };
      }
      throw new PipelineAbort("DEPLOY", error.message);
    }

    let haltedBy: DeviceName | undefined;
    for (const device of order) {
      const state = byName.get(device.name);
      if (!state || state.desired === undefined) continue;

      if (haltedBy) {
        state.deployment = { device: device.name, status: "skipped", reason: `halted after ${haltedBy} failed` };
        this.deviceResult("DEPLOY", device.name, "skipped", state.deployment.reason ?? "halted");
        continue;
      }

      const result = await this.deps.executor.apply(device, state.desired, dryRun);
      state.deployment = result;
      this.deviceResult("DEPLOY", device.name, result.status, result.error?.message ?? result.reason ?? result.status);

      if (result.status === "failed" && !dryRun) {
        haltedBy = device.name;
        log.withContext({ device: device.name, phase: "DEPLOY" }).error("Halting deployment after failure");
      }
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async confirm(phase: PipelinePhase, prompt: string): Promise<void> {
    let answer: boolean;
    try {
      answer = await this.deps.gate.confirm(prompt);
    } catch (error) {
      throw new PipelineAbort(phase, `Confirmation failed: ${errorMessage(error)}`);
    }
    if (!answer) throw new PipelineAbort(phase, "Declined at confirmation gate");
  }

  private toDeviceReport(state: DeviceState, abort?: { phase: PipelinePhase }): DeviceReport {
    const deployment: DeploymentResult =
      state.deployment ??
      (state.generationError
        ? { device: state.name, status: "skipped", reason: "not generated", error: state.generationError }
        : { device: state.name, status: "skipped", reason: abort ? `aborted in ${abort.phase}` : "not deployed" });

    return {
      device: state.name,
      generation: state.generationError ? "failed" : "generated",
      ...(state.generationError ? { generationError: state.generationError } : {}),
      ...(state.diff ? { diff: state.diff } : {}),
      ...(state.previewError ? { previewError: state.previewError } : {}),
      deployment,
      preValidation: state.preValidation,
      postValidation: state.postValidation,
    };
  }

  private deviceResult(phase: PipelinePhase, device: DeviceName, status: string, message: string): void {
    this.emit({ type: "device:result", phase, device, status, timestamp: this.timestamp(), message });
  }

  private emit(event: PipelineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn(`Pipeline event listener failed on ${event.type}`, { error: errorMessage(error) });
      }
    }
  }

  private timestamp(): string {
    return this.clock.now().toISOString();
  }
}
