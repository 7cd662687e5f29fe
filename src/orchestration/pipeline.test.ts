import { describe, expect, it, vi } from "vitest";

import { DeploymentExecutor } from "../deploy/executor.js";
import { AutoConfirmGate } from "../gates.js";
import { IntentRepository } from "../intent/repository.js";
import { InMemoryFleet, type LabDeviceOptions } from "../lab/memory.js";
import { FleetLogger, MemoryTransport } from "../logging/index.js";
import { ConfigRenderer } from "../render/renderer.js";
import { InMemoryConfigStore } from "../store/config-store.js";
import type { ConfirmationGate } from "../types.js";
import { MonotonicClock } from "../utils/clock.js";
import { ValidationRunner } from "../validation/runner.js";
import { Pipeline } from "./pipeline.js";
import { formatReport } from "./report.js";
import type { PipelineEvent } from "./types.js";

const TEMPLATE = "hostname {{hostname}}\n{{#each interfaces}}\ninterface {{name}}\n ip address {{address}} {{mask}}\n{{/each}}\nend\n";

const healthyState = {
  interfaces: { interfaces: [{ name: "Gi2", status: "up", protocol: "up" }] },
  "routing-peers": { peers: [] },
  "igp-adjacency": { neighbors: [{ neighbor: "10.0.0.2", state: "FULL/  -" }] },
  "label-distribution": { neighbors: [{ peer: "10.0.0.2:0", state: "Oper" }] },
};

function deviceDoc(tier: number, extra: Record<string, unknown> = {}) {
  return {
    role: "lab",
    tier,
    template: "router",
    interfaces: [{ name: "Gi2", address: `10.0.${tier}.1`, mask: "255.255.255.252" }],
    ...extra,
  };
}

function setup(
  options: {
    devices?: Record<string, Record<string, unknown>>;
    lab?: Record<string, LabDeviceOptions>;
    gate?: ConfirmationGate;
  } = {},
) {
  const devices = options.devices ?? { D1: deviceDoc(0), D2: deviceDoc(1), D3: deviceDoc(2) };
  const intents = IntentRepository.fromDocument({ devices });
  const clock = new MonotonicClock(() => Date.parse("2026-06-01T12:00:00.000Z"));
  const fleet = new InMemoryFleet(
    Object.fromEntries(Object.keys(devices).map((name) => [name, { state: healthyState, ...options.lab?.[name] }])),
  );
  const store = new InMemoryConfigStore(clock);
  const transport = new MemoryTransport();
  const logger = new FleetLogger({ subsystem: "test", level: "trace", transports: [transport] });
  const gate = options.gate ?? new AutoConfirmGate(true);

  const pipeline = new Pipeline({
    intents,
    renderer: new ConfigRenderer([["router", TEMPLATE]]),
    store,
    executor: new DeploymentExecutor({ sessions: fleet, store, clock, operationTimeoutMs: 1_000 }),
    validator: new ValidationRunner({ parser: fleet, operationTimeoutMs: 1_000 }),
    gate,
    clock,
    logger,
  });

  const events: PipelineEvent[] = [];
  pipeline.on((event) => events.push(event));
  return { pipeline, fleet, store, gate, events, transport };
}

describe("Pipeline", () => {
  it("runs every phase and applies in tier order", async () => {
    const { pipeline, fleet, store, events } = setup({
      devices: { D3: deviceDoc(2), D1: deviceDoc(0), D2: deviceDoc(1) },
    });

    const report = await pipeline.run();

    expect(report.success).toBe(true);
    expect(report.phases).toEqual(["GENERATE", "PRE_VALIDATE", "PREVIEW", "DEPLOY", "POST_VALIDATE", "REPORT"]);
    expect(fleet.appliedTo()).toEqual(["D1", "D2", "D3"]);
    expect(report.devices.map((d) => [d.device, d.deployment.status])).toEqual([
      ["D3", "applied"],
      ["D1", "applied"],
      ["D2", "applied"],
    ]);
    expect(report.totals).toMatchObject({ devices: 3, generated: 3, applied: 3, failed: 0, skipped: 0 });
    expect(report.totals.postValidation).toEqual({ pass: 12, fail: 0, skip: 6 });
    expect(report.rollbackCandidates).toEqual([]);
    expect(await store.readCurrent("D1")).toBe(
      "hostname D1\ninterface Gi2\n ip address 10.0.0.1 255.255.255.252\nend\n",
    );
    expect(events.filter((e) => e.type === "phase:start").map((e) => e.phase)).toEqual(report.phases);
  });

  it("halts the sequence at the first failure and never touches later devices", async () => {
    const { pipeline, fleet } = setup({ lab: { D2: { rejectApply: "% Invalid input" } } });

    const report = await pipeline.run();

    expect(report.devices.map((d) => d.deployment.status)).toEqual(["applied", "failed", "skipped"]);
    expect(report.devices[1]?.deployment.error).toEqual({
      kind: "ApplyRejected",
      message: "Device rejected configuration: % Invalid input",
      phase: "DEPLOY",
    });
    expect(report.devices[2]?.deployment.reason).toBe("halted after D2 failed");
    expect(fleet.appliedTo()).toEqual(["D1", "D2"]);
    expect(fleet.events.filter((e) => e.device === "D3").map((e) => e.operation)).toEqual([
      "connect",
      "capture",
      "disconnect",
    ]);
    expect(report.success).toBe(false);
    expect(report.rollbackCandidates).toEqual(["D2"]);
  });

  it("backs up and diffs but applies nothing in a dry run", async () => {
    const { pipeline, fleet, store } = setup();

    const report = await pipeline.run({ dryRun: true });

    expect(report.success).toBe(true);
    expect(report.postValidationRun).toBe(false);
    expect(report.phases).toEqual(["GENERATE", "PRE_VALIDATE", "PREVIEW", "DEPLOY", "REPORT"]);
    expect(fleet.appliedTo()).toEqual([]);
    expect(report.devices.every((d) => d.deployment.status === "skipped" && d.deployment.dryRun)).toBe(true);
    expect(report.devices[0]?.diff).toEqual({
      added: 2,
      removed: 0,
      linesToAdd: [" ip address 10.0.0.1 255.255.255.252", "interface Gi2"],
      linesToRemove: [],
    });
    expect(await store.listBackups("D1")).toHaveLength(1);
  });

  it("aborts before preview when the first gate declines", async () => {
    const gate = new AutoConfirmGate(false);
    const { pipeline, fleet, store, events } = setup({ gate });

    const report = await pipeline.run();

    expect(report.aborted).toBe(true);
    expect(report.success).toBe(false);
    expect(report.abortedIn).toBe("PRE_VALIDATE");
    expect(report.phases).toEqual(["GENERATE", "PRE_VALIDATE", "ABORTED"]);
    expect(gate.prompts).toHaveLength(1);
    expect(fleet.events.filter((e) => e.operation !== "connect" && e.operation !== "disconnect")).toEqual([]);
    expect(await store.listBackups("D1")).toEqual([]);
    expect(report.devices[0]?.deployment).toEqual({
      device: "D1",
      status: "skipped",
      reason: "aborted in PRE_VALIDATE",
    });
    expect(events.at(-1)).toMatchObject({ type: "pipeline:aborted", phase: "PRE_VALIDATE" });
  });

  it("aborts before deploy when the second gate declines", async () => {
    const confirm = vi.fn<(prompt: string) => Promise<boolean>>();
    confirm.mockResolvedValueOnce(true).mockResolvedValueOnce(false);
    const { pipeline, fleet } = setup({ gate: { confirm } });

    const report = await pipeline.run();

    expect(confirm).toHaveBeenCalledTimes(2);
    expect(confirm.mock.calls[1]?.[0]).toBe("Apply configuration to 3 device(s) (3 with changes)?");
    expect(report.abortedIn).toBe("PREVIEW");
    expect(report.devices[0]?.diff?.added).toBe(2);
    expect(fleet.appliedTo()).toEqual([]);
  });

  it("skips devices that cannot be generated and carries on", async () => {
    const { pipeline, fleet } = setup({
      devices: { D1: deviceDoc(0), BAD: deviceDoc(1, { template: "missing" }) },
    });

    const report = await pipeline.run({ devices: ["D1", "BAD", "GHOST"] });

    expect(report.devices.map((d) => [d.device, d.generation, d.deployment.status])).toEqual([
      ["D1", "generated", "applied"],
      ["BAD", "failed", "skipped"],
      ["GHOST", "failed", "skipped"],
    ]);
    expect(report.devices[1]?.generationError).toEqual({
      kind: "TemplateError",
      message: 'Template "missing" not found',
      phase: "GENERATE",
    });
    expect(report.devices[2]?.generationError?.kind).toBe("IntentNotFound");
    expect(report.success).toBe(true);
    expect(fleet.appliedTo()).toEqual(["D1"]);
  });

  it("reports a failed config write as a store failure, not a template error", async () => {
    const { pipeline, fleet, store } = setup();
    const save = store.save.bind(store);
    vi.spyOn(store, "save").mockImplementation((device, text) =>
      device === "D2" ? Promise.reject(new Error("ENOSPC: no space left on device")) : save(device, text),
    );

    const report = await pipeline.run();

    expect(report.devices[1]?.generation).toBe("failed");
    expect(report.devices[1]?.generationError).toEqual({
      kind: "StoreFailure",
      message: "Cannot store rendered config: ENOSPC: no space left on device",
      phase: "GENERATE",
    });
    expect(fleet.appliedTo()).toEqual(["D1", "D3"]);
  });

  it("aborts the deploy on a contradictory order", async () => {
    const { pipeline, fleet } = setup({
      devices: { A: deviceDoc(1, { dependsOn: ["B"] }), B: deviceDoc(1, { dependsOn: ["A"] }) },
    });

    const report = await pipeline.run();

    expect(report.abortedIn).toBe("DEPLOY");
    expect(report.abortReason).toBe("Contradictory deployment order: A → B → A");
    expect(report.devices.map((d) => d.deployment.error?.kind)).toEqual(["CyclicDependency", "CyclicDependency"]);
    expect(fleet.appliedTo()).toEqual([]);
  });

  it("offers rollback for applied devices that fail post-validation", async () => {
    const { pipeline } = setup({
      lab: {
        D3: {
          state: { ...healthyState, "igp-adjacency": { neighbors: [{ neighbor: "10.0.0.9", state: "EXSTART" }] } },
        },
      },
    });

    const report = await pipeline.run();

    expect(report.totals.applied).toBe(3);
    expect(report.totals.postValidation.fail).toBe(1);
    expect(report.success).toBe(false);
    expect(report.rollbackCandidates).toEqual(["D3"]);
    expect(formatReport(report)).toContain("\n  fleetconf rollback D3");
  });

  it("logs listener errors instead of failing the run", async () => {
    const { pipeline, transport } = setup();
    pipeline.on(() => {
      throw new Error("listener broke");
    });

    const report = await pipeline.run({ devices: ["D1"] });

    expect(report.success).toBe(true);
    expect(transport.entries.some((e) => e.level === "warn" && e.metadata?.error === "listener broke")).toBe(true);
  });
});
