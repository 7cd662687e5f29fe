import { describe, expect, it } from "vitest";

import { InMemoryFleet } from "../lab/memory.js";
import { InMemoryConfigStore, type ConfigStore } from "../store/config-store.js";
import type { Device } from "../types.js";
import { MonotonicClock } from "../utils/clock.js";
import { DeploymentExecutor } from "./executor.js";
import { rollbackDevice } from "./rollback.js";

function device(name: string): Device {
  return {
    name,
    role: "core",
    tier: 0,
    template: "t",
    interfaces: [],
    peers: [],
    partitions: [],
    dependsOn: [],
    attributes: {},
  };
}

const DESIRED = "hostname R1\ninterface Gi2\n ip address 10.0.0.1 255.255.255.252\nend\n";
const LIVE = "hostname R1\nend\n";

function setup(options: { fleet?: InMemoryFleet; store?: ConfigStore; timeoutMs?: number } = {}) {
  const clock = new MonotonicClock(() => Date.parse("2026-05-01T00:00:00.000Z"));
  const fleet = options.fleet ?? new InMemoryFleet({ R1: { running: LIVE } });
  const store = options.store ?? new InMemoryConfigStore(clock);
  const executor = new DeploymentExecutor({
    sessions: fleet,
    store,
    clock,
    operationTimeoutMs: options.timeoutMs ?? 1_000,
  });
  return { clock, fleet, store, executor };
}

describe("DeploymentExecutor.apply", () => {
  it("backs up the live config before applying and persists", async () => {
    const { fleet, store, executor } = setup();

    const result = await executor.apply(device("R1"), DESIRED);

    expect(result.status).toBe("applied");
    expect(result.diff).toEqual({
      added: 2,
      removed: 0,
      linesToAdd: [" ip address 10.0.0.1 255.255.255.252", "interface Gi2"],
      linesToRemove: [],
    });
    expect(fleet.running("R1")).toBe(DESIRED);
    expect(fleet.startup("R1")).toBe(DESIRED);
    expect(fleet.events.map((e) => e.operation)).toEqual(["connect", "capture", "apply", "persist", "disconnect"]);

    const backups = await store.listBackups("R1");
    expect(backups).toHaveLength(1);
    expect(result.backup).toEqual(backups[0]);
    expect(result.attemptedAt).toBeDefined();
    expect(Date.parse(backups[0]?.capturedAt ?? "")).toBeLessThan(Date.parse(result.attemptedAt ?? ""));
    expect((await store.latestBackup("R1"))?.text).toBe(LIVE);
  });

  it("does not push anything in a dry run", async () => {
    const { fleet, store, executor } = setup();

    const result = await executor.apply(device("R1"), DESIRED, true);

    expect(result).toMatchObject({ status: "skipped", reason: "dry-run", dryRun: true });
    expect(result.diff?.added).toBe(2);
    expect(result.attemptedAt).toBeUndefined();
    expect(fleet.running("R1")).toBe(LIVE);
    expect(fleet.appliedTo()).toEqual([]);
    expect(await store.listBackups("R1")).toHaveLength(1);
  });

  it("never applies when the backup cannot be written", async () => {
    const store = new InMemoryConfigStore();
    store.backup = async () => {
      throw new Error("disk full");
    };
    const { fleet, executor } = setup({ store });

    const result = await executor.apply(device("R1"), DESIRED);

    expect(result.status).toBe("failed");
    expect(result.error).toEqual({
      kind: "BackupFailure",
      message: "Backup failed for R1: disk full",
      phase: "DEPLOY",
    });
    expect(fleet.appliedTo()).toEqual([]);
    expect(fleet.events.at(-1)?.operation).toBe("disconnect");
  });

  it("reports a rejected apply", async () => {
    const fleet = new InMemoryFleet({ R1: { running: LIVE, rejectApply: "% Invalid input" } });
    const { executor } = setup({ fleet });

    const result = await executor.apply(device("R1"), DESIRED);

    expect(result.status).toBe("failed");
    expect(result.error?.kind).toBe("ApplyRejected");
    expect(result.error?.message).toBe("Device rejected configuration: % Invalid input");
    expect(fleet.running("R1")).toBe(LIVE);
  });

  it("reports an unreachable device as a session error", async () => {
    const fleet = new InMemoryFleet({ R1: { unreachable: true } });
    const { executor } = setup({ fleet });

    const result = await executor.apply(device("R1"), DESIRED);

    expect(result).toEqual({
      device: "R1",
      status: "failed",
      error: { kind: "SessionError", message: "R1 is unreachable", phase: "DEPLOY" },
    });
  });

  it("turns a slow operation into a session error", async () => {
    const fleet = new InMemoryFleet({ R1: { delayMs: 200 } });
    const { executor } = setup({ fleet, timeoutMs: 20 });

    const result = await executor.apply(device("R1"), DESIRED);

    expect(result.error).toEqual({
      kind: "SessionError",
      message: "connect on R1 timed out after 20ms",
      phase: "DEPLOY",
    });
  });

  it("skips persist when the device has none, and fails when persist fails", async () => {
    const fleet = new InMemoryFleet({ R1: { noPersist: true }, R2: { failPersist: "NVRAM busy" } });
    const { executor } = setup({ fleet });

    expect((await executor.apply(device("R1"), DESIRED)).status).toBe("applied");
    const r2 = await executor.apply(device("R2"), DESIRED);
    expect(r2.status).toBe("failed");
    expect(r2.error?.kind).toBe("SessionError");
    expect(r2.error?.message).toMatch(/^Configuration applied but not persisted: persist failed on R2: NVRAM busy$/);
  });
});

describe("DeploymentExecutor helpers", () => {
  it("captures a backup without touching the device config", async () => {
    const { fleet, store, executor } = setup();
    const result = await executor.captureBackup(device("R1"));
    expect(result.ok).toBe(true);
    expect((await store.latestBackup("R1"))?.text).toBe(LIVE);
    expect(fleet.appliedTo()).toEqual([]);
  });

  it("previews the diff read-only", async () => {
    const { executor, store } = setup();
    const result = await executor.preview(device("R1"), LIVE);
    expect(result).toEqual({ ok: true, value: { added: 0, removed: 0, linesToAdd: [], linesToRemove: [] } });
    expect(await store.listBackups("R1")).toEqual([]);
  });
});

describe("rollbackDevice", () => {
  it("restores the backup byte-for-byte and keeps a pre-rollback backup", async () => {
    const original = "hostname R1\n! keep this comment\ninterface Gi9\n shutdown  \nend\n";
    const fleet = new InMemoryFleet({ R1: { running: original } });
    const { clock, store, executor } = setup({ fleet });

    expect((await executor.apply(device("R1"), DESIRED)).status).toBe("applied");
    expect(fleet.running("R1")).toBe(DESIRED);

    const result = await rollbackDevice(device("R1"), { sessions: fleet, store, clock });

    expect(result.status).toBe("rolled-back");
    expect(fleet.running("R1")).toBe(original);
    expect(fleet.startup("R1")).toBe(original);
    expect(result.preRollbackBackup).toBeDefined();

    const backups = await store.listBackups("R1");
    expect(backups).toHaveLength(2);
    expect(result.restoredFrom).toBe(backups[0]?.capturedAt);
    expect((await store.latestBackup("R1"))?.text).toBe(DESIRED);
  });

  it("fails without a backup", async () => {
    const { fleet, store } = setup();
    const result = await rollbackDevice(device("R1"), { sessions: fleet, store });
    expect(result).toEqual({
      device: "R1",
      status: "failed",
      error: { kind: "BackupFailure", message: "No backup available for R1" },
    });
    expect(fleet.events).toEqual([]);
  });

  it("reports a rejected rollback push", async () => {
    const { fleet, store, clock, executor } = setup();
    await executor.captureBackup(device("R1"));
    fleet.update("R1", { rejectApply: "locked" });

    const result = await rollbackDevice(device("R1"), { sessions: fleet, store, clock });
    expect(result.status).toBe("failed");
    expect(result.error?.kind).toBe("ApplyRejected");
    expect(result.preRollbackBackup).toBeDefined();
  });
});
