/**
 * Deployment Executor
 *
 * Applies one device's desired config: connect, capture, back up, then
 * either report the diff (dry run) or push and persist. The backup is
 * always stored before anything is pushed.
 */

import { diffConfigs, summarizeDiff } from "../diff/engine.js";
import {
  ApplyRejectedError,
  BackupFailureError,
  err,
  errorMessage,
  ok,
  SessionError,
  toFleetError,
  type FleetError,
  type Result,
} from "../errors.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import type { ConfigStore } from "../store/config-store.js";
import type { BackupHandle, DeploymentResult, Device, DiffSummary, SessionProvider } from "../types.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { withDeviceSession, type BoundedSession } from "./sessions.js";

export type ExecutorOptions = {
  sessions: SessionProvider;
  store: ConfigStore;
  clock?: Clock;
  /** Bound for every session operation; 0 disables it. */
  operationTimeoutMs?: number;
  logger?: Logger;
};

export class DeploymentExecutor {
  private readonly sessions: SessionProvider;
  private readonly store: ConfigStore;
  private readonly clock: Clock;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ExecutorOptions) {
    this.sessions = options.sessions;
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.timeoutMs = options.operationTimeoutMs ?? 30_000;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Deploy `desiredText` to `device`. Never throws: every failure is
   * reported in the result.
   */
  async apply(device: Device, desiredText: string, dryRun = false): Promise<DeploymentResult> {
    const log = this.logger.withContext({ device: device.name });
    try {
      return await withDeviceSession(this.sessions, device, { timeoutMs: this.timeoutMs, logger: log }, (session) =>
        this.applyWithSession(device, session, desiredText, dryRun, log),
      );
    } catch (error) {
      const failure = toFleetError(error, device.name);
      log.error(`Deployment failed: ${failure.message}`, { kind: failure.kind });
      return { device: device.name, status: "failed", error: failure.toDetail("DEPLOY") };
    }
  }

  /** Capture the live config and store it as a backup. */
  async captureBackup(device: Device): Promise<Result<BackupHandle, FleetError>> {
    const log = this.logger.withContext({ device: device.name });
    try {
      const handle = await withDeviceSession(
        this.sessions,
        device,
        { timeoutMs: this.timeoutMs, logger: log },
        async (session) => this.writeBackup(device, await session.capture()),
      );
      log.info(`Backed up to ${handle.location}`);
      return ok(handle);
    } catch (error) {
      return err(toFleetError(error, device.name));
    }
  }

  /** Read-only: capture the live config and diff it against `desiredText`. */
  async preview(device: Device, desiredText: string): Promise<Result<DiffSummary, FleetError>> {
    const log = this.logger.withContext({ device: device.name });
    try {
      const live = await withDeviceSession(this.sessions, device, { timeoutMs: this.timeoutMs, logger: log }, (s) =>
        s.capture(),
      );
      return ok(summarizeDiff(diffConfigs(live, desiredText)));
    } catch (error) {
      return err(toFleetError(error, device.name));
    }
  }

  private async applyWithSession(
    device: Device,
    session: BoundedSession,
    desiredText: string,
    dryRun: boolean,
    log: Logger,
  ): Promise<DeploymentResult> {
    const live = await session.capture();
    const backup = await this.writeBackup(device, live);
    const diff = summarizeDiff(diffConfigs(live, desiredText));

    if (dryRun) {
      log.info(`Dry run: ${diff.added} to add, ${diff.removed} to remove`);
      return { device: device.name, status: "skipped", reason: "dry-run", dryRun: true, diff, backup };
    }

    const attemptedAt = this.clock.now().toISOString();
    const outcome = await session.apply(desiredText);
    if (!outcome.ok) {
      const rejected = new ApplyRejectedError(`Device rejected configuration: ${outcome.message}`, device.name);
      log.error(rejected.message);
      return { device: device.name, status: "failed", error: rejected.toDetail("DEPLOY"), diff, backup, attemptedAt };
    }

    try {
      if (!(await session.persist())) log.debug("Device has no persist step");
    } catch (error) {
      const detail = new SessionError(
        `Configuration applied but not persisted: ${errorMessage(error)}`,
        device.name,
        { cause: error },
      ).toDetail("DEPLOY");
      log.error(detail.message);
      return { device: device.name, status: "failed", error: detail, diff, backup, attemptedAt };
    }

    log.info(`Applied (${diff.added} added, ${diff.removed} removed)`);
    return { device: device.name, status: "applied", diff, backup, attemptedAt };
  }

  private async writeBackup(device: Device, text: string): Promise<BackupHandle> {
    try {
      return await this.store.backup(device.name, text);
    } catch (error) {
      throw new BackupFailureError(`Backup failed for ${device.name}: ${errorMessage(error)}`, device.name, {
        cause: error,
      });
    }
  }
}
