/**
 * Rollback
 *
 * Restores a device to its most recent backup. Never triggered
 * automatically; the operator asks for it per device.
 */

import { ApplyRejectedError, BackupFailureError, errorMessage, toFleetError } from "../errors.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import type { ConfigStore } from "../store/config-store.js";
import type { Backup, BackupHandle, Device, DeviceName, ErrorDetail, SessionProvider } from "../types.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { withDeviceSession } from "./sessions.js";

export type RollbackStatus = "rolled-back" | "failed";

export type RollbackResult = {
  device: DeviceName;
  status: RollbackStatus;
  /** Capture time of the backup that was pushed. */
  restoredFrom?: string;
  /** Backup of the config that was live just before the rollback. */
  preRollbackBackup?: BackupHandle;
  error?: ErrorDetail;
};

export type RollbackOptions = {
  sessions: SessionProvider;
  store: ConfigStore;
  clock?: Clock;
  operationTimeoutMs?: number;
  logger?: Logger;
};

export async function rollbackDevice(device: Device, options: RollbackOptions): Promise<RollbackResult> {
  const clock = options.clock ?? systemClock;
  const log = (options.logger ?? createSilentLogger()).withContext({ device: device.name });
  const base = { device: device.name };

  let backup: Backup | null;
  try {
    backup = await options.store.latestBackup(device.name, clock.now());
  } catch (error) {
    const failure = new BackupFailureError(`Cannot read backups for ${device.name}: ${errorMessage(error)}`, device.name, {
      cause: error,
    });
    log.error(failure.message);
    return { ...base, status: "failed", error: failure.toDetail() };
  }

  if (!backup) {
    const missing = new BackupFailureError(`No backup available for ${device.name}`, device.name);
    log.error(missing.message);
    return { ...base, status: "failed", error: missing.toDetail() };
  }
  const selected = backup;

  let preRollbackBackup: BackupHandle | undefined;
  try {
    await withDeviceSession(
      options.sessions,
      device,
      { timeoutMs: options.operationTimeoutMs ?? 30_000, logger: log },
      async (session) => {
        const live = await session.capture();
        try {
          preRollbackBackup = await options.store.backup(device.name, live);
        } catch (error) {
          throw new BackupFailureError(`Pre-rollback backup failed: ${errorMessage(error)}`, device.name, {
            cause: error,
          });
        }

        const outcome = await session.apply(selected.text);
        if (!outcome.ok) {
          throw new ApplyRejectedError(`Device rejected rollback: ${outcome.message}`, device.name);
        }
        await session.persist();
      },
    );
  } catch (error) {
    const failure = toFleetError(error, device.name);
    log.error(`Rollback failed: ${failure.message}`, { kind: failure.kind });
    return { ...base, status: "failed", restoredFrom: selected.capturedAt, preRollbackBackup, error: failure.toDetail() };
  }

  log.info(`Rolled back to backup from ${selected.capturedAt}`);
  return { ...base, status: "rolled-back", restoredFrom: selected.capturedAt, preRollbackBackup };
}
