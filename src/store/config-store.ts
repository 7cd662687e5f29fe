/**
 * Config Store (filesystem + in-memory)
 *
 * Holds the rendered config per device and an append-only history of
 * captured live configs. Backups are never overwritten or deleted.
 */

import fs from "node:fs/promises";
import path from "node:path";

import type { Backup, BackupHandle, DeviceName, GeneratedConfig } from "../types.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { isNotFound, readIfExists } from "../utils/fs.js";

export interface ConfigStore {
  /** Store the current rendered config, replacing any previous one. */
  save(device: DeviceName, text: string): Promise<GeneratedConfig>;
  readCurrent(device: DeviceName): Promise<string | null>;
  /** Append a backup. Resolves only once the backup is durably written. */
  backup(device: DeviceName, text: string): Promise<BackupHandle>;
  /** Most recent backup with `capturedAt` strictly before `before` (default: now). */
  latestBackup(device: DeviceName, before?: Date): Promise<Backup | null>;
  /** Backups for a device, oldest first. */
  listBackups(device: DeviceName): Promise<BackupHandle[]>;
}

// ── InMemory ────────────────────────────────────────────────────

export class InMemoryConfigStore implements ConfigStore {
  private current = new Map<DeviceName, GeneratedConfig>();
  private backups = new Map<DeviceName, Backup[]>();

  constructor(private readonly clock: Clock = systemClock) {}

  async save(device: DeviceName, text: string): Promise<GeneratedConfig> {
    const record = { device, text, generatedAt: this.clock.now().toISOString() };
    this.current.set(device, record);
    return { ...record };
  }

  async readCurrent(device: DeviceName): Promise<string | null> {
    return this.current.get(device)?.text ?? null;
  }

  async backup(device: DeviceName, text: string): Promise<BackupHandle> {
    const capturedAt = this.clock.now().toISOString();
    const list = this.backups.get(device) ?? [];
    list.push({ device, text, capturedAt });
    this.backups.set(device, list);
    return { device, capturedAt, location: `memory:${device}/${list.length - 1}` };
  }

  async latestBackup(device: DeviceName, before?: Date): Promise<Backup | null> {
    const cutoff = (before ?? this.clock.now()).getTime();
    const list = this.backups.get(device) ?? [];
    for (let i = list.length - 1; i >= 0; i--) {
      const entry = list[i];
      if (entry && Date.parse(entry.capturedAt) < cutoff) return { ...entry };
    }
    return null;
  }

  async listBackups(device: DeviceName): Promise<BackupHandle[]> {
    return (this.backups.get(device) ?? []).map((b, i) => ({
      device,
      capturedAt: b.capturedAt,
      location: `memory:${device}/${i}`,
    }));
  }
}

// ── Filesystem ──────────────────────────────────────────────────

export type FileConfigStoreOptions = {
  generatedDir: string;
  backupDir: string;
  clock?: Clock;
};

export class FileConfigStore implements ConfigStore {
  private readonly generatedDir: string;
  private readonly backupDir: string;
  private readonly clock: Clock;

  constructor(options: FileConfigStoreOptions) {
    this.generatedDir = options.generatedDir;
    this.backupDir = options.backupDir;
    this.clock = options.clock ?? systemClock;
  }

  async save(device: DeviceName, text: string): Promise<GeneratedConfig> {
    await fs.mkdir(this.generatedDir, { recursive: true });
    await fs.writeFile(this.generatedPath(device), text, "utf8");
    return { device, text, generatedAt: this.clock.now().toISOString() };
  }

  async readCurrent(device: DeviceName): Promise<string | null> {
    return readIfExists(this.generatedPath(device));
  }

  generatedPath(device: DeviceName): string {
    return path.join(this.generatedDir, `${device}.cfg`);
  }

  async backup(device: DeviceName, text: string): Promise<BackupHandle> {
    await fs.mkdir(this.backupDir, { recursive: true });
    const captured = this.clock.now();
    const location = path.join(this.backupDir, `${device}_${compactTimestamp(captured)}.cfg`);

    // "wx" fails if the file exists, so a backup is never replaced.
    const handle = await fs.open(location, "wx");
    try {
      await handle.writeFile(text, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }

    return { device, capturedAt: captured.toISOString(), location };
  }

  async latestBackup(device: DeviceName, before?: Date): Promise<Backup | null> {
    const cutoff = (before ?? this.clock.now()).getTime();
    const candidates = (await this.listBackups(device)).filter((b) => Date.parse(b.capturedAt) < cutoff);
    const latest = candidates.at(-1);
    if (!latest) return null;

    const text = await fs.readFile(latest.location, "utf8");
    return { device, text, capturedAt: latest.capturedAt };
  }

  async listBackups(device: DeviceName): Promise<BackupHandle[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.backupDir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const handles: BackupHandle[] = [];
    for (const name of names) {
      const parsed = parseBackupFileName(name);
      if (parsed && parsed.device === device) {
        handles.push({ device, capturedAt: parsed.capturedAt, location: path.join(this.backupDir, name) });
      }
    }
    return handles.sort((a, b) => Date.parse(a.capturedAt) - Date.parse(b.capturedAt));
  }
}

// =============================================================================
// Backup file names
// =============================================================================

const COMPACT_TIMESTAMP = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(\d{3})Z$/;

/** 2026-10-19T10:15:02.123Z -> 20261019T101502123Z */
export function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:.]/g, "");
}

/**
 * Split `<device>_<timestamp>.cfg` on the last underscore, so device names
 * may themselves contain underscores.
 */
export function parseBackupFileName(name: string): { device: DeviceName; capturedAt: string } | null {
  if (!name.endsWith(".cfg")) return null;
  const stem = name.slice(0, -".cfg".length);
  const split = stem.lastIndexOf("_");
  if (split <= 0) return null;

  const match = COMPACT_TIMESTAMP.exec(stem.slice(split + 1));
  if (!match) return null;
  const [, year, month, day, hour, minute, second, millis] = match;
  return {
    device: stem.slice(0, split),
    capturedAt: `${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}Z`,
  };
}
