/**
 * File-backed lab fleet.
 *
 * Layout under the lab directory:
 *   running/<device>.cfg   live config, replaced on apply
 *   startup/<device>.cfg   saved config, written on persist
 *   state/<device>.json    protocol state served to the validation checks
 */

import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { formatIssue } from "../config/config.js";
import { errorMessage, ParseUnavailableError, SessionError } from "../errors.js";
import type { CheckCategory, Device, DeviceName, OutputParser, ParseOutcome, Session, SessionProvider } from "../types.js";
import { readIfExists } from "../utils/fs.js";

export const labStateSchema = z
  .object({
    unreachable: z.boolean().default(false),
    rejectApply: z.string().optional(),
    unparseable: z
      .array(z.enum(["reachability", "interfaces", "routing-peers", "igp-adjacency", "label-distribution", "partitions"]))
      .default([]),
    protocols: z
      .object({
        reachability: z.unknown(),
        interfaces: z.unknown(),
        "routing-peers": z.unknown(),
        "igp-adjacency": z.unknown(),
        "label-distribution": z.unknown(),
        partitions: z.unknown(),
      })
      .partial()
      .strict()
      .default({}),
  })
  .strict();

export type LabState = z.output<typeof labStateSchema>;

export class FileFleet implements SessionProvider, OutputParser {
  constructor(private readonly dir: string) {}

  runningPath(device: DeviceName): string {
    return path.join(this.dir, "running", `${device}.cfg`);
  }

  startupPath(device: DeviceName): string {
    return path.join(this.dir, "startup", `${device}.cfg`);
  }

  statePath(device: DeviceName): string {
    return path.join(this.dir, "state", `${device}.json`);
  }

  async connect(device: Device): Promise<Session> {
    const name = device.name;
    const state = await this.readState(name);
    if (state.unreachable) throw new SessionError(`${name} is unreachable`, name);
    if ((await readIfExists(this.runningPath(name))) === null) {
      throw new SessionError(`No lab device "${name}" in ${this.dir}`, name);
    }

    return {
      capture: async () => {
        const text = await readIfExists(this.runningPath(name));
        if (text === null) throw new SessionError(`Running config for ${name} disappeared`, name);
        return text;
      },
      apply: async (text) => {
        if (state.rejectApply) return { ok: false, message: state.rejectApply };
        await fs.writeFile(this.runningPath(name), text, "utf8");
        return { ok: true };
      },
      persist: async () => {
        await fs.mkdir(path.dirname(this.startupPath(name)), { recursive: true });
        await fs.copyFile(this.runningPath(name), this.startupPath(name));
      },
      disconnect: async () => {},
    };
  }

  async parse(device: Device, category: CheckCategory): Promise<ParseOutcome> {
    const state = await this.readState(device.name);
    if (state.unreachable) throw new SessionError(`${device.name} is unreachable`, device.name);
    if (state.unparseable.includes(category)) {
      throw new ParseUnavailableError(`No ${category} parser for ${device.name}`, device.name);
    }

    const value = state.protocols[category];
    if (value !== undefined) return { configured: true, state: value };
    if (category === "reachability") return { configured: true, state: { reachable: true } };
    return { configured: false, reason: `${category} not configured` };
  }

  async readState(device: DeviceName): Promise<LabState> {
    const file = this.statePath(device);
    const text = await readIfExists(file);
    if (text === null) return labStateSchema.parse({});

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new SessionError(`Lab state ${file} is not valid JSON: ${errorMessage(error)}`, device);
    }

    const parsed = labStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SessionError(`Lab state ${file} is invalid: ${parsed.error.issues.map(formatIssue).join("; ")}`, device);
    }
    return parsed.data;
  }
}
