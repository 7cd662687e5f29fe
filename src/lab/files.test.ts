import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ParseUnavailableError, SessionError } from "../errors.js";
import type { Device } from "../types.js";
import { FileFleet } from "./files.js";

function device(name: string): Device {
  return { name, role: "core", tier: 0, template: "t", interfaces: [], peers: [], partitions: [], dependsOn: [], attributes: {} };
}

describe("FileFleet", () => {
  let dir: string;
  let fleet: FileFleet;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "fleetconf-lab-"));
    await fs.mkdir(path.join(dir, "running"));
    await fs.mkdir(path.join(dir, "state"));
    await fs.writeFile(path.join(dir, "running", "R1.cfg"), "hostname R1\nend\n");
    fleet = new FileFleet(dir);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("captures, applies and persists through files", async () => {
    const session = await fleet.connect(device("R1"));
    expect(await session.capture()).toBe("hostname R1\nend\n");

    expect(await session.apply("hostname R1\nntp server 10.0.0.10\nend\n")).toEqual({ ok: true });
    await session.persist?.();
    await session.disconnect();

    expect(await fs.readFile(fleet.runningPath("R1"), "utf8")).toBe("hostname R1\nntp server 10.0.0.10\nend\n");
    expect(await fs.readFile(fleet.startupPath("R1"), "utf8")).toBe("hostname R1\nntp server 10.0.0.10\nend\n");
  });

  it("refuses unknown and unreachable devices", async () => {
    await expect(fleet.connect(device("R9"))).rejects.toThrow(SessionError);

    await fs.writeFile(fleet.statePath("R1"), JSON.stringify({ unreachable: true }));
    await expect(fleet.connect(device("R1"))).rejects.toThrow("R1 is unreachable");
  });

  it("rejects applies when configured to", async () => {
    await fs.writeFile(fleet.statePath("R1"), JSON.stringify({ rejectApply: "% Invalid input detected" }));
    const session = await fleet.connect(device("R1"));
    expect(await session.apply("x\n")).toEqual({ ok: false, message: "% Invalid input detected" });
    expect(await fs.readFile(fleet.runningPath("R1"), "utf8")).toBe("hostname R1\nend\n");
  });

  it("serves protocol state per category", async () => {
    await fs.writeFile(
      fleet.statePath("R1"),
      JSON.stringify({
        unparseable: ["partitions"],
        protocols: { "igp-adjacency": { neighbors: [{ neighbor: "10.0.0.2", state: "FULL/  -" }] } },
      }),
    );

    expect(await fleet.parse(device("R1"), "igp-adjacency")).toEqual({
      configured: true,
      state: { neighbors: [{ neighbor: "10.0.0.2", state: "FULL/  -" }] },
    });
    expect(await fleet.parse(device("R1"), "reachability")).toEqual({ configured: true, state: { reachable: true } });
    expect(await fleet.parse(device("R1"), "routing-peers")).toEqual({
      configured: false,
      reason: "routing-peers not configured",
    });
    await expect(fleet.parse(device("R1"), "partitions")).rejects.toThrow(ParseUnavailableError);
  });

  it("rejects an invalid state file", async () => {
    await fs.writeFile(fleet.statePath("R1"), JSON.stringify({ protocols: { bgp: {} } }));
    await expect(fleet.parse(device("R1"), "interfaces")).rejects.toThrow(/Lab state .* is invalid/);
  });
});
