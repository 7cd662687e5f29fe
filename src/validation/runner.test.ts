import { describe, expect, it } from "vitest";

import { InMemoryFleet } from "../lab/memory.js";
import type { Device, OutputParser, ParseOutcome } from "../types.js";
import { isPeerEstablished } from "./checks.js";
import { countValidation, ValidationRunner } from "./runner.js";

function device(name: string, overrides: Partial<Device> = {}): Device {
  return {
    name,
    role: "pe",
    tier: 2,
    template: "t",
    interfaces: [{ name: "Gi2", address: "10.0.0.1", mask: "255.255.255.252" }],
    peers: [{ address: "10.255.0.1", remoteAs: "65000" }],
    partitions: [],
    dependsOn: [],
    attributes: {},
    ...overrides,
  };
}

const healthy = {
  interfaces: { interfaces: [{ name: "Gi2", status: "up", protocol: "up" }] },
  "routing-peers": { peers: [{ address: "10.255.0.1", state: "Established" }] },
  "igp-adjacency": { neighbors: [{ neighbor: "10.255.0.1", state: "FULL/  -" }] },
  "label-distribution": { neighbors: [{ peer: "10.255.0.1:0", state: "Oper" }] },
};

describe("ValidationRunner", () => {
  it("runs the pre checks in device then check order", async () => {
    const fleet = new InMemoryFleet({ A: { state: healthy }, B: { state: healthy } });
    const runner = new ValidationRunner({ parser: fleet });

    const results = await runner.runChecks([device("A"), device("B")], "pre");

    expect(results.map((r) => `${r.device}:${r.check}:${r.status}`)).toEqual([
      "A:reachability:pass",
      "A:interfaces:pass",
      "B:reachability:pass",
      "B:interfaces:pass",
    ]);
    expect(results[1]).toEqual({
      check: "interfaces",
      category: "interfaces",
      device: "A",
      phase: "pre",
      status: "pass",
      detail: "1 interface(s) up/up",
    });
  });

  it("passes a converged device and skips what it does not run", async () => {
    const fleet = new InMemoryFleet({ A: { state: healthy } });
    const results = await new ValidationRunner({ parser: fleet }).runChecks([device("A")], "post");

    expect(results.map((r) => [r.check, r.status])).toEqual([
      ["reachability", "pass"],
      ["interfaces", "pass"],
      ["routing-peers", "pass"],
      ["igp-adjacency", "pass"],
      ["label-distribution", "pass"],
      ["partitions", "skip"],
    ]);
  });

  it("fails non-converged protocol state", async () => {
    const fleet = new InMemoryFleet({
      A: {
        state: {
          interfaces: { interfaces: [{ name: "Gi2", status: "up", protocol: "down" }] },
          "routing-peers": { peers: [{ address: "10.255.0.1", state: "Active" }] },
          "igp-adjacency": { neighbors: [{ neighbor: "10.255.0.1", state: "INIT/DROTHER" }] },
          "label-distribution": { neighbors: [] },
          partitions: { partitions: ["STAFF"] },
        },
      },
    });
    const results = await new ValidationRunner({ parser: fleet }).runChecks(
      [device("A", { partitions: ["STAFF", "GUEST"] })],
      "post",
    );

    expect(results.map((r) => [r.check, r.status, r.detail])).toEqual([
      ["reachability", "pass", "Reachable"],
      ["interfaces", "fail", "Gi2 up/down"],
      ["routing-peers", "fail", "10.255.0.1 Active"],
      ["igp-adjacency", "fail", "10.255.0.1 INIT/DROTHER"],
      ["label-distribution", "fail", "No label distribution neighbours"],
      ["partitions", "fail", "Missing partition(s): GUEST"],
    ]);
    expect(countValidation(results)).toEqual({ pass: 1, fail: 5, skip: 0 });
  });

  it("skips when the parser is unavailable and fails an unreachable device", async () => {
    const fleet = new InMemoryFleet({
      A: { state: healthy, unparseable: ["interfaces"] },
      B: { unreachable: true },
    });
    const results = await new ValidationRunner({ parser: fleet }).runChecks([device("A"), device("B")], "pre");

    expect(results.map((r) => [r.device, r.check, r.status, r.detail])).toEqual([
      ["A", "reachability", "pass", "Reachable"],
      ["A", "interfaces", "skip", "Parser unavailable: No interfaces parser for A"],
      ["B", "reachability", "fail", "B is unreachable"],
      ["B", "interfaces", "fail", "B is unreachable"],
    ]);
  });

  it("fails on malformed parser output and on timeouts", async () => {
    const parser: OutputParser = {
      parse: async (_device, category) => {
        if (category === "reachability") return { configured: true, state: { reachable: "yes" } };
        return new Promise<ParseOutcome>(() => {});
      },
    };
    const results = await new ValidationRunner({ parser, operationTimeoutMs: 10 }).runChecks([device("A")], "pre");

    expect(results[0]?.status).toBe("fail");
    expect(results[0]?.detail).toBe("Malformed parser output: reachable: Expected boolean, received string");
    expect(results[1]).toMatchObject({
      status: "fail",
      detail: "interfaces parse on A timed out after 10ms",
    });
  });

  it("honours a configured phase check list", async () => {
    const fleet = new InMemoryFleet({ A: { state: healthy } });
    const runner = new ValidationRunner({ parser: fleet, phases: { pre: ["routing-peers"] } });
    expect(runner.checksFor("pre").map((c) => c.name)).toEqual(["routing-peers"]);
    expect(runner.checksFor("post")).toHaveLength(6);
  });
});

describe("isPeerEstablished", () => {
  it("accepts Established or a prefix count", () => {
    expect(isPeerEstablished({ state: "Established" })).toBe(true);
    expect(isPeerEstablished({ state: "12" })).toBe(true);
    expect(isPeerEstablished({ state: "Idle", prefixes: 0 })).toBe(true);
    expect(isPeerEstablished({ state: "Idle" })).toBe(false);
  });
});
