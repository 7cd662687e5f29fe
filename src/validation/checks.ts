/**
 * Built-in validation checks.
 *
 * Each check declares the parser category it reads and a zod schema for the
 * parsed state. The runner hands it state that already passed the schema.
 */

import { z } from "zod";

import type { CheckCategory, Device, ValidationStatus } from "../types.js";

export type CheckVerdict = {
  status: ValidationStatus;
  detail: string;
};

export type CheckDefinition<S> = {
  name: string;
  category: CheckCategory;
  schema: z.ZodType<S, z.ZodTypeDef, unknown>;
  evaluate(state: S, device: Device): CheckVerdict;
};

/** A check with its state type erased; `run` validates before evaluating. */
export interface ValidationCheck {
  readonly name: string;
  readonly category: CheckCategory;
  run(state: unknown, device: Device): CheckVerdict;
}

export function defineCheck<S>(definition: CheckDefinition<S>): ValidationCheck {
  return {
    name: definition.name,
    category: definition.category,
    run(state, device) {
      const parsed = definition.schema.safeParse(state);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
        return { status: "fail", detail: `Malformed parser output: ${where}${issue?.message ?? "invalid"}` };
      }
      return definition.evaluate(parsed.data, device);
    },
  };
}

const pass = (detail: string): CheckVerdict => ({ status: "pass", detail });
const fail = (detail: string): CheckVerdict => ({ status: "fail", detail });
const skip = (detail: string): CheckVerdict => ({ status: "skip", detail });

// =============================================================================
// State Schemas
// =============================================================================

export const reachabilityStateSchema = z.object({
  reachable: z.boolean(),
  latencyMs: z.number().nonnegative().optional(),
});

export const interfaceStateSchema = z.object({
  interfaces: z.array(
    z.object({
      name: z.string(),
      status: z.string(),
      protocol: z.string(),
    }),
  ),
});

export const routingPeerStateSchema = z.object({
  peers: z.array(
    z.object({
      address: z.string(),
      state: z.string(),
      prefixes: z.number().int().nonnegative().optional(),
    }),
  ),
});

export const igpStateSchema = z.object({
  neighbors: z.array(
    z.object({
      neighbor: z.string(),
      interface: z.string().optional(),
      state: z.string(),
    }),
  ),
});

export const labelDistributionStateSchema = z.object({
  neighbors: z.array(
    z.object({
      peer: z.string(),
      state: z.string(),
    }),
  ),
});

export const partitionStateSchema = z.object({
  partitions: z.array(z.string()),
});

// =============================================================================
// Checks
// =============================================================================

export const reachabilityCheck = defineCheck({
  name: "reachability",
  category: "reachability",
  schema: reachabilityStateSchema,
  evaluate: (state) => {
    if (!state.reachable) return fail("Device is unreachable");
    return pass(state.latencyMs === undefined ? "Reachable" : `Reachable (${state.latencyMs}ms)`);
  },
});

export const interfacesCheck = defineCheck({
  name: "interfaces",
  category: "interfaces",
  schema: interfaceStateSchema,
  evaluate: (state, device) => {
    const expected = device.interfaces.filter((i) => i.address && !i.shutdown);
    if (expected.length === 0) return skip("No addressed interfaces declared");

    const live = new Map(state.interfaces.map((i) => [i.name, i]));
    const problems: string[] = [];
    for (const iface of expected) {
      const found = live.get(iface.name);
      if (!found) problems.push(`${iface.name} missing`);
      else if (found.status !== "up" || found.protocol !== "up") {
        problems.push(`${iface.name} ${found.status}/${found.protocol}`);
      }
    }

    return problems.length > 0 ? fail(problems.join(", ")) : pass(`${expected.length} interface(s) up/up`);
  },
});

/** A peer counts as up when Established or reporting a prefix count. */
export function isPeerEstablished(peer: { state: string; prefixes?: number }): boolean {
  return peer.state.toLowerCase() === "established" || peer.prefixes !== undefined || /^\d+$/.test(peer.state);
}

export const routingPeersCheck = defineCheck({
  name: "routing-peers",
  category: "routing-peers",
  schema: routingPeerStateSchema,
  evaluate: (state, device) => {
    const reported = new Map(state.peers.map((p) => [p.address, p]));
    const addresses = new Set([...device.peers.map((p) => p.address), ...reported.keys()]);
    if (addresses.size === 0) return skip("No routing peers declared or reported");

    const problems: string[] = [];
    for (const address of addresses) {
      const peer = reported.get(address);
      if (!peer) problems.push(`${address} not reported`);
      else if (!isPeerEstablished(peer)) problems.push(`${address} ${peer.state}`);
    }

    return problems.length > 0 ? fail(problems.join(", ")) : pass(`${addresses.size} peer(s) established`);
  },
});

export const igpAdjacencyCheck = defineCheck({
  name: "igp-adjacency",
  category: "igp-adjacency",
  schema: igpStateSchema,
  evaluate: (state) => {
    if (state.neighbors.length === 0) return fail("No IGP neighbours");
    const down = state.neighbors.filter((n) => !n.state.toUpperCase().startsWith("FULL"));
    if (down.length > 0) return fail(down.map((n) => `${n.neighbor} ${n.state}`).join(", "));
    return pass(`${state.neighbors.length} adjacency(ies) FULL`);
  },
});

export const labelDistributionCheck = defineCheck({
  name: "label-distribution",
  category: "label-distribution",
  schema: labelDistributionStateSchema,
  evaluate: (state) => {
    if (state.neighbors.length === 0) return fail("No label distribution neighbours");
    const down = state.neighbors.filter((n) => !/\boper/i.test(n.state));
    if (down.length > 0) return fail(down.map((n) => `${n.peer} ${n.state}`).join(", "));
    return pass(`${state.neighbors.length} session(s) operational`);
  },
});

export const partitionsCheck = defineCheck({
  name: "partitions",
  category: "partitions",
  schema: partitionStateSchema,
  evaluate: (state, device) => {
    if (device.partitions.length === 0) return skip("No partitions declared");
    const present = new Set(state.partitions);
    const missing = device.partitions.filter((p) => !present.has(p));
    if (missing.length > 0) return fail(`Missing partition(s): ${missing.join(", ")}`);
    return pass(`${device.partitions.length} partition(s) present`);
  },
});

export const BUILTIN_CHECKS: readonly ValidationCheck[] = [
  reachabilityCheck,
  interfacesCheck,
  routingPeersCheck,
  igpAdjacencyCheck,
  labelDistributionCheck,
  partitionsCheck,
];
