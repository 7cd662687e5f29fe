/**
 * Deployment Planner
 *
 * Orders devices for the sequential deploy: ascending tier, and within a
 * tier, input order adjusted so each device follows its same-tier
 * dependencies.
 */

import { CyclicDependencyError } from "../errors.js";
import type { Device, DeviceName } from "../types.js";

export class DeploymentPlanner {
  /** Flat deployment order. */
  plan(devices: readonly Device[]): Device[] {
    return this.planTiers(devices).flat();
  }

  /**
   * Devices grouped by tier, lowest first.
   *
   * @throws CyclicDependencyError when a device depends on a higher tier or
   *   same-tier dependencies form a cycle.
   */
  planTiers(devices: readonly Device[]): Device[][] {
    const byName = new Map(devices.map((d) => [d.name, d]));

    for (const device of devices) {
      for (const dep of device.dependsOn) {
        const target = byName.get(dep);
        if (target && target.tier > device.tier) {
          throw new CyclicDependencyError([device.name, target.name]);
        }
      }
    }

    const tiers = [...new Set(devices.map((d) => d.tier))].sort((a, b) => a - b);
    return tiers.map((tier) => orderWithinTier(devices.filter((d) => d.tier === tier)));
  }
}

// =============================================================================
// Same-tier ordering
// =============================================================================

/**
 * Kahn's algorithm that always releases the earliest ready device in input
 * order, so unrelated devices keep their relative order.
 */
function orderWithinTier(tier: readonly Device[]): Device[] {
  const members = new Set(tier.map((d) => d.name));
  const pending = new Map<DeviceName, Set<DeviceName>>(
    tier.map((d) => [d.name, new Set(d.dependsOn.filter((dep) => members.has(dep) && dep !== d.name))]),
  );

  const ordered: Device[] = [];
  const remaining = [...tier];

  while (remaining.length > 0) {
    const index = remaining.findIndex((d) => pending.get(d.name)?.size === 0);
    if (index === -1) {
      throw new CyclicDependencyError(findCycle(remaining, pending));
    }

    const [next] = remaining.splice(index, 1);
    if (!next) break;
    ordered.push(next);
    for (const deps of pending.values()) deps.delete(next.name);
  }

  return ordered;
}

/**
 * Depth-first search for a cycle among the unresolved devices. Returns the
 * path with the first device repeated at the end, e.g. [a, b, a].
 */
function findCycle(devices: readonly Device[], pending: ReadonlyMap<DeviceName, ReadonlySet<DeviceName>>): DeviceName[] {
  const visiting = new Set<DeviceName>();
  const done = new Set<DeviceName>();
  const stack: DeviceName[] = [];

  const visit = (name: DeviceName): DeviceName[] | null => {
    if (visiting.has(name)) return [...stack.slice(stack.indexOf(name)), name];
    if (done.has(name)) return null;

    visiting.add(name);
    stack.push(name);
    for (const dep of pending.get(name) ?? []) {
      const cycle = visit(dep);
      if (cycle) return cycle;
    }
    stack.pop();
    visiting.delete(name);
    done.add(name);
    return null;
  };

  for (const device of devices) {
    const cycle = visit(device.name);
    if (cycle) return cycle;
  }
  return devices.map((d) => d.name);
}
