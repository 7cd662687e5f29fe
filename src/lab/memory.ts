/**
 * In-process lab fleet: a SessionProvider and OutputParser over plain maps.
 * Each device can be told to misbehave (unreachable, rejecting applies,
 * slow) so pipeline behaviour can be exercised without real equipment.
 */

import { ParseUnavailableError, SessionError } from "../errors.js";
import type {
  ApplyOutcome,
  CheckCategory,
  Device,
  DeviceName,
  OutputParser,
  ParseOutcome,
  Session,
  SessionProvider,
} from "../types.js";

export type LabDeviceOptions = {
  running?: string;
  startup?: string;
  /** Parsed protocol state per category; absent categories are "not configured". */
  state?: Partial<Record<CheckCategory, unknown>>;
  unreachable?: boolean;
  /** Reject every apply with this message. */
  rejectApply?: string;
  /** Session exposes no persist step. */
  noPersist?: boolean;
  /** Fail persist with this message. */
  failPersist?: string;
  /** Categories the parser cannot handle for this device. */
  unparseable?: CheckCategory[];
  /** Delay before each session operation resolves. */
  delayMs?: number;
};

export type LabEvent = {
  device: DeviceName;
  operation: "connect" | "capture" | "apply" | "persist" | "disconnect";
};

type LabDevice = Required<Pick<LabDeviceOptions, "running" | "startup">> &
  Omit<LabDeviceOptions, "running" | "startup" | "state"> & {
    state: Map<CheckCategory, unknown>;
  };

export class InMemoryFleet implements SessionProvider, OutputParser {
  private readonly devices = new Map<DeviceName, LabDevice>();
  /** Every session operation in the order it happened. */
  readonly events: LabEvent[] = [];

  constructor(devices: Record<DeviceName, LabDeviceOptions> = {}) {
    for (const [name, options] of Object.entries(devices)) this.define(name, options);
  }

  define(name: DeviceName, options: LabDeviceOptions = {}): this {
    const running = options.running ?? `hostname ${name}\nend\n`;
    this.devices.set(name, {
      ...options,
      running,
      startup: options.startup ?? running,
      state: new Map(Object.entries(options.state ?? {}).filter(isCategoryEntry)),
    });
    return this;
  }

  update(name: DeviceName, changes: Partial<Omit<LabDeviceOptions, "state">>): void {
    Object.assign(this.lookup(name), changes);
  }

  setState(name: DeviceName, category: CheckCategory, state: unknown): void {
    this.lookup(name).state.set(category, state);
  }

  running(name: DeviceName): string | undefined {
    return this.devices.get(name)?.running;
  }

  startup(name: DeviceName): string | undefined {
    return this.devices.get(name)?.startup;
  }

  /** Devices that received an apply, in order. */
  appliedTo(): DeviceName[] {
    return this.events.filter((e) => e.operation === "apply").map((e) => e.device);
  }

  async connect(device: Device): Promise<Session> {
    const lab = this.lookup(device.name);
    await this.step(lab, device.name, "connect");
    if (lab.unreachable) throw new SessionError(`${device.name} is unreachable`, device.name);

    const session: Session = {
      capture: async () => {
        await this.step(lab, device.name, "capture");
        return lab.running;
      },
      apply: async (text: string): Promise<ApplyOutcome> => {
        await this.step(lab, device.name, "apply");
        if (lab.rejectApply) return { ok: false, message: lab.rejectApply };
        lab.running = text;
        return { ok: true };
      },
      disconnect: async () => {
        await this.step(lab, device.name, "disconnect");
      },
    };

    if (!lab.noPersist) {
      session.persist = async () => {
        await this.step(lab, device.name, "persist");
        if (lab.failPersist) throw new Error(lab.failPersist);
        lab.startup = lab.running;
      };
    }

    return session;
  }

  async parse(device: Device, category: CheckCategory): Promise<ParseOutcome> {
    const lab = this.lookup(device.name);
    if (lab.delayMs) await sleep(lab.delayMs);
    if (lab.unreachable) throw new SessionError(`${device.name} is unreachable`, device.name);
    if (lab.unparseable?.includes(category)) {
      throw new ParseUnavailableError(`No ${category} parser for ${device.name}`, device.name);
    }

    if (lab.state.has(category)) return { configured: true, state: lab.state.get(category) };
    if (category === "reachability") return { configured: true, state: { reachable: true } };
    return { configured: false, reason: `${category} not configured` };
  }

  private lookup(name: DeviceName): LabDevice {
    const lab = this.devices.get(name);
    if (!lab) throw new SessionError(`Unknown lab device "${name}"`, name);
    return lab;
  }

  private async step(lab: LabDevice, device: DeviceName, operation: LabEvent["operation"]): Promise<void> {
    if (lab.delayMs) await sleep(lab.delayMs);
    this.events.push({ device, operation });
  }
}

const CATEGORIES: ReadonlySet<string> = new Set<CheckCategory>([
  "reachability",
  "interfaces",
  "routing-peers",
  "igp-adjacency",
  "label-distribution",
  "partitions",
]);

export function isCheckCategory(value: string): value is CheckCategory {
  return CATEGORIES.has(value);
}

function isCategoryEntry(entry: [string, unknown]): entry is [CheckCategory, unknown] {
  return isCheckCategory(entry[0]);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
