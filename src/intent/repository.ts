/**
 * Intent Repository
 *
 * Loads the declarative intent document once per process and serves
 * immutable per-device Intent records.
 */

import fs from "node:fs/promises";

import { formatIssue } from "../config/config.js";
import { err, errorMessage, IntentNotFoundError, IntentValidationError, ok, type Result } from "../errors.js";
import type { Device, DeviceName, Intent, PartitionDefinition } from "../types.js";
import { deepFreeze } from "../utils/collections.js";
import { intentDocumentSchema, ROLE_DEFAULT_TIERS, type DeviceIntentDocument, type IntentDocument } from "./schema.js";

export class IntentRepository {
  private constructor(private readonly intents: ReadonlyMap<DeviceName, Intent>) {}

  /**
   * Read and validate an intent document from disk.
   */
  static async load(filePath: string): Promise<IntentRepository> {
    let text: string;
    try {
      text = await fs.readFile(filePath, "utf8");
    } catch (error) {
      throw new IntentValidationError(`Cannot read intent file ${filePath}`, [errorMessage(error)]);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new IntentValidationError(`Intent file ${filePath} is not valid JSON`, [errorMessage(error)]);
    }

    return IntentRepository.fromDocument(raw, filePath);
  }

  static fromDocument(raw: unknown, source = "<inline>"): IntentRepository {
    const parsed = intentDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new IntentValidationError(`Invalid intent in ${source}`, parsed.error.issues.map(formatIssue));
    }
    return new IntentRepository(buildIntents(parsed.data, source));
  }

  /** Every device's intent, in document order. */
  list(): ReadonlyMap<DeviceName, Intent> {
    return this.intents;
  }

  names(): DeviceName[] {
    return [...this.intents.keys()];
  }

  devices(): Device[] {
    return [...this.intents.values()].map((intent) => intent.device);
  }

  get(name: DeviceName): Result<Intent, IntentNotFoundError> {
    const intent = this.intents.get(name);
    return intent ? ok(intent) : err(new IntentNotFoundError(name));
  }
}

// =============================================================================
// Resolution
// =============================================================================

function buildIntents(doc: IntentDocument, source: string): Map<DeviceName, Intent> {
  const issues: string[] = [];
  const catalog = new Map<string, PartitionDefinition>(
    Object.entries(doc.partitions).map(([name, def]) => [name, { name, ...def }]),
  );
  const globals = { ...doc.globals };
  const intents = new Map<DeviceName, Intent>();

  for (const [name, entry] of Object.entries(doc.devices)) {
    const tier = resolveTier(entry);
    if (tier === undefined) {
      issues.push(`devices.${name}.tier: required for role "${entry.role}"`);
    }

    const seen = new Set<string>();
    for (const iface of entry.interfaces) {
      if (seen.has(iface.name)) issues.push(`devices.${name}.interfaces: duplicate interface "${iface.name}"`);
      seen.add(iface.name);
    }

    const partitions: PartitionDefinition[] = [];
    for (const ref of entry.partitions) {
      const def = catalog.get(ref);
      if (def) partitions.push(def);
      else issues.push(`devices.${name}.partitions: unknown partition "${ref}"`);
    }

    if (entry.dependsOn.includes(name)) {
      issues.push(`devices.${name}.dependsOn: a device cannot depend on itself`);
    }

    const device: Device = {
      name,
      role: entry.role,
      tier: tier ?? 0,
      template: entry.template,
      loopback: entry.loopback,
      asn: entry.asn,
      routerId: entry.routerId,
      interfaces: entry.interfaces,
      peers: entry.peers,
      partitions: [...entry.partitions],
      dependsOn: entry.dependsOn,
      attributes: entry.attributes,
    };

    intents.set(name, deepFreeze({ device, globals, partitions }));
  }

  if (issues.length > 0) throw new IntentValidationError(`Invalid intent in ${source}`, issues);

  deepFreeze(globals);
  return intents;
}

function resolveTier(entry: DeviceIntentDocument): number | undefined {
  return entry.tier ?? ROLE_DEFAULT_TIERS.get(entry.role.toLowerCase());
}
