/**
 * Intent document schema.
 *
 * The document is a single JSON object:
 *
 * ```json
 * {
 *   "globals": { "domainName": "fleet.example" },
 *   "partitions": { "STUDENT-NET": { "rdSuffix": "100", "routeTarget": "65000:100" } },
 *   "devices": { "CORE1": { "role": "core", "template": "core_router" } }
 * }
 * ```
 */

import { z } from "zod";

export const interfaceIntentSchema = z
  .object({
    name: z.string().min(1),
    address: z.string().min(1).optional(),
    mask: z.string().min(1).optional(),
    description: z.string().optional(),
    shutdown: z.boolean().optional(),
  })
  .strict();

export const peerIntentSchema = z
  .object({
    address: z.string().min(1),
    remoteAs: z.union([z.string().min(1), z.number().int().positive()]).transform(String),
    description: z.string().optional(),
  })
  .strict();

export const partitionDefinitionSchema = z
  .object({
    description: z.string().optional(),
    rdSuffix: z.union([z.string().min(1), z.number().int().nonnegative()]).transform(String),
    routeTarget: z.string().min(1),
  })
  .strict();

export const deviceIntentSchema = z
  .object({
    role: z.string().min(1),
    tier: z.number().int().nonnegative().optional(),
    template: z.string().min(1),
    loopback: z.string().min(1).optional(),
    asn: z.union([z.string().min(1), z.number().int().positive()]).transform(String).optional(),
    routerId: z.string().min(1).optional(),
    interfaces: z.array(interfaceIntentSchema).default([]),
    peers: z.array(peerIntentSchema).default([]),
    partitions: z.array(z.string().min(1)).default([]),
    dependsOn: z.array(z.string().min(1)).default([]),
    attributes: z.record(z.string(), z.unknown()).default({}),
  })
  .strict();

export const intentDocumentSchema = z
  .object({
    globals: z.record(z.string(), z.unknown()).default({}),
    partitions: z.record(z.string(), partitionDefinitionSchema).default({}),
    devices: z.record(z.string().min(1), deviceIntentSchema),
  })
  .strict();

export type IntentDocumentInput = z.input<typeof intentDocumentSchema>;
export type IntentDocument = z.output<typeof intentDocumentSchema>;
export type DeviceIntentDocument = z.output<typeof deviceIntentSchema>;

/**
 * Tier used when a device omits one. Keys are matched case-insensitively.
 */
export const ROLE_DEFAULT_TIERS: ReadonlyMap<string, number> = new Map([
  ["core", 0],
  ["gateway", 0],
  ["aggregation", 1],
  ["edge", 2],
  ["pe", 2],
  ["access", 3],
]);
