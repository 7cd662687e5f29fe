/**
 * fleetconf: Type Definitions
 *
 * Intent data model, pipeline records, and the collaborator interfaces the
 * core consumes (device sessions, output parsing, confirmation).
 */

// =============================================================================
// Intent
// =============================================================================

export type DeviceName = string;

export type InterfaceIntent = {
  name: string;
  address?: string;
  mask?: string;
  description?: string;
  shutdown?: boolean;
};

export type PeerIntent = {
  address: string;
  remoteAs: string;
  description?: string;
};

/** A VRF-like logical partition, declared once in the intent catalog. */
export type PartitionDefinition = {
  name: string;
  description?: string;
  /** Appended to the device's router id to form the route distinguisher. */
  rdSuffix: string;
  /** Used for both import and export. */
  routeTarget: string;
};

export type Device = {
  name: DeviceName;
  /** Free-form role tag, e.g. "core", "aggregation", "edge". */
  role: string;
  /** Dependency tier; lower tiers deploy first. */
  tier: number;
  /** Rendering template name (without extension). */
  template: string;
  loopback?: string;
  asn?: string;
  routerId?: string;
  interfaces: readonly InterfaceIntent[];
  peers: readonly PeerIntent[];
  /** Partition names, resolved against the catalog at load time. */
  partitions: readonly string[];
  dependsOn: readonly DeviceName[];
  attributes: Readonly<Record<string, unknown>>;
};

/** Enterprise-wide values shared by every device's render context. */
export type FleetGlobals = Readonly<Record<string, unknown>>;

/** The full declarative record for one device. */
export type Intent = {
  device: Device;
  globals: FleetGlobals;
  partitions: readonly PartitionDefinition[];
};

// =============================================================================
// Configs, Backups, Diffs
// =============================================================================

export type GeneratedConfig = {
  device: DeviceName;
  text: string;
  generatedAt: string;
};

export type Backup = {
  device: DeviceName;
  text: string;
  capturedAt: string;
};

export type BackupHandle = {
  device: DeviceName;
  capturedAt: string;
  /** File path or store key. */
  location: string;
};

export type ConfigDiff = {
  linesToAdd: ReadonlySet<string>;
  linesToRemove: ReadonlySet<string>;
};

/** Sorted, serialisable view of a ConfigDiff. */
export type DiffSummary = {
  added: number;
  removed: number;
  linesToAdd: string[];
  linesToRemove: string[];
};

// =============================================================================
// Pipeline Records
// =============================================================================

export type PipelinePhase =
  | "GENERATE"
  | "PRE_VALIDATE"
  | "PREVIEW"
  | "DEPLOY"
  | "POST_VALIDATE"
  | "REPORT"
  | "ABORTED";

export type FleetErrorKind =
  | "IntentNotFound"
  | "TemplateError"
  | "BackupFailure"
  | "ApplyRejected"
  | "SessionError"
  | "ParseUnavailable"
  | "CyclicDependency"
  | "StoreFailure";

export type ErrorDetail = {
  kind: FleetErrorKind;
  message: string;
  phase?: PipelinePhase;
};

export type DeploymentStatus = "applied" | "failed" | "skipped";

export type DeploymentResult = {
  device: DeviceName;
  status: DeploymentStatus;
  error?: ErrorDetail;
  /** Why a device was skipped (dry run, halted, not generated, ...). */
  reason?: string;
  diff?: DiffSummary;
  backup?: BackupHandle;
  /** When the push was attempted; always after the backup was stored. */
  attemptedAt?: string;
  dryRun?: boolean;
};

export type CheckCategory =
  | "reachability"
  | "interfaces"
  | "routing-peers"
  | "igp-adjacency"
  | "label-distribution"
  | "partitions";

export type ValidationPhase = "pre" | "post";

export type ValidationStatus = "pass" | "fail" | "skip";

export type ValidationResult = {
  check: string;
  category: CheckCategory;
  device: DeviceName;
  phase: ValidationPhase;
  status: ValidationStatus;
  detail: string;
};

// =============================================================================
// External Collaborators
// =============================================================================

export type ApplyOutcome = { ok: true } | { ok: false; message: string };

/** A live connection to one device. */
export interface Session {
  capture(): Promise<string>;
  apply(text: string): Promise<ApplyOutcome>;
  /** Save running state to startup state, where the device supports it. */
  persist?(): Promise<void>;
  disconnect(): Promise<void>;
}

export interface SessionProvider {
  connect(device: Device): Promise<Session>;
}

export type ParseOutcome =
  | { configured: true; state: unknown }
  | { configured: false; reason?: string };

/** Turns device output into structured protocol state, one category at a time. */
export interface OutputParser {
  parse(device: Device, category: CheckCategory): Promise<ParseOutcome>;
}

export interface ConfirmationGate {
  confirm(prompt: string): Promise<boolean>;
  /** Release whatever the gate holds open, such as a terminal reader. */
  close?(): void;
}
