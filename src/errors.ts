/**
 * Error taxonomy.
 *
 * Device-scoped failures are modelled as FleetError subclasses with a `kind`
 * discriminant. Per-device operations return them inside a Result so callers
 * decide between skip and abort.
 */

import type { DeviceName, ErrorDetail, FleetErrorKind, PipelinePhase } from "./types.js";

export type Result<T, E = FleetError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export abstract class FleetError extends Error {
  abstract readonly kind: FleetErrorKind;

  constructor(
    message: string,
    public readonly device?: DeviceName,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  toDetail(phase?: PipelinePhase): ErrorDetail {
    return phase ? { kind: this.kind, message: this.message, phase } : { kind: this.kind, message: this.message };
  }
}

export class IntentNotFoundError extends FleetError {
  readonly kind = "IntentNotFound";

  constructor(device: DeviceName) {
    super(`No intent declared for device "${device}"`, device);
    this.name = "IntentNotFoundError";
  }
}

export class TemplateError extends FleetError {
  readonly kind = "TemplateError";

  constructor(
    message: string,
    device: DeviceName,
    public readonly template: string,
    options?: { cause?: unknown },
  ) {
    super(message, device, options);
    this.name = "TemplateError";
  }
}

export class BackupFailureError extends FleetError {
  readonly kind = "BackupFailure";

  constructor(message: string, device: DeviceName, options?: { cause?: unknown }) {
    super(message, device, options);
    this.name = "BackupFailureError";
  }
}

export class ApplyRejectedError extends FleetError {
  readonly kind = "ApplyRejected";

  constructor(message: string, device: DeviceName) {
    super(message, device);
    this.name = "ApplyRejectedError";
  }
}

export class SessionError extends FleetError {
  readonly kind = "SessionError";

  constructor(message: string, device: DeviceName, options?: { cause?: unknown }) {
    super(message, device, options);
    this.name = "SessionError";
  }
}

export class ParseUnavailableError extends FleetError {
  readonly kind = "ParseUnavailable";

  constructor(message: string, device: DeviceName) {
    super(message, device);
    this.name = "ParseUnavailableError";
  }
}

export class CyclicDependencyError extends FleetError {
  readonly kind = "CyclicDependency";

  constructor(public readonly path: DeviceName[]) {
    super(`Contradictory deployment order: ${path.join(" → ")}`);
    this.name = "CyclicDependencyError";
  }
}

/** Writing a rendered config to the config store failed. */
export class StoreError extends FleetError {
  readonly kind = "StoreFailure";

  constructor(message: string, device: DeviceName, options?: { cause?: unknown }) {
    super(message, device, options);
    this.name = "StoreError";
  }
}

// =============================================================================
// Process-level errors (abort the command, not a device)
// =============================================================================

export class IntentValidationError extends Error {
  constructor(message: string, public readonly issues: string[]) {
    super(`${message}:\n  - ${issues.join("\n  - ")}`);
    this.name = "IntentValidationError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalise anything thrown into a FleetError. Known kinds pass through;
 * everything else is wrapped in the fallback kind for the given device.
 */
export function toFleetError(
  error: unknown,
  device: DeviceName,
  fallback: (message: string, device: DeviceName, options: { cause: unknown }) => FleetError = (message, d, options) =>
    new SessionError(message, d, options),
): FleetError {
  if (error instanceof FleetError) return error;
  return fallback(errorMessage(error), device, { cause: error });
}
