/**
 * Validation Runner
 *
 * Runs the checks configured for a phase across devices through the
 * bounded pool. A failure on one device/check pair never affects another.
 */

import { errorMessage, ParseUnavailableError } from "../errors.js";
import { createSilentLogger, type Logger } from "../logging/index.js";
import type {
  CheckCategory,
  Device,
  OutputParser,
  ParseOutcome,
  ValidationPhase,
  ValidationResult,
  ValidationStatus,
} from "../types.js";
import { processPooled, withTimeout } from "../utils/concurrency.js";
import { BUILTIN_CHECKS, type ValidationCheck } from "./checks.js";

export const DEFAULT_PHASE_CHECKS: Readonly<Record<ValidationPhase, readonly CheckCategory[]>> = {
  pre: ["reachability", "interfaces"],
  post: ["reachability", "interfaces", "routing-peers", "igp-adjacency", "label-distribution", "partitions"],
};

export type ValidationRunnerOptions = {
  parser: OutputParser;
  checks?: readonly ValidationCheck[];
  phases?: Partial<Record<ValidationPhase, readonly CheckCategory[]>>;
  concurrency?: number;
  operationTimeoutMs?: number;
  logger?: Logger;
};

export class ValidationRunner {
  private readonly parser: OutputParser;
  private readonly checks: readonly ValidationCheck[];
  private readonly phases: Record<ValidationPhase, readonly CheckCategory[]>;
  private readonly concurrency: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: ValidationRunnerOptions) {
    this.parser = options.parser;
    this.checks = options.checks ?? BUILTIN_CHECKS;
    this.phases = {
      pre: options.phases?.pre ?? DEFAULT_PHASE_CHECKS.pre,
      post: options.phases?.post ?? DEFAULT_PHASE_CHECKS.post,
    };
    this.concurrency = options.concurrency ?? 5;
    this.timeoutMs = options.operationTimeoutMs ?? 30_000;
    this.logger = options.logger ?? createSilentLogger();
  }

  /** Checks that run in `phase`, in configured order. */
  checksFor(phase: ValidationPhase): ValidationCheck[] {
    return this.phases[phase].flatMap((category) => this.checks.filter((c) => c.category === category));
  }

  /** Results ordered by device (input order), then check. */
  async runChecks(devices: readonly Device[], phase: ValidationPhase): Promise<ValidationResult[]> {
    const checks = this.checksFor(phase);
    const pairs = devices.flatMap((device) => checks.map((check) => ({ device, check })));

    this.logger.debug(`Running ${pairs.length} ${phase}-check(s)`, { devices: devices.length });
    return processPooled(pairs, ({ device, check }) => this.runOne(device, check, phase), this.concurrency);
  }

  private async runOne(device: Device, check: ValidationCheck, phase: ValidationPhase): Promise<ValidationResult> {
    const result = (status: ValidationStatus, detail: string): ValidationResult => ({
      check: check.name,
      category: check.category,
      device: device.name,
      phase,
      status,
      detail,
    });

    let outcome: ParseOutcome;
    try {
      outcome = await withTimeout(
        this.parser.parse(device, check.category),
        this.timeoutMs,
        `${check.category} parse on ${device.name} timed out after ${this.timeoutMs}ms`,
      );
    } catch (error) {
      if (error instanceof ParseUnavailableError) return result("skip", `Parser unavailable: ${error.message}`);
      this.logger.withContext({ device: device.name }).warn(`${check.name} check errored`, {
        error: errorMessage(error),
      });
      return result("fail", errorMessage(error));
    }

    if (!outcome.configured) return result("skip", outcome.reason ?? `${check.category} not configured`);

    const verdict = check.run(outcome.state, device);
    return result(verdict.status, verdict.detail);
  }
}

export type ValidationCounts = Record<ValidationStatus, number>;

export function countValidation(results: readonly ValidationResult[]): ValidationCounts {
  const counts: ValidationCounts = { pass: 0, fail: 0, skip: 0 };
  for (const r of results) counts[r.status]++;
  return counts;
}
