/**
 * Device session helpers: every session call is bounded by the operation
 * timeout, and every failure surfaces as a SessionError for that device.
 */

import { errorMessage, SessionError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { ApplyOutcome, Device, Session, SessionProvider } from "../types.js";
import { OperationTimeoutError, withTimeout } from "../utils/concurrency.js";

export type SessionOptions = {
  timeoutMs: number;
  logger: Logger;
};

/**
 * A Session wrapper that applies the operation timeout and normalises
 * errors. `persist()` resolves false when the device has no such step.
 */
export class BoundedSession {
  constructor(
    private readonly device: Device,
    private readonly session: Session,
    private readonly timeoutMs: number,
  ) {}

  capture(): Promise<string> {
    return this.call("capture", () => this.session.capture());
  }

  apply(text: string): Promise<ApplyOutcome> {
    return this.call("apply", () => this.session.apply(text));
  }

  async persist(): Promise<boolean> {
    const session = this.session;
    if (!session.persist) return false;
    await this.call("persist", () => session.persist?.() ?? Promise.resolve());
    return true;
  }

  disconnect(): Promise<void> {
    return this.call("disconnect", () => this.session.disconnect());
  }

  private call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return runBounded(this.device, operation, fn, this.timeoutMs);
  }
}

export async function openSession(
  provider: SessionProvider,
  device: Device,
  timeoutMs: number,
): Promise<BoundedSession> {
  const session = await runBounded(device, "connect", () => provider.connect(device), timeoutMs);
  return new BoundedSession(device, session, timeoutMs);
}

/**
 * Connect, run `fn`, and always disconnect. A disconnect failure is logged
 * and does not change the outcome of `fn`.
 */
export async function withDeviceSession<T>(
  provider: SessionProvider,
  device: Device,
  options: SessionOptions,
  fn: (session: BoundedSession) => Promise<T>,
): Promise<T> {
  const session = await openSession(provider, device, options.timeoutMs);
  try {
    return await fn(session);
  } finally {
    try {
      await session.disconnect();
    } catch (error) {
      options.logger.warn(`Disconnect from ${device.name} failed`, { error: errorMessage(error) });
    }
  }
}

async function runBounded<T>(device: Device, operation: string, fn: () => Promise<T>, timeoutMs: number): Promise<T> {
  try {
    return await withTimeout(fn(), timeoutMs, `${operation} on ${device.name} timed out after ${timeoutMs}ms`);
  } catch (error) {
    if (error instanceof SessionError) throw error;
    if (error instanceof OperationTimeoutError) {
      throw new SessionError(error.message, device.name, { cause: error });
    }
    throw new SessionError(`${operation} failed on ${device.name}: ${errorMessage(error)}`, device.name, {
      cause: error,
    });
  }
}
