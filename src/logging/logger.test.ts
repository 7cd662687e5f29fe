import { describe, expect, it, vi } from "vitest";

import { createDefaultFormatter, FleetLogger, MemoryTransport, shouldLog, type LogEntry } from "./logger.js";

function setup(level: "trace" | "info" = "trace", redactPatterns?: string[]) {
  const transport = new MemoryTransport();
  const logger = new FleetLogger({ subsystem: "deploy", level, transports: [transport], redactPatterns });
  return { transport, logger };
}

describe("FleetLogger", () => {
  it("filters below the configured level", () => {
    const { transport, logger } = setup("info");
    logger.debug("hidden");
    logger.info("shown");
    expect(transport.entries.map((e) => e.message)).toEqual(["shown"]);
    expect(shouldLog("warn", "info")).toBe(true);
    expect(shouldLog("trace", "debug")).toBe(false);
  });

  it("stamps child subsystem and context on entries", () => {
    const { transport, logger } = setup();
    logger.child("executor").withContext({ device: "core1", phase: "DEPLOY", runId: "r1" }).warn("slow");

    expect(transport.entries[0]).toMatchObject({
      subsystem: "deploy/executor",
      device: "core1",
      phase: "DEPLOY",
      runId: "r1",
      level: "warn",
    });
  });

  it("redacts secrets in messages and nested metadata", () => {
    const { transport, logger } = setup("trace", ["secret-\\w+"]);
    logger.info("password secret-abc", { auth: { token: "secret-xyz" }, count: 2 });

    expect(transport.entries[0]?.message).toBe("password [REDACTED]");
    expect(transport.entries[0]?.metadata).toEqual({ auth: { token: "[REDACTED]" }, count: 2 });
  });

  it("keeps logging to other transports when one throws", () => {
    const memory = new MemoryTransport();
    const broken = {
      name: "broken",
      write(): void {
        throw new Error("disk full");
      },
    };
    const logger = new FleetLogger({ subsystem: "x", transports: [broken, memory] });
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    try {
      logger.info("still here");
      expect(stderr).toHaveBeenCalledWith('[fleetconf] log transport "broken" failed: disk full\n');
    } finally {
      stderr.mockRestore();
    }
    expect(memory.entries).toHaveLength(1);
  });
});

describe("createDefaultFormatter", () => {
  it("renders level, subsystem, context and metadata without colours", () => {
    const format = createDefaultFormatter({ colors: false, timestamps: false });
    const entry: LogEntry = {
      timestamp: new Date(0),
      level: "info",
      subsystem: "pipeline",
      message: "phase complete",
      device: "pe1",
      phase: "DEPLOY",
      metadata: { applied: 1 },
    };
    expect(format(entry)).toBe('INFO  [pipeline] phase complete (phase=DEPLOY device=pe1) {"applied":1}');
  });
});
