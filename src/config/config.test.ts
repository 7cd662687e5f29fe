import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigError } from "../errors.js";
import { loadConfig, parseConfig } from "./config.js";
import { resolveConfigPath, resolveUserPath } from "./paths.js";

describe("resolveConfigPath", () => {
  it("prefers the explicit override over FLEETCONF_CONFIG", () => {
    const env: NodeJS.ProcessEnv = { FLEETCONF_CONFIG: "/env/fleetconf.json" };
    expect(resolveConfigPath(env, "/work", "custom.json")).toEqual({
      path: path.resolve("/work", "custom.json"),
      explicit: true,
    });
  });

  it("falls back to FLEETCONF_CONFIG, then ./fleetconf.json", () => {
    expect(resolveConfigPath({ FLEETCONF_CONFIG: "/env/fc.json" }, "/work")).toEqual({
      path: "/env/fc.json",
      explicit: true,
    });
    expect(resolveConfigPath({}, "/work")).toEqual({
      path: path.join("/work", "fleetconf.json"),
      explicit: false,
    });
  });

  it("expands ~ in user paths", () => {
    expect(resolveUserPath("~/fleet/intent.json", "/base", { HOME: "/home/ops" })).toBe(
      path.join("/home/ops", "fleet/intent.json"),
    );
    expect(resolveUserPath(":memory:", "/base", {})).toBe(":memory:");
  });
});

describe("parseConfig", () => {
  it("fills every default from an empty object", () => {
    const config = parseConfig({});
    expect(config.concurrency).toBe(5);
    expect(config.operationTimeoutMs).toBe(30_000);
    expect(config.lab).toEqual({ kind: "files", dir: "lab" });
    expect(config.validation.pre).toEqual(["reachability", "interfaces"]);
    expect(config.validation.post).toHaveLength(6);
    expect(config.logging.level).toBe("info");
  });

  it("lists every issue in the ConfigError", () => {
    let caught: unknown;
    try {
      parseConfig({ concurrency: 0, validation: { pre: ["bogus"] } }, "fleetconf.json");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[0]).toMatch(/^concurrency: /);
    expect(caught.issues[1]).toMatch(/^validation\.pre\.0: /);
  });

  it("rejects unknown keys", () => {
    expect(() => parseConfig({ intentFil: "typo.json" })).toThrow(ConfigError);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "fleetconf-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("uses defaults when the default file is missing", async () => {
    const config = await loadConfig({ cwd: dir, env: {} });
    expect(config.baseDir).toBe(dir);
    expect(config.intentFile).toBe(path.join(dir, "intent.json"));
    expect(config.generatedDir).toBe(path.join(dir, "configs/generated"));
  });

  it("fails when an explicit config file is missing", async () => {
    await expect(loadConfig({ cwd: dir, env: {}, configPath: "absent.json" })).rejects.toThrow(ConfigError);
  });

  it("resolves relative paths against the config file directory", async () => {
    const nested = path.join(dir, "site");
    await fs.mkdir(nested);
    await fs.writeFile(
      path.join(nested, "fleetconf.json"),
      JSON.stringify({
        intentFile: "data/intent.json",
        lab: { kind: "memory", dir: "labdir" },
        logging: { destinations: [{ type: "file", path: "logs/run.log" }] },
      }),
    );

    const config = await loadConfig({ cwd: dir, env: { FLEETCONF_CONFIG: "site/fleetconf.json" } });
    expect(config.intentFile).toBe(path.join(nested, "data/intent.json"));
    expect(config.lab).toEqual({ kind: "memory", dir: path.join(nested, "labdir") });
    expect(config.logging.destinations).toEqual([{ type: "file", path: path.join(nested, "logs/run.log") }]);
  });

  it("applies FLEETCONF_LOG_LEVEL", async () => {
    const config = await loadConfig({ cwd: dir, env: { FLEETCONF_LOG_LEVEL: "debug" } });
    expect(config.logging.level).toBe("debug");
    await expect(loadConfig({ cwd: dir, env: { FLEETCONF_LOG_LEVEL: "loud" } })).rejects.toThrow(ConfigError);
  });

  it("reports malformed JSON", async () => {
    await fs.writeFile(path.join(dir, "fleetconf.json"), "{ not json");
    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toThrow(/not valid JSON/);
  });
});
