/**
 * Wires configuration into the components a command needs.
 */

import { loadConfig, loggingOptionsFrom, type ResolvedConfig } from "../config/config.js";
import { DeploymentExecutor } from "../deploy/executor.js";
import { DeploymentPlanner } from "../deploy/planner.js";
import { SQLiteRunHistory, type RunHistoryStorage } from "../history/storage.js";
import { IntentRepository } from "../intent/repository.js";
import { FileFleet } from "../lab/files.js";
import { InMemoryFleet } from "../lab/memory.js";
import { createLogger, type Logger, type LogLevel } from "../logging/index.js";
import { ConfigRenderer } from "../render/renderer.js";
import { FileConfigStore, type ConfigStore } from "../store/config-store.js";
import type { Device, DeviceName, OutputParser, SessionProvider } from "../types.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { ValidationRunner } from "../validation/runner.js";

export type GlobalOptions = {
  config?: string;
  logLevel?: LogLevel;
};

export type AppContext = {
  config: ResolvedConfig;
  logger: Logger;
  clock: Clock;
  intents: IntentRepository;
  renderer: ConfigRenderer;
  store: ConfigStore;
  sessions: SessionProvider;
  parser: OutputParser;
  planner: DeploymentPlanner;
  executor: DeploymentExecutor;
  validator: ValidationRunner;
  openHistory(): Promise<RunHistoryStorage>;
  close(): Promise<void>;
};

export type ContextFactory = (options: GlobalOptions) => Promise<AppContext>;

export async function createAppContext(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Promise<AppContext> {
  const config = await loadConfig({ configPath: options.config, env, cwd });
  const logging = loggingOptionsFrom(config);
  const logger = createLogger("fleetconf", { ...logging, level: options.logLevel ?? logging.level });

  const intents = await IntentRepository.load(config.intentFile);
  const renderer = await ConfigRenderer.fromDirectory(config.templatesDir);
  const clock = systemClock;
  const store = new FileConfigStore({ generatedDir: config.generatedDir, backupDir: config.backupDir, clock });

  const fleet = config.lab.kind === "memory" ? seededMemoryFleet(intents) : new FileFleet(config.lab.dir);
  logger.debug(`Using ${config.lab.kind} lab fleet`, { dir: config.lab.dir });

  const executor = new DeploymentExecutor({
    sessions: fleet,
    store,
    clock,
    operationTimeoutMs: config.operationTimeoutMs,
    logger: logger.child("deploy"),
  });
  const validator = new ValidationRunner({
    parser: fleet,
    phases: config.validation,
    concurrency: config.concurrency,
    operationTimeoutMs: config.operationTimeoutMs,
    logger: logger.child("validation"),
  });

  const opened: RunHistoryStorage[] = [];

  return {
    config,
    logger,
    clock,
    intents,
    renderer,
    store,
    sessions: fleet,
    parser: fleet,
    planner: new DeploymentPlanner(),
    executor,
    validator,
    async openHistory() {
      const history = new SQLiteRunHistory(config.historyDb);
      await history.initialize();
      opened.push(history);
      return history;
    },
    async close() {
      for (const history of opened.splice(0)) await history.close();
      await logger.close();
    },
  };
}

function seededMemoryFleet(intents: IntentRepository): InMemoryFleet {
  const fleet = new InMemoryFleet();
  for (const name of intents.names()) fleet.define(name);
  return fleet;
}

/**
 * Devices a command operates on: one named device, or the whole intent.
 */
export function selectDevices(ctx: AppContext, name?: DeviceName): Device[] {
  if (!name) return ctx.intents.devices();
  const intent = ctx.intents.get(name);
  if (!intent.ok) throw intent.error;
  return [intent.value.device];
}
