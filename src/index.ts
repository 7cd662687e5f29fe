export * from "./types.js";
export * from "./errors.js";
export * from "./config/index.js";
export * from "./intent/index.js";
export * from "./render/index.js";
export * from "./diff/index.js";
export * from "./store/index.js";
export * from "./deploy/index.js";
export * from "./validation/index.js";
export * from "./lab/index.js";
export * from "./orchestration/index.js";
export * from "./history/index.js";
export * from "./logging/index.js";
export { AutoConfirmGate, PromptGate } from "./gates.js";
export { MonotonicClock, systemClock, type Clock } from "./utils/clock.js";
export { processPooled, withTimeout, OperationTimeoutError } from "./utils/concurrency.js";
export { buildProgram, type ProgramDeps } from "./cli/program.js";
export { createAppContext, type AppContext, type GlobalOptions } from "./cli/context.js";
export { defaultRuntime, type RuntimeEnv } from "./runtime.js";
