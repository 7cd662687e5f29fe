export { DeploymentExecutor, type ExecutorOptions } from "./executor.js";
export { DeploymentPlanner } from "./planner.js";
export { rollbackDevice, type RollbackOptions, type RollbackResult, type RollbackStatus } from "./rollback.js";
export { BoundedSession, openSession, withDeviceSession, type SessionOptions } from "./sessions.js";
