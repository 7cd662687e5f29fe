export { FileFleet, labStateSchema, type LabState } from "./files.js";
export { InMemoryFleet, isCheckCategory, type LabDeviceOptions, type LabEvent } from "./memory.js";
