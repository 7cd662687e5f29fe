export {
  FileConfigStore,
  InMemoryConfigStore,
  compactTimestamp,
  parseBackupFileName,
  type ConfigStore,
  type FileConfigStoreOptions,
} from "./config-store.js";
