// Node.js-specific exports
// Re-exports everything from core plus Node.js-specific implementations

// Re-export all core exports
export * from "../core";

// File-backed persistence
export {
  FileDatabasePersistence,
  DEFAULT_FILE_MODE,
  type FileDatabasePersistenceOptions,
} from "./persistence/FileDatabasePersistence";

// HTTP transport
export {
  PersistentStoreServer,
  type PersistentStoreServerOptions,
  type HealthResponse,
  type FlushResponse,
} from "./server/PersistentStoreServer";
export { PersistentStoreClient } from "./client/PersistentStoreClient";
export {
  StoreClientError,
  StoreClientErrorType,
  type PersistentStoreClientConfig,
} from "./client/types";

// Configuration
export {
  loadConfig,
  validateConfig,
  ENV_VARS,
  type PersistentStoreConfig,
  type CliOptions,
} from "./config";
