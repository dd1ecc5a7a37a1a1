// Core platform-agnostic exports

// Types
export * from "./types";

// Store service
export { PersistentStore } from "./PersistentStore";

// Scheduling
export { ExponentialBackoff } from "./backoff/ExponentialBackoff";
export {
  FlushScheduler,
  type FlushSchedulerOptions,
  type FlushSchedulerState,
  type SerialExecutor,
} from "./persistence/FlushScheduler";

// Persistence
export {
  InMemoryDatabasePersistence,
  type DatabasePersistence,
} from "./persistence/DatabasePersistence";

// Codecs
export {
  encodeDatabaseImage,
  decodeDatabaseImage,
  DATABASE_FORMAT,
  DATABASE_FORMAT_VERSION,
} from "./codec/DatabaseCodec";
export { decodeStoreRequest } from "./codec/RequestCodec";

// Errors
export {
  RequestDecodeError,
  DatabaseDecodeError,
  PersistenceError,
  PersistenceOperation,
  BindError,
  ConfigError,
  InvalidBackoffConfigError,
  StoreClosedError,
} from "./errors";

// Logging
export { LogLevel, parseLogLevel, getDefaultLogLevel, StoreLogger, type Logger } from "./logging";

// Utilities
export { SerialQueue } from "./utils/SerialQueue";
