/**
 * Error thrown when an inbound request does not have the shape of a
 * {@link StoreRequest}. The store answers such requests with a failure
 * response instead of propagating the error.
 */
export class RequestDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestDecodeError";
  }
}

/**
 * Error thrown when bytes read from the storage file cannot be decoded
 * into a database image.
 */
export class DatabaseDecodeError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "DatabaseDecodeError";
  }
}

/**
 * Persistence operation that failed.
 */
export enum PersistenceOperation {
  ENCODE = "ENCODE",
  WRITE = "WRITE",
  RENAME = "RENAME",
  READ = "READ",
}

/**
 * I/O failure while writing or reading the storage file.
 */
export class PersistenceError extends Error {
  constructor(
    public readonly operation: PersistenceOperation,
    public readonly storagePath: string,
    public readonly cause?: unknown
  ) {
    super(`${operation} failed for '${storagePath}': ${describeCause(cause)}`);
    this.name = "PersistenceError";
  }
}

/**
 * The request transport could not acquire its listening address.
 */
export class BindError extends Error {
  constructor(
    public readonly address: string,
    public readonly cause?: unknown
  ) {
    super(`Error binding server socket on ${address}: ${describeCause(cause)}`);
    this.name = "BindError";
  }
}

/**
 * Invalid configuration value (CLI flag, environment variable or option).
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Negative, non-finite or inverted backoff bounds.
 */
export class InvalidBackoffConfigError extends Error {
  constructor(
    public readonly initialMs: number,
    public readonly maxMs: number
  ) {
    super(`Invalid backoff configuration: initial=${initialMs}ms max=${maxMs}ms`);
    this.name = "InvalidBackoffConfigError";
  }
}

/**
 * A request reached a store that has already been closed.
 */
export class StoreClosedError extends Error {
  constructor() {
    super("PersistentStore is closed");
    this.name = "StoreClosedError";
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? "unknown error" : String(cause);
}
