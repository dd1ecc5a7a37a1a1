/**
 * Client error types for structured error handling.
 */
export enum StoreClientErrorType {
  /** Connection refused, reset or timed out */
  NETWORK_ERROR = "NETWORK_ERROR",
  /** Server answered with a non-2xx status */
  SERVER_ERROR = "SERVER_ERROR",
  /** Server answered 503: the store is shutting down */
  STORE_CLOSED = "STORE_CLOSED",
  /** Response body is not a StoreResponse */
  INVALID_RESPONSE = "INVALID_RESPONSE",
}

/**
 * Error thrown by {@link PersistentStoreClient} when a request cannot be completed.
 */
export class StoreClientError extends Error {
  constructor(
    public readonly type: StoreClientErrorType,
    message: string
  ) {
    super(message);
    this.name = "StoreClientError";
  }
}

export interface PersistentStoreClientConfig {
  /** Base URL of the server, e.g. "http://127.0.0.1:60002" */
  baseUrl: string;
  /** Per-attempt timeout in milliseconds. Default: 10000 */
  timeout?: number;
  /** Attempts for transient network failures. Default: 3 */
  retryAttempts?: number;
  /** Delay before the first retry, doubled for each further one. Default: 200 */
  retryDelayMs?: number;
}
