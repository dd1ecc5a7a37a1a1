/**
 * The authoritative key-value mapping held by a {@link PersistentStore}.
 *
 * The in-memory image may be ahead of the image on disk while a debounced
 * flush is pending; the two converge on every successful flush.
 */
export interface DatabaseImage {
  keyVals: Map<string, string>;
}

/**
 * Create an empty database image.
 */
export function createEmptyImage(): DatabaseImage {
  return { keyVals: new Map() };
}

/**
 * Operation carried by a {@link StoreRequest}.
 */
export enum StoreRequestType {
  STORE = "STORE",
  LOAD = "LOAD",
  ERASE = "ERASE",
}

/**
 * A single request against the store.
 */
export type StoreRequest =
  | { requestType: StoreRequestType.STORE; key: string; data: string }
  | { requestType: StoreRequestType.LOAD; key: string }
  | { requestType: StoreRequestType.ERASE; key: string };

/**
 * A well-formed request whose operation tag the store does not know.
 * It is answered with a failure response and never touches the image.
 */
export interface UnrecognizedRequest {
  requestType: "UNRECOGNIZED";
  rawRequestType: string;
  key: string;
}

/**
 * Response to a {@link StoreRequest}. `data` is only set for a successful LOAD.
 */
export interface StoreResponse {
  key: string;
  success: boolean;
  data?: string;
}

/**
 * Options for constructing a {@link PersistentStore}.
 */
export interface PersistentStoreOptions {
  /**
   * Delay before the first debounced flush, and the value the backoff resets to
   * after a successful flush. Together with `saveMaxBackoffMs` set to 0 this
   * disables the scheduler and makes every mutation persist inline.
   */
  saveInitialBackoffMs: number;
  /** Upper bound for the flush retry delay. */
  saveMaxBackoffMs: number;
}
