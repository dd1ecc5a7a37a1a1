import { RequestDecodeError } from "../errors";
import { StoreRequestType } from "../types";
import type { StoreRequest, UnrecognizedRequest } from "../types";
import { isPlainObject } from "../utils/objects";

/**
 * Validate an inbound request body.
 *
 * A body with the right shape but an unknown `requestType` decodes to an
 * {@link UnrecognizedRequest} so the caller can still echo its key.
 *
 * @throws RequestDecodeError if the body does not have the request shape
 */
export function decodeStoreRequest(body: unknown): StoreRequest | UnrecognizedRequest {
  if (!isPlainObject(body)) {
    throw new RequestDecodeError("Request must be an object");
  }

  const { requestType, key, data } = body;
  if (typeof requestType !== "string") {
    throw new RequestDecodeError("requestType must be a string");
  }
  if (typeof key !== "string") {
    throw new RequestDecodeError("key must be a string");
  }

  switch (requestType) {
    case StoreRequestType.STORE:
      if (typeof data !== "string") {
        throw new RequestDecodeError("data must be a string for STORE requests");
      }
      return { requestType: StoreRequestType.STORE, key, data };
    case StoreRequestType.LOAD:
      return { requestType: StoreRequestType.LOAD, key };
    case StoreRequestType.ERASE:
      return { requestType: StoreRequestType.ERASE, key };
    default:
      return { requestType: "UNRECOGNIZED", rawRequestType: requestType, key };
  }
}
