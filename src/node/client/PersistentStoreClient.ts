import { isPlainObject } from "../../core/utils/objects";
import { Logger, StoreLogger, getDefaultLogLevel } from "../../core/logging";
import { StoreRequestType } from "../../core/types";
import type { StoreRequest, StoreResponse } from "../../core/types";
import { PersistentStoreClientConfig, StoreClientError, StoreClientErrorType } from "./types";

// fetch errors come from Node's own realm, so no instanceof here
function isConnectionRefused(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("cause" in error)) {
    return false;
  }
  const cause = error.cause;
  return (
    typeof cause === "object" && cause !== null && "code" in cause && cause.code === "ECONNREFUSED"
  );
}

/**
 * HTTP client for a {@link PersistentStoreServer}.
 *
 * Uses the fetch API. Transient network failures are retried with
 * exponential backoff; HTTP error statuses are not. ERASE is not idempotent,
 * so it is only retried when the connection was refused and the server
 * cannot have seen it.
 */
export class PersistentStoreClient {
  private config: Required<PersistentStoreClientConfig>;
  private baseUrl: string;
  private logger: Logger;

  constructor(config: PersistentStoreClientConfig, logger?: Logger) {
    if (!config.baseUrl) {
      throw new Error("PersistentStoreClient requires baseUrl in config");
    }
    this.config = {
      timeout: 10000,
      retryAttempts: 3,
      retryDelayMs: 200,
      ...config,
    };
    // Ensure baseUrl doesn't end with /
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.logger = logger || new StoreLogger(getDefaultLogLevel(), "PersistentStoreClient", true);
  }

  /**
   * Store a value, overwriting any previous one.
   */
  async store(key: string, value: string): Promise<boolean> {
    const response = await this.request({ requestType: StoreRequestType.STORE, key, data: value });
    return response.success;
  }

  /**
   * Load a value.
   * @returns The value, or `null` if the key is not present.
   */
  async load(key: string): Promise<string | null> {
    const response = await this.request({ requestType: StoreRequestType.LOAD, key });
    return response.success && response.data !== undefined ? response.data : null;
  }

  /**
   * Erase a key.
   * @returns `true` if the key existed.
   */
  async erase(key: string): Promise<boolean> {
    const response = await this.request({ requestType: StoreRequestType.ERASE, key });
    return response.success;
  }

  /**
   * Store any JSON-serializable value.
   */
  storeObj<T>(key: string, value: T): Promise<boolean> {
    return this.store(key, JSON.stringify(value));
  }

  /**
   * Load a value stored with {@link storeObj}.
   *
   * @throws StoreClientError if the stored value is not JSON
   */
  async loadObj<T>(key: string): Promise<T | null> {
    const raw = await this.load(key);
    if (raw === null) {
      return null;
    }
    try {
      const parsed: T = JSON.parse(raw);
      return parsed;
    } catch (e) {
      throw new StoreClientError(
        StoreClientErrorType.INVALID_RESPONSE,
        `Value of '${key}' is not JSON: ${e instanceof Error ? e.message : String(e)}`
      );
    }
  }

  /**
   * Send one request and return the server's response as is.
   */
  async request(request: StoreRequest): Promise<StoreResponse> {
    this.logger.debug(`${request.requestType} ${request.key}`);
    const response = await this.fetchWithRetry(
      `${this.baseUrl}/store`,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(request),
      },
      request.requestType !== StoreRequestType.ERASE
    );
    return this.parseStoreResponse(await response.json());
  }

  private parseStoreResponse(body: unknown): StoreResponse {
    if (!isPlainObject(body) || typeof body.key !== "string" || typeof body.success !== "boolean") {
      throw new StoreClientError(
        StoreClientErrorType.INVALID_RESPONSE,
        "Server did not return a StoreResponse"
      );
    }
    const response: StoreResponse = { key: body.key, success: body.success };
    if (typeof body.data === "string") {
      response.data = body.data;
    }
    return response;
  }

  /**
   * Fetch with retry and exponential backoff.
   */
  private async fetchWithRetry(
    url: string,
    options: RequestInit,
    idempotent: boolean
  ): Promise<Response> {
    let lastError: Error | null = null;
    const attempts = this.config.retryAttempts;
    const baseDelay = this.config.retryDelayMs;

    for (let attempt = 0; attempt < attempts; attempt++) {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);
      try {
        const response = await fetch(url, { ...options, signal: controller.signal });

        if (response.status === 503) {
          throw new StoreClientError(StoreClientErrorType.STORE_CLOSED, "Store is closed");
        }
        if (!response.ok) {
          throw new StoreClientError(
            StoreClientErrorType.SERVER_ERROR,
            `HTTP ${response.status}`
          );
        }
        return response;
      } catch (error) {
        // The server answered; retrying would not change the outcome
        if (error instanceof StoreClientError) {
          throw error;
        }
        lastError = error instanceof Error ? error : new Error(String(error));

        if (lastError.name === "AbortError") {
          this.logger.warn(`Request timeout, attempt ${attempt + 1}/${attempts}`);
        } else {
          this.logger.warn(`Request failed, attempt ${attempt + 1}/${attempts}:`, lastError);
        }

        if (!idempotent && !isConnectionRefused(error)) {
          // The server may have applied it already
          break;
        }
        if (attempt < attempts - 1) {
          await this.sleep(baseDelay * Math.pow(2, attempt));
        }
      } finally {
        clearTimeout(timeoutId);
      }
    }

    throw new StoreClientError(
      StoreClientErrorType.NETWORK_ERROR,
      lastError?.message || "Request failed after retries"
    );
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
