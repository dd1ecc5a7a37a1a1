/**
 * Integration tests for the HTTP transport and client:
 * - request/response round trips through express
 * - protocol errors (malformed bodies, unknown operations)
 * - health and flush endpoints
 * - bind failure and run/stop lifecycle
 */

import { PersistentStore } from "../core/PersistentStore";
import { BindError } from "../core/errors";
import { InMemoryDatabasePersistence } from "../core/persistence/DatabasePersistence";
import { StoreRequestType } from "../core/types";
import type { DatabaseImage } from "../core/types";
import { PersistentStoreClient } from "../node/client/PersistentStoreClient";
import { StoreClientError, StoreClientErrorType } from "../node/client/types";
import { PersistentStoreServer } from "../node/server/PersistentStoreServer";

const HOST = "127.0.0.1";

// Helper to make raw HTTP requests
async function httpRequest(
  url: string,
  method: string = "GET",
  body?: string
): Promise<{ status: number; body: unknown }> {
  const response = await fetch(url, {
    method,
    headers: { "Content-Type": "application/json" },
    body,
  });

  let responseBody: unknown;
  try {
    responseBody = await response.json();
  } catch {
    responseBody = null;
  }
  return { status: response.status, body: responseBody };
}

describe("PersistentStoreServer", () => {
  let persistence: InMemoryDatabasePersistence;
  let store: PersistentStore;
  let server: PersistentStoreServer;
  let client: PersistentStoreClient;
  let baseUrl: string;
  let errorSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(async () => {
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
    persistence = new InMemoryDatabasePersistence();
    store = new PersistentStore(persistence, { saveInitialBackoffMs: 0, saveMaxBackoffMs: 0 });
    server = new PersistentStoreServer(store, { host: HOST, port: 0 });
    const port = await server.listen();
    baseUrl = `http://${HOST}:${port}`;
    client = new PersistentStoreClient({ baseUrl, retryAttempts: 1 });
  });

  afterEach(async () => {
    await server.close();
    errorSpy.mockRestore();
    warnSpy.mockRestore();
  });

  test("store, load, erase, load", async () => {
    expect(await client.request({ requestType: StoreRequestType.STORE, key: "a", data: "1" })).toEqual({
      key: "a",
      success: true,
    });
    expect(await client.load("a")).toBe("1");
    expect(await client.erase("a")).toBe(true);
    expect(await client.load("a")).toBeNull();
    expect(await client.erase("a")).toBe(false);
  });

  test("persists synchronously behind the HTTP response", async () => {
    await client.store("k", "v");
    expect(persistence.getNumOfWritesToDisk()).toBe(1);
    expect((await persistence.load())?.keyVals.get("k")).toBe("v");
  });

  test("stores and loads JSON values", async () => {
    const config = { retries: 3, hosts: ["a", "b"] };
    expect(await client.storeObj("config", config)).toBe(true);
    expect(await client.loadObj<typeof config>("config")).toEqual(config);
    expect(await client.loadObj("missing")).toBeNull();
  });

  test("loadObj rejects values that are not JSON", async () => {
    await client.store("plain", "not json");
    await expect(client.loadObj("plain")).rejects.toMatchObject({
      name: "StoreClientError",
      type: StoreClientErrorType.INVALID_RESPONSE,
    });
  });

  test("answers unknown operations with a failure and the echoed key", async () => {
    const response = await httpRequest(
      `${baseUrl}/store`,
      "POST",
      JSON.stringify({ requestType: "COMPACT", key: "a" })
    );
    expect(response).toEqual({ status: 200, body: { key: "a", success: false } });
  });

  test("answers malformed requests with an empty key", async () => {
    const response = await httpRequest(
      `${baseUrl}/store`,
      "POST",
      JSON.stringify({ requestType: "STORE", key: "a" })
    );
    expect(response).toEqual({ status: 200, body: { key: "", success: false } });
    expect(store.size()).toBe(0);
  });

  test("rejects bodies that are not JSON", async () => {
    const response = await httpRequest(`${baseUrl}/store`, "POST", "{not json");
    expect(response).toEqual({ status: 400, body: { key: "", success: false } });
  });

  test("reports health", async () => {
    await client.store("a", "1");
    await client.store("b", "2");
    const response = await httpRequest(`${baseUrl}/health`);
    expect(response).toEqual({
      status: 200,
      body: { status: "ok", keys: 2, numOfWritesToDisk: 2, flushArmed: false },
    });
  });

  test("flushes on demand", async () => {
    const response = await httpRequest(`${baseUrl}/admin/flush`, "POST");
    expect(response).toEqual({ status: 200, body: { success: true } });
    expect(persistence.getNumOfWritesToDisk()).toBe(1);
  });

  test("answers 503 once the store is closed", async () => {
    await store.close();
    const response = await httpRequest(
      `${baseUrl}/store`,
      "POST",
      JSON.stringify({ requestType: "LOAD", key: "a" })
    );
    expect(response).toEqual({ status: 503, body: { key: "", success: false } });
    await expect(client.load("a")).rejects.toMatchObject({
      type: StoreClientErrorType.STORE_CLOSED,
    });
  });

  test("fails to bind an address already in use", async () => {
    const port = new URL(baseUrl).port;
    const other = new PersistentStoreServer(store, { host: HOST, port: Number(port) });
    await expect(other.listen()).rejects.toBeInstanceOf(BindError);
    expect(other.isRunning()).toBe(false);
  });

  test("run resolves once stop has been called", async () => {
    const runStore = new PersistentStore(new InMemoryDatabasePersistence(), {
      saveInitialBackoffMs: 0,
      saveMaxBackoffMs: 0,
    });
    const runServer = new PersistentStoreServer(runStore, { host: HOST, port: 0 });
    let finished = false;
    const running = runServer.run().then(() => {
      finished = true;
    });

    // Wait until bound
    while (!runServer.isRunning()) {
      await new Promise((resolve) => setTimeout(resolve, 5));
    }
    expect(finished).toBe(false);

    await runServer.stop();
    await running;
    expect(finished).toBe(true);
    expect(runServer.isRunning()).toBe(false);
  });

  test("close stops serving and flushes the store", async () => {
    await client.store("a", "1");
    await server.close();

    expect(store.isClosed()).toBe(true);
    expect(persistence.getNumOfWritesToDisk()).toBe(2);
    await expect(
      new PersistentStoreClient({ baseUrl, retryAttempts: 1 }).load("a")
    ).rejects.toBeInstanceOf(StoreClientError);
  });
});

describe("PersistentStoreClient", () => {
  test("requires a base URL", () => {
    expect(() => new PersistentStoreClient({ baseUrl: "" })).toThrow(
      "PersistentStoreClient requires baseUrl in config"
    );
  });

  test("gives up after the configured attempts when nothing listens", async () => {
    const warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
    // Port 9 (discard) on localhost is expected to refuse connections
    const client = new PersistentStoreClient({
      baseUrl: "http://127.0.0.1:9/",
      retryAttempts: 2,
      retryDelayMs: 1,
    });
    await expect(client.load("a")).rejects.toMatchObject({
      type: StoreClientErrorType.NETWORK_ERROR,
    });
    expect(warnSpy).toHaveBeenCalledTimes(2);
    warnSpy.mockRestore();
  });
});

describe("PersistentStoreClient against a slow store", () => {
  // Synchronous mode holds every mutation response until the save finishes
  class SlowPersistence extends InMemoryDatabasePersistence {
    async save(image: DatabaseImage): Promise<boolean> {
      await new Promise((resolve) => setTimeout(resolve, 150));
      return super.save(image);
    }
  }

  let store: PersistentStore;
  let server: PersistentStoreServer;
  let baseUrl: string;
  let warnSpy: jest.SpyInstance;

  beforeEach(async () => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
    store = new PersistentStore(new SlowPersistence(), { saveInitialBackoffMs: 0, saveMaxBackoffMs: 0 });
    server = new PersistentStoreServer(store, { host: HOST, port: 0 });
    const port = await server.listen();
    baseUrl = `http://${HOST}:${port}`;
  });

  afterEach(async () => {
    await store.whenIdle();
    await server.close();
    warnSpy.mockRestore();
  });

  test("does not resend an ERASE that timed out", async () => {
    await store.store("a", "1");
    const handleSpy = jest.spyOn(store, "handle");
    const client = new PersistentStoreClient({
      baseUrl,
      timeout: 50,
      retryAttempts: 3,
      retryDelayMs: 1,
    });

    await expect(client.erase("a")).rejects.toMatchObject({
      type: StoreClientErrorType.NETWORK_ERROR,
    });
    await store.whenIdle();

    expect(handleSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(store.size()).toBe(0);
  });

  test("retries an ERASE whose connection was refused", async () => {
    const client = new PersistentStoreClient({
      baseUrl: "http://127.0.0.1:9/",
      retryAttempts: 2,
      retryDelayMs: 1,
    });
    await expect(client.erase("a")).rejects.toMatchObject({
      type: StoreClientErrorType.NETWORK_ERROR,
    });
    expect(warnSpy).toHaveBeenCalledTimes(2);
  });
});
