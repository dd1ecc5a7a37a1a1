import { decodeStoreRequest } from "./codec/RequestCodec";
import { StoreClosedError } from "./errors";
import { Logger, StoreLogger, getDefaultLogLevel } from "./logging";
import type { DatabasePersistence } from "./persistence/DatabasePersistence";
import { FlushScheduler } from "./persistence/FlushScheduler";
import { createEmptyImage, StoreRequestType } from "./types";
import type {
  DatabaseImage,
  PersistentStoreOptions,
  StoreRequest,
  StoreResponse,
  UnrecognizedRequest,
} from "./types";
import { SerialQueue } from "./utils/SerialQueue";

/**
 * Key-value store that keeps its database in memory and persists it through
 * a {@link DatabasePersistence}.
 *
 * All requests and all flushes run through one {@link SerialQueue}, so the
 * image has a single writer and a flush never observes a half-applied request.
 *
 * Persistence after a successful STORE or ERASE:
 * - both backoff delays 0: the image is saved before the response is returned.
 *   This is the only mode in which a request waits for disk I/O, and exists so
 *   that callers (mostly tests) can rely on the file being current.
 * - otherwise: a debounced flush is armed unless one is already pending, in
 *   which case the pending flush covers the mutation too. Failed flushes are
 *   retried with exponential backoff and never reported to clients.
 */
export class PersistentStore {
  private database: DatabaseImage = createEmptyImage();
  private readonly persistence: DatabasePersistence;
  private readonly scheduler: FlushScheduler;
  private readonly queue = new SerialQueue();
  private closed: boolean = false;
  private closing: Promise<void> | null = null;
  private logger: Logger;

  constructor(persistence: DatabasePersistence, options: PersistentStoreOptions, logger?: Logger) {
    this.persistence = persistence;
    this.logger = logger || new StoreLogger(getDefaultLogLevel(), "PersistentStore", true);
    this.scheduler = new FlushScheduler(
      {
        initialBackoffMs: options.saveInitialBackoffMs,
        maxBackoffMs: options.saveMaxBackoffMs,
      },
      () => this.saveDatabase(),
      (task) => this.queue.run(task),
      this.logger.createChild("FlushScheduler")
    );
  }

  /**
   * Create a store and load its database from `persistence`.
   * A missing or unreadable database is logged and the store starts empty.
   */
  static async open(
    persistence: DatabasePersistence,
    options: PersistentStoreOptions,
    logger?: Logger
  ): Promise<PersistentStore> {
    const store = new PersistentStore(persistence, options, logger);
    if (!(await store.loadDatabase())) {
      store.logger.error(
        `Failed to load database from '${persistence.getStoragePath()}', starting empty`
      );
    }
    return store;
  }

  /**
   * Replace the in-memory image with the persisted one.
   * @returns `false` if nothing could be loaded; the image is left untouched.
   */
  loadDatabase(): Promise<boolean> {
    return this.queue.run(async () => {
      const loaded = await this.persistence.load();
      if (loaded === null) {
        return false;
      }
      this.database = loaded;
      this.logger.info(`Loaded ${loaded.keyVals.size} keys`);
      return true;
    });
  }

  /**
   * Handle one request. Exactly one response is produced per call.
   *
   * @throws StoreClosedError if the store has been closed
   */
  handle(request: unknown): Promise<StoreResponse> {
    if (this.closed) {
      return Promise.reject(new StoreClosedError());
    }
    return this.queue.run(() => this.processRequest(request));
  }

  store(key: string, data: string): Promise<StoreResponse> {
    return this.handle({ requestType: StoreRequestType.STORE, key, data });
  }

  load(key: string): Promise<StoreResponse> {
    return this.handle({ requestType: StoreRequestType.LOAD, key });
  }

  erase(key: string): Promise<StoreResponse> {
    return this.handle({ requestType: StoreRequestType.ERASE, key });
  }

  /**
   * Save the image now, outside of the debounce schedule.
   */
  flush(): Promise<boolean> {
    return this.queue.run(() => this.saveDatabase());
  }

  /**
   * Stop accepting requests, drop any armed flush and save the image one last
   * time, whether or not anything changed since the previous save.
   */
  close(): Promise<void> {
    if (this.closing === null) {
      this.closed = true;
      this.scheduler.dispose();
      this.closing = this.queue.run(async () => {
        if (!(await this.saveDatabase())) {
          this.logger.error("Final flush on close failed");
        }
      });
    }
    return this.closing;
  }

  /**
   * Resolves once every request and flush queued so far has completed.
   */
  whenIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  isClosed(): boolean {
    return this.closed;
  }

  size(): number {
    return this.database.keyVals.size;
  }

  isFlushArmed(): boolean {
    return this.scheduler.isArmed();
  }

  isSynchronous(): boolean {
    return this.scheduler.isDisabled();
  }

  getScheduler(): FlushScheduler {
    return this.scheduler;
  }

  getNumOfWritesToDisk(): number {
    return this.persistence.getNumOfWritesToDisk();
  }

  private async processRequest(body: unknown): Promise<StoreResponse> {
    let request: StoreRequest | UnrecognizedRequest;
    try {
      request = decodeStoreRequest(body);
    } catch (e) {
      this.logger.error("Error while reading request", e);
      return { key: "", success: false };
    }

    const response = this.apply(request);

    if (response.success && request.requestType !== StoreRequestType.LOAD) {
      await this.schedulePersistence();
    }
    return response;
  }

  private apply(request: StoreRequest | UnrecognizedRequest): StoreResponse {
    const keyVals = this.database.keyVals;
    switch (request.requestType) {
      case StoreRequestType.STORE:
        keyVals.set(request.key, request.data);
        return { key: request.key, success: true };
      case StoreRequestType.LOAD: {
        const data = keyVals.get(request.key);
        return data === undefined
          ? { key: request.key, success: false }
          : { key: request.key, success: true, data };
      }
      case StoreRequestType.ERASE:
        return { key: request.key, success: keyVals.delete(request.key) };
      case "UNRECOGNIZED":
        this.logger.error(`Got unknown request type '${request.rawRequestType}'`);
        return { key: request.key, success: false };
    }
  }

  private async schedulePersistence(): Promise<void> {
    if (this.scheduler.isDisabled()) {
      // Hold the response until the file is written
      await this.saveDatabase();
      return;
    }
    this.scheduler.arm();
  }

  private saveDatabase(): Promise<boolean> {
    return this.persistence.save(this.database);
  }
}
