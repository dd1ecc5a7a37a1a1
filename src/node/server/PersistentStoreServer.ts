import express, { NextFunction, Request, Response } from "express";
import type { Server } from "http";

import type { PersistentStore } from "../../core/PersistentStore";
import { BindError, StoreClosedError } from "../../core/errors";
import { Logger, StoreLogger, getDefaultLogLevel } from "../../core/logging";
import type { StoreResponse } from "../../core/types";

export interface PersistentStoreServerOptions {
  host: string;
  /** Port to bind; 0 picks a free one. */
  port: number;
}

/**
 * Response body for GET /health
 */
export interface HealthResponse {
  status: "ok";
  keys: number;
  numOfWritesToDisk: number;
  flushArmed: boolean;
}

/**
 * Response body for POST /admin/flush
 */
export interface FlushResponse {
  success: boolean;
}

const FAILED_REQUEST: StoreResponse = { key: "", success: false };

/**
 * Express HTTP transport in front of a {@link PersistentStore}.
 *
 * Endpoints:
 * - POST /store - handle one StoreRequest, answer with its StoreResponse
 * - GET /health - key count, write counter and scheduler state
 * - POST /admin/flush - save the database now
 */
export class PersistentStoreServer {
  private app: express.Application;
  private store: PersistentStore;
  private options: PersistentStoreServerOptions;
  private server: Server | null = null;
  private stopWaiters: Array<() => void> = [];
  private logger: Logger;

  constructor(store: PersistentStore, options: PersistentStoreServerOptions, logger?: Logger) {
    this.store = store;
    this.options = options;
    this.logger = logger || new StoreLogger(getDefaultLogLevel(), "PersistentStoreServer", true);
    this.app = express();

    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Get the Express application for testing or custom configuration.
   */
  getApp(): express.Application {
    return this.app;
  }

  getStore(): PersistentStore {
    return this.store;
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  /**
   * Bind the configured address.
   *
   * @returns the bound port
   * @throws BindError if the address cannot be acquired
   */
  listen(): Promise<number> {
    if (this.server !== null) {
      return Promise.resolve(this.boundPort(this.server));
    }

    const { host, port } = this.options;
    this.logger.debug(`Binding server socket on ${host}:${port}`);

    return new Promise<number>((resolve, reject) => {
      const server = this.app.listen(port, host);
      server.once("error", (error: Error) => {
        reject(new BindError(`${host}:${port}`, error));
      });
      server.once("listening", () => {
        this.server = server;
        const boundPort = this.boundPort(server);
        this.logger.info(`Listening on ${host}:${boundPort}`);
        resolve(boundPort);
      });
    });
  }

  /**
   * Bind and serve until {@link stop} is called.
   */
  async run(): Promise<void> {
    await this.listen();
    await new Promise<void>((resolve) => {
      this.stopWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting connections and wait until the HTTP server has shut down.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (server === null) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error?: Error) => (error ? reject(error) : resolve()));
      server.closeIdleConnections();
    });
    this.logger.info("Server stopped");

    const waiters = this.stopWaiters;
    this.stopWaiters = [];
    for (const wake of waiters) {
      wake();
    }
  }

  /**
   * Stop serving (if running) and close the store, which flushes once more.
   */
  async close(): Promise<void> {
    await this.stop();
    await this.store.close();
  }

  private boundPort(server: Server): number {
    const address = server.address();
    if (address !== null && typeof address === "object") {
      return address.port;
    }
    return this.options.port;
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: "16mb" }));

    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      this.logger.trace(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes(): void {
    this.app.post("/store", this.handleStore.bind(this));

    this.app.get("/health", (_req: Request, res: Response) => {
      const response: HealthResponse = {
        status: "ok",
        keys: this.store.size(),
        numOfWritesToDisk: this.store.getNumOfWritesToDisk(),
        flushArmed: this.store.isFlushArmed(),
      };
      res.json(response);
    });

    this.app.post("/admin/flush", this.handleFlush.bind(this));

    this.app.use(this.errorHandler.bind(this));
  }

  private async handleStore(req: Request, res: Response): Promise<void> {
    try {
      const response = await this.store.handle(req.body);
      res.json(response);
    } catch (error) {
      this.handleStoreError(error, res);
    }
  }

  private async handleFlush(_req: Request, res: Response): Promise<void> {
    try {
      const response: FlushResponse = { success: await this.store.flush() };
      res.json(response);
    } catch (error) {
      this.handleStoreError(error, res);
    }
  }

  private handleStoreError(error: unknown, res: Response): void {
    if (error instanceof StoreClosedError) {
      res.status(503).json(FAILED_REQUEST);
      return;
    }
    this.logger.error("Request error", error);
    res.status(500).json(FAILED_REQUEST);
  }

  private errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
    // Body that is not JSON at all
    if (err instanceof SyntaxError) {
      this.logger.error("Error while reading request", err);
      res.status(400).json(FAILED_REQUEST);
      return;
    }
    this.logger.error("Unhandled error", err);
    res.status(500).json(FAILED_REQUEST);
  }
}
