import { decodeDatabaseImage, encodeDatabaseImage } from "../codec/DatabaseCodec";
import { Logger, StoreLogger, getDefaultLogLevel } from "../logging";
import type { DatabaseImage } from "../types";

/**
 * Durable home of a {@link DatabaseImage}.
 *
 * Implementations never throw from {@link save} or {@link load}: failures are
 * logged and reported through the return value, so that the caller can retry
 * a save or start with an empty database.
 */
export interface DatabasePersistence {
  /**
   * Write the whole image, replacing the previous one atomically.
   * @returns `true` once the image is durable, `false` on any failure.
   */
  save(image: DatabaseImage): Promise<boolean>;

  /**
   * Read the last saved image.
   * @returns The image, or `null` if none exists or it cannot be read or decoded.
   */
  load(): Promise<DatabaseImage | null>;

  /**
   * Number of successful saves since construction.
   */
  getNumOfWritesToDisk(): number;

  /**
   * Human-readable location of the stored image, used in log messages.
   */
  getStoragePath(): string;
}

/**
 * In-memory {@link DatabasePersistence} that keeps the last encoded image.
 * Useful for tests and as a reference implementation.
 */
export class InMemoryDatabasePersistence implements DatabasePersistence {
  private stored: Uint8Array | null;
  private numOfWrites: number = 0;
  private failuresToInject: number = 0;
  private saveAttempts: number = 0;
  private logger: Logger;

  constructor(initial: Uint8Array | null = null, logger?: Logger) {
    this.stored = initial;
    this.logger =
      logger || new StoreLogger(getDefaultLogLevel(), "InMemoryDatabasePersistence", true);
  }

  async save(image: DatabaseImage): Promise<boolean> {
    this.saveAttempts++;
    if (this.failuresToInject > 0) {
      this.failuresToInject--;
      this.logger.error("Simulated write failure");
      return false;
    }
    this.stored = encodeDatabaseImage(image);
    this.numOfWrites++;
    return true;
  }

  async load(): Promise<DatabaseImage | null> {
    if (this.stored === null) {
      return null;
    }
    try {
      return decodeDatabaseImage(this.stored);
    } catch (e) {
      this.logger.error("Failed to decode stored database", e);
      return null;
    }
  }

  getNumOfWritesToDisk(): number {
    return this.numOfWrites;
  }

  getStoragePath(): string {
    return "memory";
  }

  /**
   * Make the next `count` saves fail.
   */
  failNextSaves(count: number): void {
    this.failuresToInject = count;
  }

  /**
   * Number of save calls, successful or not.
   */
  getSaveAttempts(): number {
    return this.saveAttempts;
  }

  /**
   * The raw bytes of the last successful save.
   */
  getStoredBytes(): Uint8Array | null {
    return this.stored;
  }
}
