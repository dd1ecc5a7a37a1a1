import { chmod, mkdir, open, readFile, rename, rm } from "fs/promises";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";

import { decodeDatabaseImage, encodeDatabaseImage } from "../../core/codec/DatabaseCodec";
import { PersistenceError, PersistenceOperation } from "../../core/errors";
import { Logger, StoreLogger, getDefaultLogLevel } from "../../core/logging";
import type { DatabasePersistence } from "../../core/persistence/DatabasePersistence";
import type { DatabaseImage } from "../../core/types";
import { SerialQueue } from "../../core/utils/SerialQueue";

/**
 * Owner read-write, group and others read-only. Older deployments used the
 * world-writable 0o666; pass it explicitly through {@link FileDatabasePersistenceOptions.fileMode}
 * where that is still required.
 */
export const DEFAULT_FILE_MODE = 0o644;

export interface FileDatabasePersistenceOptions {
  /** Permission bits of the storage file. Default: 0o644 */
  fileMode?: number;
  /** Create missing parent directories on save. Default: true */
  createParentDirs?: boolean;
}

function tempPathFor(finalPath: string): string {
  return `${finalPath}.tmp-${process.pid}-${uuidv4()}`;
}

function errorCode(e: unknown): string | undefined {
  // fs errors are not always instances of this realm's Error
  if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") {
    return e.code;
  }
  return undefined;
}

/**
 * Node.js filesystem-backed {@link DatabasePersistence}.
 *
 * The image lives in a single file. Saves write a temp file beside it, fsync,
 * and rename it over the target, so a crash mid-write leaves the previous
 * file intact. Saves are serialized so that renames land in call order.
 */
export class FileDatabasePersistence implements DatabasePersistence {
  private readonly storagePath: string;
  private readonly fileMode: number;
  private readonly createParentDirs: boolean;
  private readonly writes = new SerialQueue();
  private numOfWritesToDisk: number = 0;
  private logger: Logger;

  constructor(storagePath: string, options?: FileDatabasePersistenceOptions, logger?: Logger) {
    this.storagePath = storagePath;
    this.fileMode = options?.fileMode ?? DEFAULT_FILE_MODE;
    this.createParentDirs = options?.createParentDirs ?? true;
    this.logger =
      logger || new StoreLogger(getDefaultLogLevel(), "FileDatabasePersistence", true);
  }

  getStoragePath(): string {
    return this.storagePath;
  }

  getNumOfWritesToDisk(): number {
    return this.numOfWritesToDisk;
  }

  save(image: DatabaseImage): Promise<boolean> {
    // Encode now: the file reflects the image as of this call
    let data: Uint8Array;
    try {
      data = encodeDatabaseImage(image);
    } catch (e) {
      this.logger.error(
        "Failed to encode database",
        new PersistenceError(PersistenceOperation.ENCODE, this.storagePath, e)
      );
      return Promise.resolve(false);
    }

    return this.writes.run(async () => {
      try {
        await this.writeFileAtomic(data);
      } catch (e) {
        this.logger.error(`Failed to write data to file '${this.storagePath}'`, e);
        return false;
      }
      this.numOfWritesToDisk++;
      this.logger.debug(`Wrote ${data.byteLength} bytes to '${this.storagePath}'`);
      return true;
    });
  }

  async load(): Promise<DatabaseImage | null> {
    let data: Buffer;
    try {
      data = await readFile(this.storagePath);
    } catch (e) {
      if (errorCode(e) === "ENOENT") {
        this.logger.debug(`No database file at '${this.storagePath}'`);
      } else {
        this.logger.error(
          "Failed to read database file",
          new PersistenceError(PersistenceOperation.READ, this.storagePath, e)
        );
      }
      return null;
    }

    try {
      const image = decodeDatabaseImage(
        new Uint8Array(data.buffer, data.byteOffset, data.byteLength)
      );
      this.logger.debug(`Loaded ${image.keyVals.size} keys from '${this.storagePath}'`);
      return image;
    } catch (e) {
      this.logger.error(`Failed to decode file content of '${this.storagePath}'`, e);
      return null;
    }
  }

  private async writeFileAtomic(data: Uint8Array): Promise<void> {
    if (this.createParentDirs) {
      await mkdir(path.dirname(this.storagePath), { recursive: true });
    }

    const tmpPath = tempPathFor(this.storagePath);
    try {
      try {
        const handle = await open(tmpPath, "w", this.fileMode);
        try {
          await handle.writeFile(data);
          await handle.sync();
        } finally {
          await handle.close();
        }
        // open() applies the umask; set the exact mode before the file becomes visible
        await chmod(tmpPath, this.fileMode);
      } catch (e) {
        throw new PersistenceError(PersistenceOperation.WRITE, this.storagePath, e);
      }

      try {
        await rename(tmpPath, this.storagePath);
      } catch (e) {
        throw new PersistenceError(PersistenceOperation.RENAME, this.storagePath, e);
      }
    } catch (e) {
      await rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(`Failed to remove temp file '${tmpPath}'`, cleanupError);
      });
      throw e;
    }
  }
}
