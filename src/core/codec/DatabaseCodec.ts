import { DatabaseDecodeError } from "../errors";
import type { DatabaseImage } from "../types";
import { isPlainObject } from "../utils/objects";

export const DATABASE_FORMAT = "durakv-db";
export const DATABASE_FORMAT_VERSION = 1;

/**
 * On-disk layout of a database image (UTF-8 JSON).
 */
interface SerializedDatabase {
  format: typeof DATABASE_FORMAT;
  version: number;
  keyVals: Record<string, string>;
}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Encode the whole image. Keys are written in sorted order so that equal
 * images always produce identical bytes.
 */
export function encodeDatabaseImage(image: DatabaseImage): Uint8Array {
  const keyVals: Record<string, string> = Object.create(null);
  for (const key of [...image.keyVals.keys()].sort()) {
    const value = image.keyVals.get(key);
    if (value !== undefined) {
      keyVals[key] = value;
    }
  }
  const serialized: SerializedDatabase = {
    format: DATABASE_FORMAT,
    version: DATABASE_FORMAT_VERSION,
    keyVals,
  };
  return textEncoder.encode(JSON.stringify(serialized));
}

/**
 * Decode bytes produced by {@link encodeDatabaseImage}.
 *
 * @throws DatabaseDecodeError if the bytes are not a valid encoded image
 */
export function decodeDatabaseImage(bytes: Uint8Array): DatabaseImage {
  let text: string;
  try {
    text = textDecoder.decode(bytes);
  } catch (e) {
    throw new DatabaseDecodeError("Database file is not valid UTF-8", e);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new DatabaseDecodeError("Database file is not valid JSON", e);
  }

  if (!isPlainObject(parsed)) {
    throw new DatabaseDecodeError("Database file does not contain an object");
  }
  if (parsed.format !== DATABASE_FORMAT) {
    throw new DatabaseDecodeError(`Unexpected database format: ${String(parsed.format)}`);
  }
  if (parsed.version !== DATABASE_FORMAT_VERSION) {
    throw new DatabaseDecodeError(`Unsupported database version: ${String(parsed.version)}`);
  }
  if (!isPlainObject(parsed.keyVals)) {
    throw new DatabaseDecodeError("Database keyVals is not an object");
  }

  const keyVals = new Map<string, string>();
  for (const [key, value] of Object.entries(parsed.keyVals)) {
    if (typeof value !== "string") {
      throw new DatabaseDecodeError(`Value for key '${key}' is not a string`);
    }
    keyVals.set(key, value);
  }
  return { keyVals };
}
