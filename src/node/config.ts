import { ConfigError } from "../core/errors";
import { LogLevel, LOG_LEVEL_ENV_VAR, getDefaultLogLevel, parseLogLevel } from "../core/logging";
import { DEFAULT_FILE_MODE } from "./persistence/FileDatabasePersistence";

/**
 * Everything needed to start a durakv server.
 */
export interface PersistentStoreConfig {
  /** File holding the persisted database */
  storageFilePath: string;
  host: string;
  port: number;
  /** 0 together with saveMaxBackoffMs = 0 selects synchronous persistence */
  saveInitialBackoffMs: number;
  saveMaxBackoffMs: number;
  /** Permission bits of the storage file */
  fileMode: number;
  logLevel: LogLevel;
}

export interface CliOptions {
  config: PersistentStoreConfig;
  help: boolean;
}

/**
 * Environment variables read by {@link loadConfig}.
 */
export const ENV_VARS = {
  STORAGE_FILE: "DURAKV_STORAGE_FILE",
  HOST: "DURAKV_HOST",
  PORT: "DURAKV_PORT",
  SAVE_INITIAL_BACKOFF_MS: "DURAKV_SAVE_INITIAL_BACKOFF_MS",
  SAVE_MAX_BACKOFF_MS: "DURAKV_SAVE_MAX_BACKOFF_MS",
  FILE_MODE: "DURAKV_FILE_MODE",
  LOG_LEVEL: LOG_LEVEL_ENV_VAR,
} as const;

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 60002;
export const DEFAULT_SAVE_INITIAL_BACKOFF_MS = 100;
export const DEFAULT_SAVE_MAX_BACKOFF_MS = 5000;

type Env = Record<string, string | undefined>;

function parseNonNegativeInt(name: string, raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`Invalid ${name}: ${raw}`);
  }
  return parseInt(raw, 10);
}

function parsePort(name: string, raw: string): number {
  const port = parseNonNegativeInt(name, raw);
  if (port > 65535) {
    throw new ConfigError(`Invalid ${name}: ${raw}`);
  }
  return port;
}

function parseFileMode(name: string, raw: string): number {
  if (!/^0?o?[0-7]{3,4}$/.test(raw.trim())) {
    throw new ConfigError(`Invalid ${name}: ${raw}`);
  }
  return parseInt(raw.trim().replace(/^0?o?/, ""), 8);
}

/**
 * Build the server configuration from defaults, then environment variables,
 * then command line flags (highest precedence).
 *
 * @throws ConfigError on unknown flags, missing flag values or invalid values
 */
export function loadConfig(args: string[], env: Env = process.env): CliOptions {
  const envPort = env[ENV_VARS.PORT];
  const config: PersistentStoreConfig = {
    storageFilePath: env[ENV_VARS.STORAGE_FILE] ?? "",
    host: env[ENV_VARS.HOST] || DEFAULT_HOST,
    port: envPort ? parsePort(ENV_VARS.PORT, envPort) : DEFAULT_PORT,
    saveInitialBackoffMs: DEFAULT_SAVE_INITIAL_BACKOFF_MS,
    saveMaxBackoffMs: DEFAULT_SAVE_MAX_BACKOFF_MS,
    fileMode: DEFAULT_FILE_MODE,
    logLevel: getDefaultLogLevel(),
  };

  const envInitial = env[ENV_VARS.SAVE_INITIAL_BACKOFF_MS];
  if (envInitial) {
    config.saveInitialBackoffMs = parseNonNegativeInt(ENV_VARS.SAVE_INITIAL_BACKOFF_MS, envInitial);
  }
  const envMax = env[ENV_VARS.SAVE_MAX_BACKOFF_MS];
  if (envMax) {
    config.saveMaxBackoffMs = parseNonNegativeInt(ENV_VARS.SAVE_MAX_BACKOFF_MS, envMax);
  }
  const envMode = env[ENV_VARS.FILE_MODE];
  if (envMode) {
    config.fileMode = parseFileMode(ENV_VARS.FILE_MODE, envMode);
  }
  const envLogLevel = env[ENV_VARS.LOG_LEVEL];
  if (envLogLevel) {
    config.logLevel = parseLogLevel(envLogLevel);
  }

  let help = false;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];
    const requireValue = (): string => {
      if (nextArg === undefined) {
        throw new ConfigError(`Missing value for ${arg}`);
      }
      i++;
      return nextArg;
    };

    switch (arg) {
      case "-f":
      case "--storage-file":
        config.storageFilePath = requireValue();
        break;

      case "-H":
      case "--host":
        config.host = requireValue();
        break;

      case "-p":
      case "--port":
        config.port = parsePort("port", requireValue());
        break;

      case "--save-initial-backoff-ms":
        config.saveInitialBackoffMs = parseNonNegativeInt(arg, requireValue());
        break;

      case "--save-max-backoff-ms":
        config.saveMaxBackoffMs = parseNonNegativeInt(arg, requireValue());
        break;

      case "--file-mode":
        config.fileMode = parseFileMode(arg, requireValue());
        break;

      case "--log-level":
        config.logLevel = parseLogLevel(requireValue());
        break;

      case "-h":
      case "--help":
        help = true;
        break;

      default:
        throw new ConfigError(`Unknown option: ${arg}`);
    }
  }

  if (!help) {
    validateConfig(config);
  }
  return { config, help };
}

/**
 * @throws ConfigError if the configuration cannot start a server
 */
export function validateConfig(config: PersistentStoreConfig): void {
  if (!config.storageFilePath) {
    throw new ConfigError(
      `Storage file path is required (--storage-file or ${ENV_VARS.STORAGE_FILE})`
    );
  }
  if (config.saveInitialBackoffMs > config.saveMaxBackoffMs) {
    throw new ConfigError(
      `Initial save backoff (${config.saveInitialBackoffMs}ms) exceeds maximum (${config.saveMaxBackoffMs}ms)`
    );
  }
}
