#!/usr/bin/env node
/**
 * durakv server - entry point
 *
 * Usage:
 *   node dist/node/cli.js --storage-file <path> [options]
 */

import { PersistentStore } from "../core/PersistentStore";
import { BindError, ConfigError } from "../core/errors";
import { StoreLogger } from "../core/logging";
import { ENV_VARS, loadConfig } from "./config";
import { FileDatabasePersistence } from "./persistence/FileDatabasePersistence";
import { PersistentStoreServer } from "./server/PersistentStoreServer";

function showHelp(): void {
  console.log(`
durakv - durable key-value store server

Usage:
  node dist/node/cli.js --storage-file <path> [options]

Options:
  -f, --storage-file <path>          Database file (required)
  -H, --host <host>                  Bind host (default: 127.0.0.1)
  -p, --port <port>                  Bind port (default: 60002)
      --save-initial-backoff-ms <n>  Debounce window before a save (default: 100)
      --save-max-backoff-ms <n>      Ceiling for the save retry delay (default: 5000)
                                     Both 0: save before every response
      --file-mode <octal>            Database file permissions (default: 644)
      --log-level <level>            error | warn | info | debug | trace
  -h, --help                         Show this help message

Environment variables:
  ${ENV_VARS.STORAGE_FILE}, ${ENV_VARS.HOST}, ${ENV_VARS.PORT},
  ${ENV_VARS.SAVE_INITIAL_BACKOFF_MS}, ${ENV_VARS.SAVE_MAX_BACKOFF_MS},
  ${ENV_VARS.FILE_MODE}, ${ENV_VARS.LOG_LEVEL}
`);
}

async function main(): Promise<void> {
  const { config, help } = loadConfig(process.argv.slice(2));
  if (help) {
    showHelp();
    return;
  }

  const logger = new StoreLogger(config.logLevel, "durakv", true);
  logger.info(`Storage file: ${config.storageFilePath}`);
  logger.info(
    config.saveInitialBackoffMs === 0 && config.saveMaxBackoffMs === 0
      ? "Persistence: synchronous"
      : `Persistence: debounced (${config.saveInitialBackoffMs}ms, max ${config.saveMaxBackoffMs}ms)`
  );

  const persistence = new FileDatabasePersistence(
    config.storageFilePath,
    { fileMode: config.fileMode },
    logger.createChild("FileDatabasePersistence")
  );
  const store = await PersistentStore.open(
    persistence,
    {
      saveInitialBackoffMs: config.saveInitialBackoffMs,
      saveMaxBackoffMs: config.saveMaxBackoffMs,
    },
    logger.createChild("PersistentStore")
  );
  const server = new PersistentStoreServer(
    store,
    { host: config.host, port: config.port },
    logger.createChild("PersistentStoreServer")
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received, shutting down`);
    await server.stop();
  };
  process.once("SIGINT", () => {
    shutdown("SIGINT").catch((error: unknown) => logger.error("Shutdown failed", error));
  });
  process.once("SIGTERM", () => {
    shutdown("SIGTERM").catch((error: unknown) => logger.error("Shutdown failed", error));
  });

  try {
    await server.run();
  } finally {
    // Final flush, whether the server stopped normally or never bound
    await store.close();
  }
  logger.info(`Wrote database ${store.getNumOfWritesToDisk()} time(s)`);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
    console.error("Run with --help for usage.");
  } else if (error instanceof BindError) {
    console.error(`Fatal: ${error.message}`);
  } else {
    console.error("Fatal error:", error);
  }
  process.exit(1);
});
