export { LogLevel, LOG_LEVEL_ENV_VAR, parseLogLevel, getDefaultLogLevel } from "./LogLevel";
export type { Logger } from "./Logger";
export { StoreLogger } from "./StoreLogger";
