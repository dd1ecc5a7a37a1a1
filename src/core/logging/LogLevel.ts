/**
 * Log levels for the durakv logger.
 * Lower numbers indicate higher severity.
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  TRACE = 4,
}

/** Environment variable consulted by {@link getDefaultLogLevel}. */
export const LOG_LEVEL_ENV_VAR = "DURAKV_LOG_LEVEL";

/**
 * Parse a log level string to LogLevel enum.
 * Supports: error, warn, info, debug, trace (case-insensitive)
 */
export function parseLogLevel(level: string): LogLevel {
  const normalized = level.toLowerCase().trim();
  switch (normalized) {
    case "error":
      return LogLevel.ERROR;
    case "warn":
      return LogLevel.WARN;
    case "info":
      return LogLevel.INFO;
    case "debug":
      return LogLevel.DEBUG;
    case "trace":
      return LogLevel.TRACE;
    default:
      return LogLevel.INFO; // Default to INFO if invalid
  }
}

/**
 * Get the default log level from the DURAKV_LOG_LEVEL environment variable, or INFO.
 */
export function getDefaultLogLevel(): LogLevel {
  const fromEnv = process.env[LOG_LEVEL_ENV_VAR];
  if (fromEnv) {
    return parseLogLevel(fromEnv);
  }
  return LogLevel.INFO;
}
