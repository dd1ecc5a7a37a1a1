import { LogLevel } from "./LogLevel";

/**
 * Logger interface used by every durakv component.
 * Provides leveled logging with a hierarchical context and sanitization.
 */
export interface Logger {
  /**
   * Log an error message.
   */
  error(message: string, ...args: unknown[]): void;

  /**
   * Log a warning message.
   */
  warn(message: string, ...args: unknown[]): void;

  /**
   * Log an informational message.
   */
  info(message: string, ...args: unknown[]): void;

  /**
   * Log a debug message (verbose).
   */
  debug(message: string, ...args: unknown[]): void;

  /**
   * Log a trace message (most verbose).
   */
  trace(message: string, ...args: unknown[]): void;

  /**
   * Check if a log level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean;

  /**
   * Create a child logger with additional context.
   * Useful for hierarchical logging (e.g., "PersistentStore.FlushScheduler").
   */
  createChild(context: string): Logger;
}
