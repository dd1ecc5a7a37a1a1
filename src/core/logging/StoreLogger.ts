import { LogLevel, getDefaultLogLevel } from "./LogLevel";
import { Logger } from "./Logger";

/** Strings longer than this are shortened before they reach the console. */
const MAX_LOGGED_STRING_LENGTH = 256;

/**
 * Long base64 payloads (keys, signatures, encoded blobs). Plain words and
 * repeated characters do not qualify.
 */
function looksLikeBase64(str: string): boolean {
  if (str.length <= 200 || str.length % 4 !== 0 || !/^[A-Za-z0-9+/]+={0,2}$/.test(str)) {
    return false;
  }
  return /[+/=]/.test(str) || (/[a-z]/.test(str) && /[A-Z]/.test(str) && /\d/.test(str));
}

/**
 * Console-backed {@link Logger} with a dotted context prefix and sanitization
 * of stored values, which may be arbitrarily large or sensitive.
 */
export class StoreLogger implements Logger {
  private level: LogLevel;
  private context: string;
  private sanitize: boolean;

  constructor(
    level: LogLevel = getDefaultLogLevel(),
    context: string = "",
    sanitize: boolean = true
  ) {
    this.level = level;
    this.context = context;
    this.sanitize = sanitize;
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled(LogLevel.ERROR)) {
      this.log(LogLevel.ERROR, message, args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled(LogLevel.WARN)) {
      this.log(LogLevel.WARN, message, args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled(LogLevel.INFO)) {
      this.log(LogLevel.INFO, message, args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      this.log(LogLevel.DEBUG, message, args);
    }
  }

  trace(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      this.log(LogLevel.TRACE, message, args);
    }
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level <= this.level;
  }

  createChild(context: string): Logger {
    return new StoreLogger(
      this.level,
      `${this.context}${this.context ? "." : ""}${context}`,
      this.sanitize
    );
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    const prefix = `[${LogLevel[level]}]${this.context ? `[${this.context}]` : ""}`;
    const sanitizedArgs = this.sanitize ? this.sanitizeArgs(args) : args;

    switch (level) {
      case LogLevel.ERROR:
        console.error(prefix, message, ...sanitizedArgs);
        break;
      case LogLevel.WARN:
        console.warn(prefix, message, ...sanitizedArgs);
        break;
      case LogLevel.INFO:
        console.info(prefix, message, ...sanitizedArgs);
        break;
      case LogLevel.DEBUG:
      case LogLevel.TRACE:
        console.debug(prefix, message, ...sanitizedArgs);
        break;
    }
  }

  private sanitizeArgs(args: unknown[]): unknown[] {
    return args.map((arg) => {
      if (typeof arg === "string") {
        return this.sanitizeString(arg);
      }

      // Errors keep their prototype so console output still shows the stack
      if (arg instanceof Error) {
        return this.sanitizeError(arg);
      }

      if (Array.isArray(arg)) {
        return arg.map((item: unknown) =>
          typeof item === "string" ? this.sanitizeString(item) : item
        );
      }

      // Plain objects: shallow sanitization of string values
      if (arg !== null && typeof arg === "object") {
        const sanitized: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(arg)) {
          sanitized[key] = typeof value === "string" ? this.sanitizeString(value) : value;
        }
        return sanitized;
      }

      return arg;
    });
  }

  private sanitizeString(str: string): string {
    if (looksLikeBase64(str)) {
      return "[REDACTED: Encoded Data]";
    }

    if (str.length > MAX_LOGGED_STRING_LENGTH) {
      return `${str.slice(0, MAX_LOGGED_STRING_LENGTH)}... [${str.length - MAX_LOGGED_STRING_LENGTH} more chars]`;
    }

    return str;
  }

  private sanitizeError(error: Error): Error {
    const sanitizedError = new Error(this.sanitizeString(error.message));
    sanitizedError.name = error.name;
    if (error.stack) {
      sanitizedError.stack = error.stack
        .split("\n")
        .map((line) => this.sanitizeString(line))
        .join("\n");
    }
    // Custom error types (PersistenceError, BindError, ...) keep their class
    Object.setPrototypeOf(sanitizedError, Object.getPrototypeOf(error));
    return sanitizedError;
  }
}
