/**
 * @hostnet/logger
 *
 * Structured JSON logging keyed by transaction id, so every line emitted
 * while applying one change-set can be grouped together.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  transactionId?: string;
  component?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  /** Minimum level written (default: "info") */
  level?: LogLevel;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(context: LogContext): Logger;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Create a structured logger. Entries below the configured level are dropped.
 */
export function createLogger(context: LogContext = {}, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];

  const formatLog = (
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>
  ): string => {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
      ...meta,
    };
    return JSON.stringify(entry);
  };

  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold;

  return {
    debug: (msg, meta) => {
      if (enabled("debug")) console.debug(formatLog("debug", msg, meta));
    },
    info: (msg, meta) => {
      if (enabled("info")) console.info(formatLog("info", msg, meta));
    },
    warn: (msg, meta) => {
      if (enabled("warn")) console.warn(formatLog("warn", msg, meta));
    },
    error: (msg, meta) => {
      if (enabled("error")) console.error(formatLog("error", msg, meta));
    },
    child: (childContext) => createLogger({ ...context, ...childContext }, options),
  };
}

/**
 * A logger that discards everything, used when a component gets none
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

/**
 * Generate a unique id for one topology transaction
 */
export function generateTransactionId(): string {
  return `txn_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
}
