/**
 * Simple structured logger.
 * Outputs JSON lines in production and readable lines otherwise.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [key: string]: unknown;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const IS_PRODUCTION = process.env.NODE_ENV === "production";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

function thresholdFromEnv(): LogLevel {
  const configured = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(configured) ? configured : "info";
}

let threshold: LogLevel = thresholdFromEnv();

/**
 * Change the minimum level that gets written.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

function formatLog(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta,
  };

  if (IS_PRODUCTION) {
    return JSON.stringify(entry);
  }
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
  return `[${entry.timestamp}] ${level.toUpperCase()} ${message}${metaStr}`;
}

export const logger = {
  debug(message: string, meta?: Record<string, unknown>): void {
    if (enabled("debug")) {
      console.debug(formatLog("debug", message, meta));
    }
  },

  info(message: string, meta?: Record<string, unknown>): void {
    if (enabled("info")) {
      console.log(formatLog("info", message, meta));
    }
  },

  warn(message: string, meta?: Record<string, unknown>): void {
    if (enabled("warn")) {
      console.warn(formatLog("warn", message, meta));
    }
  },

  error(message: string, meta?: Record<string, unknown>): void {
    if (enabled("error")) {
      console.error(formatLog("error", message, meta));
    }
  },
};
