export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  [key: string]: unknown;
}

const SERVICE_NAME = "ledcycle";

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in levels;
}

function minLevel(): LogLevel {
  const env = process.env.LEDCYCLE_LOG_LEVEL;
  return isLogLevel(env) ? env : "info";
}

function shouldLog(level: LogLevel): boolean {
  return levels[level] >= levels[minLevel()];
}

function formatLog(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    service: SERVICE_NAME,
    message,
    ...meta,
  };
  return JSON.stringify(entry);
}

export const logger = {
  debug(message: string, meta?: Record<string, unknown>): void {
    if (shouldLog("debug")) {
      console.log(formatLog("debug", message, meta));
    }
  },

  info(message: string, meta?: Record<string, unknown>): void {
    if (shouldLog("info")) {
      console.log(formatLog("info", message, meta));
    }
  },

  warn(message: string, meta?: Record<string, unknown>): void {
    if (shouldLog("warn")) {
      console.warn(formatLog("warn", message, meta));
    }
  },

  error(
    message: string,
    error?: unknown,
    meta?: Record<string, unknown>,
  ): void {
    if (shouldLog("error")) {
      const errorMeta: Record<string, unknown> = { ...meta };
      if (error instanceof Error) {
        errorMeta.error = {
          name: error.name,
          message: error.message,
          stack: error.stack,
        };
      } else if (error !== undefined) {
        errorMeta.error = String(error);
      }
      console.error(formatLog("error", message, errorMeta));
    }
  },
};

export default logger;
