/**
 * Logger utility for the Chunk Recall backend
 *
 * Provides structured logging with prefixes for different modules.
 * All logs include timestamps for debugging timing issues.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, "silent">;
  module: string;
  message: string;
  data?: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let minLevel: LogLevel = process.env.DEBUG ? "debug" : "info";

/**
 * Sets the minimum level that is written to the console.
 * Tests use "silent" to keep expected errors out of the output.
 */
export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

/**
 * Formats a log entry for console output.
 */
function formatLog(entry: LogEntry): string {
  const time = entry.timestamp.split("T")[1]?.slice(0, 12) ?? entry.timestamp;
  const prefix = `[${time}] [${entry.level.toUpperCase().padEnd(5)}] [${entry.module}]`;
  return `${prefix} ${entry.message}`;
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string) {
  const log = (level: LogEntry["level"], message: string, data?: unknown) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module,
      message,
      data,
    };

    const formatted = formatLog(entry);

    switch (level) {
      case "debug":
      case "info":
        console.log(formatted, data !== undefined ? data : "");
        break;
      case "warn":
        console.warn(formatted, data !== undefined ? data : "");
        break;
      case "error":
        console.error(formatted, data !== undefined ? data : "");
        break;
    }
  };

  return {
    debug: (message: string, data?: unknown) => log("debug", message, data),
    info: (message: string, data?: unknown) => log("info", message, data),
    warn: (message: string, data?: unknown) => log("warn", message, data),
    error: (message: string, data?: unknown) => log("error", message, data),
  };
}

export type Logger = ReturnType<typeof createLogger>;

export const serverLog = createLogger("Server");
