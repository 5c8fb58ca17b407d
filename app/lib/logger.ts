/**
 * logger.ts
 *
 * Console logging with bracketed scope prefixes ("[research]", "[pipeline]")
 * behind a process-wide level filter.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export interface Logger {
  debug(message: string, details?: unknown): void;
  info(message: string, details?: unknown): void;
  warn(message: string, details?: unknown): void;
  error(message: string, details?: unknown): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  const emit = (level: LogLevel, message: string, details?: unknown) => {
    if (!enabled(level)) return;
    const write =
      level === "error"
        ? console.error
        : level === "warn"
          ? console.warn
          : console.log;
    if (details === undefined) {
      write(`${prefix} ${message}`);
    } else {
      write(`${prefix} ${message}`, details);
    }
  };

  return {
    debug: (message, details) => emit("debug", message, details),
    info: (message, details) => emit("info", message, details),
    warn: (message, details) => emit("warn", message, details),
    error: (message, details) => emit("error", message, details),
  };
}
