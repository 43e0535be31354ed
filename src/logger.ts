// Seismic Relocator - Logging
// Console-backed loggers tagged with the emitting component.

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Creates a logger writing `[LEVEL] [Component] message` lines.
 * Messages below `minLevel` are dropped.
 */
export function createConsoleLogger(component: string, minLevel: LogLevel = "info"): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  return {
    debug: (msg, ...args) => {
      if (enabled("debug")) console.log(`[DEBUG] [${component}] ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (enabled("info")) console.log(`[INFO] [${component}] ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled("warn")) console.warn(`[WARN] [${component}] ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (enabled("error")) console.error(`[ERROR] [${component}] ${msg}`, ...args);
    },
  };
}
