export type LogLevel = "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  [field: string]: unknown;
}

export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Receives each entry instead of stdout/stderr. */
  sink?: (entry: LogEntry) => void;
  /** Fixed fields merged into every entry, e.g. `{ component: "key-store" }`. */
  bindings?: Record<string, unknown>;
}

function writeLine(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === "error") {
    process.stderr.write(line + "\n");
  } else {
    process.stdout.write(line + "\n");
  }
}

/**
 * Structured JSON logger with info/warn/error levels.
 * info and warn go to stdout, error to stderr, one JSON object per line.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? writeLine;
  const bindings = options.bindings ?? {};

  const emit = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    // Fixed fields go last so caller data cannot overwrite them.
    sink({
      ...bindings,
      ...data,
      timestamp: new Date().toISOString(),
      level,
      message,
    });
  };

  return {
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
