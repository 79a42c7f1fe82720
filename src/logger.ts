/**
 * Leveled console logger
 *
 * Diagnostics go to stderr so command output on stdout (config get,
 * validate reports) stays machine-readable.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Where log lines end up; replaced in tests */
export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else {
    console.warn(line);
  }
};

/**
 * Create a logger that drops messages below the given level
 */
export function createLogger(level: LogLevel = "warn", sink: LogSink = consoleSink): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit = (messageLevel: Exclude<LogLevel, "silent">, message: string): void => {
    if (LEVEL_ORDER[messageLevel] < threshold) return;
    sink(messageLevel, `[${messageLevel}] ${message}`);
  };
  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

/** Logger that discards everything */
export const silentLogger: Logger = createLogger("silent");

/**
 * Resolve the log level from an explicit value or HUB_LOG_LEVEL
 */
export function resolveLogLevel(
  explicit: string | undefined,
  env: Readonly<Record<string, string | undefined>>
): LogLevel {
  const raw = (explicit ?? env.HUB_LOG_LEVEL ?? "warn").toLowerCase();
  if (raw === "warning") return "warn";
  return isLogLevel(raw) ? raw : "warn";
}
