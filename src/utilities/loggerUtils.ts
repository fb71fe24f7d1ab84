/**
 * Logging helpers shared by the console logger and its tests
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Threshold setting; `silent` suppresses every level */
export type LogThreshold = LogLevel | "silent";

export const LOG_THRESHOLDS: readonly LogThreshold[] = ["debug", "info", "warn", "error", "silent"];

/**
 * Whether a message at `level` passes the configured threshold.
 */
export function isLevelEnabled(level: LogLevel, threshold: LogThreshold): boolean {
  return LOG_THRESHOLDS.indexOf(level) >= LOG_THRESHOLDS.indexOf(threshold);
}

export function isLogThreshold(value: string): value is LogThreshold {
  return LOG_THRESHOLDS.some((t) => t === value);
}

/**
 * Format message for logging
 */
export function formatMessage(msg: unknown): string {
  if (typeof msg === "string") return msg;
  if (msg instanceof Error) return msg.message;
  if (typeof msg === "object" && msg !== null) {
    try {
      return JSON.stringify(msg);
    } catch {
      return String(msg);
    }
  }
  return String(msg);
}

/**
 * Extract file name and line number from caller stack.
 * @param skipFrames Number of additional stack frames to skip (default 0)
 */
export function getCallerFileLine(skipFrames = 0): string {
  const obj: { stack?: string } = {};
  Error.captureStackTrace(obj, getCallerFileLine);

  const stack = obj.stack;
  if (stack === undefined || stack.length === 0) return "unknown:0";

  const lines = stack.split("\n");
  const baseIndex = 3 + skipFrames;
  const callSite = lines[baseIndex] || lines[baseIndex + 1] || "";

  const reParen = /\(([^()]+):(\d+):\d+\)/;
  const reAt = /at ([^()\s]+):(\d+):\d+/;
  const match = reParen.exec(callSite) ?? reAt.exec(callSite);
  if (!match) return "unknown:0";

  const filePath = match[1];
  const lineNum = match[2];
  const fileName = filePath.split(/[\\/]/).pop() ?? "unknown";
  return `${fileName}:${lineNum}`;
}

export interface Logger {
  info(msg: unknown): void;
  debug(msg: unknown): void;
  warn(msg: unknown): void;
  error(msg: unknown): void;
}

/**
 * Create a standard logger object from a logging function
 */
export function createLogger(logFn: (level: LogLevel, message: unknown) => void): Logger {
  return {
    info(msg: unknown): void {
      logFn("info", msg);
    },
    debug(msg: unknown): void {
      logFn("debug", msg);
    },
    warn(msg: unknown): void {
      logFn("warn", msg);
    },
    error(msg: unknown): void {
      logFn("error", msg);
    }
  };
}
