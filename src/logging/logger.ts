/**
 * Console logger for the CLI and for library callers that want output.
 *
 * Each line is prefixed with the level and the calling site
 * (`[warn] TopologyIO.ts:42 - message`). Messages below the current
 * threshold are dropped; the threshold comes from configuration.
 */

import {
  createLogger,
  formatMessage,
  getCallerFileLine,
  isLevelEnabled,
  type LogLevel,
  type LogThreshold
} from "../utilities/loggerUtils";

let threshold: LogThreshold = "warn";

export function setLogLevel(level: LogThreshold): void {
  threshold = level;
}

export function getLogLevel(): LogThreshold {
  return threshold;
}

/**
 * Core logging routine. Errors and warnings go to stderr through
 * `console.error`/`console.warn`; info and debug to `console.log` and
 * `console.debug`.
 */
function logMessage(level: LogLevel, message: unknown): void {
  if (!isLevelEnabled(level, threshold)) return;

  const text = `[${level}] ${getCallerFileLine()} - ${formatMessage(message)}`;

  switch (level) {
    case "error":
      console.error(text);
      break;
    case "warn":
      console.warn(text);
      break;
    case "debug":
      console.debug(text);
      break;
    default:
      console.log(text);
  }
}

/**
 * Logger with convenience methods for all supported log levels.
 */
export const log = createLogger(logMessage);
