/**
 * Parser-specific type definitions.
 */

import type { Declaration } from "../types/topology";

export type { Declaration };

// ============================================================================
// Parser Options
// ============================================================================

/**
 * Options for parsing a topology.
 */
export interface ParseOptions {
  /** Logger interface (optional) */
  logger?: ParserLogger;
}

// ============================================================================
// Logger Abstraction
// ============================================================================

/**
 * Logger interface for optional logging.
 * The CLI passes the console-backed `log`; library callers get silence.
 */
export interface ParserLogger {
  info(msg: string): void;
  warn(msg: string): void;
  debug(msg: string): void;
  error(msg: string): void;
}

/**
 * No-op logger for when logging is not needed.
 */
export const nullLogger: ParserLogger = {
  info: () => {},
  warn: () => {},
  debug: () => {},
  error: () => {}
};

// ============================================================================
// Tokenizer Output
// ============================================================================

/**
 * Result of scanning a document: the declarations in line order plus the
 * optional format version header.
 */
export interface ScanResult {
  declarations: Declaration[];
  formatVersion?: string;
}
