/**
 * Topology Parser
 *
 * Converts topology description text into an immutable Topology graph.
 *
 * @example
 * ```typescript
 * import { parseTopology } from './parsing';
 * const topology = parseTopology(text, { logger: log });
 * ```
 *
 * For internal utilities, import directly from sub-modules:
 * - `./AttributeParser` - attribute bag micro-grammar
 * - `./LineTokenizer` - per-line declaration tokenizer
 */

// Main parser API
export { TopologyParser, parseTopology } from "./TopologyParser";

// Core types
export type { ParseOptions, ParserLogger, ScanResult } from "./types";
export { nullLogger } from "./types";

// Commonly used utilities
export { portKey, linkKey, sortEndpoints, parseFormatHeader } from "./utils";
export { scanDocument, tokenizeLine } from "./LineTokenizer";
export { splitAttributeBag, coerceBareValue, isBareSafe } from "./AttributeParser";
