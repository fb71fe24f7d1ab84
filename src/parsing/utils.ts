/**
 * Utility functions for topology parsing.
 * Pure functions - no I/O.
 */

import type { AttributeValue, PortRef } from "../types/topology";

/** Separator between the two endpoints of a link declaration. */
export const LINK_SEPARATOR = "--";

/**
 * Matches `# topology-format: v1` (case-insensitive key, any version token).
 */
const FORMAT_HEADER_RE = /^#\s*topology-format\s*:\s*(\S+)\s*$/i;

/**
 * Builds the map key for a port reference.
 *
 * @returns The key in `node:port` form
 */
export function portKey(ref: PortRef): string {
  return `${ref.nodeId}:${ref.port}`;
}

/**
 * Builds the order-independent key for a link, so `a:1 -- b:1` and
 * `b:1 -- a:1` collide.
 */
export function linkKey(a: PortRef, b: PortRef): string {
  const [first, second] = sortEndpoints(a, b);
  return `${portKey(first)}${LINK_SEPARATOR}${portKey(second)}`;
}

/**
 * Orders two endpoints by node id, then by port (numeric-aware, with a
 * plain comparison when ports such as `1` and `01` compare equal).
 */
export function sortEndpoints(a: PortRef, b: PortRef): [PortRef, PortRef] {
  return comparePortRefs(a, b) <= 0 ? [a, b] : [b, a];
}

export function comparePortRefs(a: PortRef, b: PortRef): number {
  if (a.nodeId !== b.nodeId) return a.nodeId < b.nodeId ? -1 : 1;
  const byPort = a.port.localeCompare(b.port, undefined, { numeric: true });
  if (byPort !== 0 || a.port === b.port) return byPort;
  return a.port < b.port ? -1 : 1;
}

export function samePort(a: PortRef, b: PortRef): boolean {
  return a.nodeId === b.nodeId && a.port === b.port;
}

/**
 * Whether the line is a comment (first non-whitespace character is `#`).
 */
export function isCommentLine(line: string): boolean {
  return line.trimStart().startsWith("#");
}

/**
 * Extracts the version from a `# topology-format: <version>` comment.
 *
 * @returns The version token, or undefined when the line is not a header
 */
export function parseFormatHeader(line: string): string | undefined {
  const match = FORMAT_HEADER_RE.exec(line.trim());
  return match ? match[1] : undefined;
}

/**
 * Compares two attribute values by type and content.
 */
export function sameValue(a: AttributeValue, b: AttributeValue): boolean {
  return typeof a === typeof b && a === b;
}

/**
 * Splits document text into lines, accepting LF and CRLF endings.
 */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}
