/**
 * Line tokenizer: classifies each non-comment line as a node, port or link
 * declaration. The three shapes are told apart by the presence of `:` and
 * `--` after the attribute bag; node ids never contain `--`.
 */

import { TopologySyntaxError, type ErrorLocation } from "../errors/TopologyErrors";
import type { Declaration, PortRef } from "../types/topology";

import { splitAttributeBag } from "./AttributeParser";
import type { ScanResult } from "./types";
import { isCommentLine, parseFormatHeader, splitLines } from "./utils";

// No "--" inside an id, so that separator only ever means a link
const NODE_ID = "[A-Za-z_](?:-?[A-Za-z0-9_])*-?";
const PORT_ID = "[A-Za-z0-9_./]+";

const NODE_RE = new RegExp(`^(${NODE_ID})$`);
const PORT_RE = new RegExp(`^(${NODE_ID}):(${PORT_ID})$`);
const LINK_RE = new RegExp(`^(${NODE_ID}):(${PORT_ID})\\s*--\\s*(${NODE_ID}):(${PORT_ID})$`);

/**
 * Tokenizes a single trimmed, non-comment line.
 *
 * @throws TopologySyntaxError when the line matches no declaration grammar
 */
export function tokenizeLine(source: string, location: ErrorLocation): Declaration {
  const { attributes, rest } = splitAttributeBag(source, location);
  const base = { line: location.line, text: location.text, attributes };

  if (rest.length === 0) {
    throw new TopologySyntaxError("attribute list is not followed by a node, port or link", location);
  }

  if (rest.includes("--") && rest.includes(":")) {
    const m = LINK_RE.exec(rest);
    if (!m) {
      throw new TopologySyntaxError(`malformed link declaration '${rest}'`, location);
    }
    return { ...base, kind: "link", a: ref(m[1], m[2]), b: ref(m[3], m[4]) };
  }

  if (rest.includes(":")) {
    const m = PORT_RE.exec(rest);
    if (!m) {
      throw new TopologySyntaxError(`malformed port reference '${rest}'`, location);
    }
    return { ...base, kind: "port", ref: ref(m[1], m[2]) };
  }

  const m = NODE_RE.exec(rest);
  if (!m) {
    throw new TopologySyntaxError(`malformed node identifier '${rest}'`, location);
  }
  return { ...base, kind: "node", nodeId: m[1] };
}

function ref(nodeId: string, port: string): PortRef {
  return { nodeId, port };
}

/**
 * Scans a whole document left to right. Comment and blank lines are
 * dropped; a `# topology-format:` comment before the first declaration is
 * recorded as the format version.
 *
 * @throws TopologySyntaxError on the first malformed line
 */
export function scanDocument(text: string): ScanResult {
  const declarations: Declaration[] = [];
  let formatVersion: string | undefined;

  splitLines(text).forEach((raw, index) => {
    const source = raw.trim();
    if (source.length === 0) return;
    if (isCommentLine(source)) {
      if (declarations.length === 0 && formatVersion === undefined) {
        formatVersion = parseFormatHeader(source);
      }
      return;
    }
    declarations.push(tokenizeLine(source, { line: index + 1, text: raw }));
  });

  return { declarations, formatVersion };
}
