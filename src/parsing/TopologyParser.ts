/**
 * Main topology parser - orchestrates tokenizing and resolution.
 * Pure functions - text in, graph out.
 */

import {
  DuplicateLinkError,
  DuplicateNodeError,
  DuplicatePortError,
  SelfLinkError,
  UnknownNodeError,
  type ErrorLocation
} from "../errors/TopologyErrors";
import { Topology } from "../model/Topology";
import {
  DEFAULT_NODE_TYPE,
  type AttributeValue,
  type Declaration,
  type LinkDeclaration,
  type NodeDeclaration,
  type PortDeclaration,
  type PortRef,
  type TopologyLink,
  type TopologyNode,
  type TopologyPort
} from "../types/topology";

import { scanDocument } from "./LineTokenizer";
import type { ParseOptions } from "./types";
import { nullLogger } from "./types";
import { linkKey, portKey, samePort, sameValue } from "./utils";

// ============================================================================
// Resolution State
// ============================================================================

interface PortDraft {
  nodeId: string;
  port: string;
  attributes: Map<string, AttributeValue>;
  line: number;
  declared: boolean;
}

interface ResolutionState {
  nodes: Map<string, TopologyNode>;
  ports: Map<string, PortDraft>;
  links: Map<string, TopologyLink>;
  linkByPort: Map<string, TopologyLink>;
}

// ============================================================================
// Main Parser Class
// ============================================================================

/**
 * Topology parser for converting topology description text to a Topology.
 *
 * @example
 * ```typescript
 * const topology = TopologyParser.parse(text);
 * for (const link of topology.links()) {
 *   const [a, b] = topology.endpointsOf(link);
 * }
 * ```
 */
export class TopologyParser {
  /**
   * Parses topology text into a validated graph.
   *
   * Node declarations are collected first so ports and links may reference
   * nodes declared further down the document. Parsing stops at the first
   * offense; no partial topology is returned.
   *
   * @throws TopologySyntaxError, DuplicateNodeError, UnknownNodeError,
   *   DuplicatePortError, DuplicateLinkError, SelfLinkError
   */
  static parse(text: string, options: ParseOptions = {}): Topology {
    const log = options.logger ?? nullLogger;

    const { declarations, formatVersion } = scanDocument(text);
    if (formatVersion !== undefined) {
      log.debug(`Topology format version: ${formatVersion}`);
    }

    const state: ResolutionState = {
      nodes: TopologyParser.collectNodes(declarations),
      ports: new Map(),
      links: new Map(),
      linkByPort: new Map()
    };

    for (const decl of declarations) {
      if (decl.kind === "port") TopologyParser.resolvePort(decl, state);
      else if (decl.kind === "link") TopologyParser.resolveLink(decl, state);
    }

    const topology = new Topology({
      nodes: [...state.nodes.values()],
      ports: [...state.ports.values()].map(finishPort),
      links: [...state.links.values()],
      formatVersion
    });

    const { nodes, ports, links } = topology.size;
    log.info(`Parsed topology: ${nodes} nodes, ${ports} ports, ${links} links`);
    return topology;
  }

  // ============================================================================
  // Internal Methods
  // ============================================================================

  /**
   * First pass: registers every node declaration.
   */
  private static collectNodes(declarations: Declaration[]): Map<string, TopologyNode> {
    const nodes = new Map<string, TopologyNode>();
    for (const decl of declarations) {
      if (decl.kind !== "node") continue;
      const existing = nodes.get(decl.nodeId);
      if (existing) {
        throw new DuplicateNodeError(decl.nodeId, existing.line, locationOf(decl));
      }
      nodes.set(decl.nodeId, buildNode(decl));
    }
    return nodes;
  }

  private static resolvePort(decl: PortDeclaration, state: ResolutionState): void {
    requireNode(decl.ref, decl, state);
    const draft = ensurePort(decl.ref, decl.line, state);
    if (!draft.declared) {
      draft.declared = true;
      draft.line = decl.line;
    }

    for (const [key, value] of Object.entries(decl.attributes)) {
      const previous = draft.attributes.get(key);
      if (previous !== undefined && !sameValue(previous, value)) {
        throw new DuplicatePortError(portKey(decl.ref), key, locationOf(decl));
      }
      draft.attributes.set(key, value);
    }
  }

  private static resolveLink(decl: LinkDeclaration, state: ResolutionState): void {
    requireNode(decl.a, decl, state);
    requireNode(decl.b, decl, state);

    if (samePort(decl.a, decl.b)) {
      throw new SelfLinkError(portKey(decl.a), locationOf(decl));
    }

    const id = linkKey(decl.a, decl.b);
    const duplicate = state.links.get(id);
    if (duplicate) {
      throw new DuplicateLinkError(
        `link ${portKey(decl.a)} -- ${portKey(decl.b)} is already declared on line ${duplicate.line}`,
        duplicate.line,
        locationOf(decl)
      );
    }

    for (const end of [decl.a, decl.b]) {
      const existing = state.linkByPort.get(portKey(end));
      if (existing) {
        throw new DuplicateLinkError(
          `port '${portKey(end)}' is already linked on line ${existing.line}`,
          existing.line,
          locationOf(decl)
        );
      }
    }

    ensurePort(decl.a, decl.line, state);
    ensurePort(decl.b, decl.line, state);

    const link: TopologyLink = {
      id,
      a: { ...decl.a },
      b: { ...decl.b },
      attributes: { ...decl.attributes },
      line: decl.line
    };
    state.links.set(id, link);
    state.linkByPort.set(portKey(decl.a), link);
    state.linkByPort.set(portKey(decl.b), link);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function locationOf(decl: Declaration): ErrorLocation {
  return { line: decl.line, text: decl.text };
}

function buildNode(decl: NodeDeclaration): TopologyNode {
  const { type, name } = decl.attributes;
  return {
    id: decl.nodeId,
    type: type === undefined ? DEFAULT_NODE_TYPE : String(type),
    name: name === undefined ? decl.nodeId : String(name),
    attributes: { ...decl.attributes },
    line: decl.line
  };
}

function requireNode(ref: PortRef, decl: Declaration, state: ResolutionState): void {
  if (!state.nodes.has(ref.nodeId)) {
    throw new UnknownNodeError(ref.nodeId, locationOf(decl));
  }
}

function ensurePort(ref: PortRef, line: number, state: ResolutionState): PortDraft {
  const key = portKey(ref);
  let draft = state.ports.get(key);
  if (!draft) {
    draft = { nodeId: ref.nodeId, port: ref.port, attributes: new Map(), line, declared: false };
    state.ports.set(key, draft);
  }
  return draft;
}

function finishPort(draft: PortDraft): TopologyPort {
  return {
    nodeId: draft.nodeId,
    port: draft.port,
    attributes: Object.fromEntries(draft.attributes),
    line: draft.line,
    declared: draft.declared
  };
}

// ============================================================================
// Convenience Functions
// ============================================================================

/**
 * Parses a topology description.
 * Convenience function that wraps TopologyParser.parse().
 */
export function parseTopology(text: string, options?: ParseOptions): Topology {
  return TopologyParser.parse(text, options);
}
