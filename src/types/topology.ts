/**
 * Topology type definitions shared by the parser, validator, serializers
 * and platform builder.
 */

// ============================================================================
// Attribute Values
// ============================================================================

/**
 * A single value inside an attribute bag (`[key=value ...]`).
 * Quoted values are always strings; bare `True`/`False` are booleans and
 * bare numerals are numbers.
 */
export type AttributeValue = string | number | boolean;

/**
 * Attribute bag, keyed by attribute name. Insertion order is preserved
 * so serialization reproduces the declared order.
 */
export type AttributeMap = Readonly<Record<string, AttributeValue>>;

// ============================================================================
// Graph Elements
// ============================================================================

/** Default node type when a declaration carries no `type` attribute. */
export const DEFAULT_NODE_TYPE = "switch";

/** Image used by platforms when a node carries no `image` attribute. */
export const DEFAULT_NODE_IMAGE = "ubuntu";

/**
 * Node types understood by the bundled validator. The model itself keeps
 * `type` open so new variants parse without code changes.
 */
export const KNOWN_NODE_TYPES = ["host", "switch", "p4switch"] as const;

export type KnownNodeType = (typeof KNOWN_NODE_TYPES)[number];

export interface TopologyNode {
  /** Identifier, unique within a topology */
  id: string;
  /** Node type (e.g. "host", "p4switch") */
  type: KnownNodeType | (string & {});
  /** Human-readable name */
  name: string;
  /** Full attribute bag as declared, including `type` and `name` */
  attributes: AttributeMap;
  /** 1-indexed declaration line */
  line: number;
}

/**
 * Reference to a port by owning node and port identifier.
 */
export interface PortRef {
  nodeId: string;
  port: string;
}

export interface TopologyPort extends PortRef {
  /** Merged attribute bag from every declaration of this port */
  attributes: AttributeMap;
  /**
   * Line of the first declaration. Ports created implicitly by a link
   * carry the link's line.
   */
  line: number;
  /** False when the port only exists because a link names it */
  declared: boolean;
}

export interface TopologyLink {
  /** Canonical id, `a:1--b:1` with endpoints in sorted order */
  id: string;
  a: PortRef;
  b: PortRef;
  attributes: AttributeMap;
  line: number;
}

/**
 * A link endpoint resolved back to its owning node.
 */
export interface ResolvedEndpoint {
  node: TopologyNode;
  port: TopologyPort;
}

// ============================================================================
// Declarations (tokenizer output)
// ============================================================================

interface DeclarationBase {
  /** 1-indexed line number */
  line: number;
  /** Raw line text */
  text: string;
  attributes: AttributeMap;
}

export interface NodeDeclaration extends DeclarationBase {
  kind: "node";
  nodeId: string;
}

export interface PortDeclaration extends DeclarationBase {
  kind: "port";
  ref: PortRef;
}

export interface LinkDeclaration extends DeclarationBase {
  kind: "link";
  a: PortRef;
  b: PortRef;
}

export type Declaration = NodeDeclaration | PortDeclaration | LinkDeclaration;

// ============================================================================
// Exported Document
// ============================================================================

/**
 * Plain-object view of a topology, used for YAML and JSON export.
 */
export interface TopologyDocument {
  formatVersion?: string;
  nodes: Array<{
    id: string;
    type: string;
    name: string;
    attributes: Record<string, AttributeValue>;
    ports: Array<{ port: string; attributes: Record<string, AttributeValue> }>;
  }>;
  links: Array<{
    a: string;
    b: string;
    attributes?: Record<string, AttributeValue>;
  }>;
}
