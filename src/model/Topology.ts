/**
 * Immutable topology aggregate: nodes keyed by id, ports keyed by
 * `(nodeId, port)`, and links. Instances are only produced by the parser.
 */

import { portKey, comparePortRefs } from "../parsing/utils";
import {
  DEFAULT_NODE_IMAGE,
  type PortRef,
  type ResolvedEndpoint,
  type TopologyLink,
  type TopologyNode,
  type TopologyPort
} from "../types/topology";

export interface TopologyInit {
  nodes: TopologyNode[];
  ports: TopologyPort[];
  links: TopologyLink[];
  formatVersion?: string;
}

export class Topology {
  readonly formatVersion?: string;

  private readonly nodeMap = new Map<string, TopologyNode>();
  private readonly portMap = new Map<string, TopologyPort>();
  private readonly portsByNode = new Map<string, TopologyPort[]>();
  private readonly linkList: TopologyLink[];
  private readonly linkByPort = new Map<string, TopologyLink>();

  constructor(init: TopologyInit) {
    this.formatVersion = init.formatVersion;

    for (const node of init.nodes) {
      this.nodeMap.set(node.id, freeze(node));
      this.portsByNode.set(node.id, []);
    }

    const ports = [...init.ports].sort(comparePortRefs);
    for (const port of ports) {
      const frozen = freeze(port);
      this.portMap.set(portKey(port), frozen);
      this.portsByNode.get(port.nodeId)?.push(frozen);
    }

    this.linkList = init.links.map((link) => {
      Object.freeze(link.a);
      Object.freeze(link.b);
      return freeze(link);
    });
    for (const link of this.linkList) {
      this.linkByPort.set(portKey(link.a), link);
      this.linkByPort.set(portKey(link.b), link);
    }
  }

  /** Number of nodes, ports and links */
  get size(): { nodes: number; ports: number; links: number } {
    return { nodes: this.nodeMap.size, ports: this.portMap.size, links: this.linkList.length };
  }

  /** Nodes in declaration order */
  nodes(): TopologyNode[] {
    return [...this.nodeMap.values()];
  }

  getNode(id: string): TopologyNode | undefined {
    return this.nodeMap.get(id);
  }

  hasNode(id: string): boolean {
    return this.nodeMap.has(id);
  }

  /** All ports, grouped by node in declaration order */
  ports(): TopologyPort[] {
    return this.nodes().flatMap((node) => this.portsOf(node.id));
  }

  /** Ports owned by a node, sorted by port identifier */
  portsOf(nodeId: string): TopologyPort[] {
    return [...(this.portsByNode.get(nodeId) ?? [])];
  }

  getPort(nodeId: string, port: string): TopologyPort | undefined {
    return this.portMap.get(portKey({ nodeId, port }));
  }

  /** Links in declaration order */
  links(): TopologyLink[] {
    return [...this.linkList];
  }

  /** The link a port participates in, if any */
  linkOf(nodeId: string, port: string): TopologyLink | undefined {
    return this.linkByPort.get(portKey({ nodeId, port }));
  }

  /** Ports that do not participate in any link */
  unlinkedPorts(): TopologyPort[] {
    return this.ports().filter((port) => !this.linkByPort.has(portKey(port)));
  }

  /**
   * Resolves both endpoints of a link to their ports and owning nodes.
   *
   * @throws Error when the link does not belong to this topology
   */
  endpointsOf(link: TopologyLink): [ResolvedEndpoint, ResolvedEndpoint] {
    return [this.resolve(link.a, link), this.resolve(link.b, link)];
  }

  private resolve(ref: PortRef, link: TopologyLink): ResolvedEndpoint {
    const node = this.nodeMap.get(ref.nodeId);
    const port = this.portMap.get(portKey(ref));
    if (!node || !port) {
      throw new Error(`Link ${link.id} does not belong to this topology`);
    }
    return { node, port };
  }
}

/**
 * Image a platform should start for a node.
 */
export function nodeImage(node: TopologyNode): string {
  const image = node.attributes.image;
  return typeof image === "string" && image.length > 0 ? image : DEFAULT_NODE_IMAGE;
}

function freeze<T extends { attributes: object }>(value: T): Readonly<T> {
  Object.freeze(value.attributes);
  return Object.freeze(value);
}
