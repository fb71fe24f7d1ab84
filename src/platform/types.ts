/**
 * Platform contract for consumers that materialize a topology
 * (containers, namespaces, emulators). The loader only drives it.
 */

import type { ResolvedEndpoint, TopologyLink, TopologyNode, TopologyPort } from "../types/topology";

/**
 * A platform receives the topology element by element. Every hook may be
 * synchronous or return a promise.
 */
export interface TopologyPlatform {
  /** Called once before any node is added */
  preBuild(): void | Promise<void>;
  addNode(node: TopologyNode): void | Promise<void>;
  addPort(node: TopologyNode, port: TopologyPort): void | Promise<void>;
  addLink(endpointA: ResolvedEndpoint, endpointB: ResolvedEndpoint, link: TopologyLink): void | Promise<void>;
  /** Called once after every link; platforms finish unlinked ports here */
  postBuild(): void | Promise<void>;
  /** Tears down whatever the platform created */
  destroy(): void | Promise<void>;
}

export type BuildStage = "preBuild" | "addNode" | "addPort" | "addLink" | "postBuild";
