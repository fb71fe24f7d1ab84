/**
 * Platform that creates nothing and records the plan as text.
 *
 * Ports start out "down" when added and become "linked" when a link uses
 * them; whatever is still down at post-build is reported as an unlinked
 * port to create.
 */

import { nodeImage } from "../model/Topology";
import { portKey } from "../parsing/utils";
import type { ResolvedEndpoint, TopologyLink, TopologyNode, TopologyPort } from "../types/topology";

import type { TopologyPlatform } from "./types";

type PortStatus = "down" | "linked";

export class DryRunPlatform implements TopologyPlatform {
  readonly steps: string[] = [];
  private readonly portStatus = new Map<string, PortStatus>();

  preBuild(): void {
    this.steps.push("pre-build");
  }

  addNode(node: TopologyNode): void {
    this.steps.push(`add node ${node.id} (type ${node.type}, image ${nodeImage(node)})`);
  }

  addPort(_node: TopologyNode, port: TopologyPort): void {
    this.portStatus.set(portKey(port), "down");
    this.steps.push(`add port ${portKey(port)}`);
  }

  addLink(endpointA: ResolvedEndpoint, endpointB: ResolvedEndpoint, _link: TopologyLink): void {
    const a = portKey(endpointA.port);
    const b = portKey(endpointB.port);
    this.portStatus.set(a, "linked");
    this.portStatus.set(b, "linked");
    this.steps.push(`add link ${a} -- ${b}`);
  }

  postBuild(): void {
    for (const [key, status] of this.portStatus) {
      if (status === "down") {
        this.steps.push(`create unlinked port ${key}`);
      }
    }
    this.steps.push("post-build");
  }

  destroy(): void {
    this.steps.push("destroy");
  }
}
