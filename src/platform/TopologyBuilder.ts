/**
 * Drives a TopologyPlatform through a parsed topology in build order:
 * preBuild, nodes, ports, links, postBuild.
 */

import type { Topology } from "../model/Topology";
import { nullLogger, type ParserLogger } from "../parsing/types";
import { portKey } from "../parsing/utils";

import type { BuildStage, TopologyPlatform } from "./types";

export class TopologyBuildError extends Error {
  constructor(
    readonly stage: BuildStage,
    readonly subject: string,
    cause: unknown
  ) {
    super(`Build failed during ${stage} (${subject}): ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause
    });
    this.name = "TopologyBuildError";
  }
}

export interface BuildOptions {
  logger?: ParserLogger;
}

/**
 * Builds the topology on the given platform. When any step fails the
 * platform is destroyed and a TopologyBuildError naming the step is thrown.
 */
export async function buildTopology(
  topology: Topology,
  platform: TopologyPlatform,
  options: BuildOptions = {}
): Promise<void> {
  const log = options.logger ?? nullLogger;

  const step = async (stage: BuildStage, subject: string, run: () => void | Promise<void>): Promise<void> => {
    try {
      await run();
    } catch (err) {
      log.error(`Build step ${stage} failed for ${subject}; destroying platform`);
      try {
        await platform.destroy();
      } catch (destroyErr) {
        log.error(`Platform destroy failed: ${destroyErr instanceof Error ? destroyErr.message : String(destroyErr)}`);
      }
      throw new TopologyBuildError(stage, subject, err);
    }
  };

  await step("preBuild", "topology", () => platform.preBuild());

  for (const node of topology.nodes()) {
    await step("addNode", node.id, () => platform.addNode(node));
  }

  for (const node of topology.nodes()) {
    for (const port of topology.portsOf(node.id)) {
      await step("addPort", portKey(port), () => platform.addPort(node, port));
    }
  }

  for (const link of topology.links()) {
    const [a, b] = topology.endpointsOf(link);
    await step("addLink", link.id, () => platform.addLink(a, b, link));
  }

  await step("postBuild", "topology", () => platform.postBuild());

  const { nodes, ports, links } = topology.size;
  log.info(`Built topology: ${nodes} nodes, ${ports} ports, ${links} links`);
}
