export type { TopologyPlatform, BuildStage } from "./types";
export { buildTopology, TopologyBuildError } from "./TopologyBuilder";
export type { BuildOptions } from "./TopologyBuilder";
export { DryRunPlatform } from "./DryRunPlatform";
