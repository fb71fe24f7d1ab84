/**
 * topology-loader public API
 *
 * @example
 * ```typescript
 * import { parseTopology, validateTopology } from "topology-loader";
 *
 * const topology = parseTopology(text);
 * const issues = validateTopology(topology);
 * for (const link of topology.links()) {
 *   const [a, b] = topology.endpointsOf(link);
 *   console.log(`${a.node.name} <-> ${b.node.name}`);
 * }
 * ```
 */

// Model
export { Topology, nodeImage } from "./model/Topology";
export type {
  AttributeMap,
  AttributeValue,
  PortRef,
  ResolvedEndpoint,
  TopologyDocument,
  TopologyLink,
  TopologyNode,
  TopologyPort
} from "./types/topology";
export { DEFAULT_NODE_TYPE, DEFAULT_NODE_IMAGE, KNOWN_NODE_TYPES } from "./types/topology";

// Parsing
export { TopologyParser, parseTopology, nullLogger } from "./parsing";
export type { ParseOptions, ParserLogger } from "./parsing";

// Errors
export {
  TopologyError,
  TopologySyntaxError,
  DuplicateNodeError,
  UnknownNodeError,
  DuplicatePortError,
  DuplicateLinkError,
  SelfLinkError,
  isTopologyError
} from "./errors/TopologyErrors";
export type { TopologyErrorCode } from "./errors/TopologyErrors";

// Validation
export { TopologyValidator, validateTopology, hasErrors, parseIpv4Cidr } from "./validation";
export type { ValidationIssue, ValidateOptions, IssueSeverity, IssueCode, LivenessMode } from "./validation";

// Serialization
export { serializeTopology, toDocument, exportTopology } from "./serialization";
export type { ExportFormat } from "./serialization";

// I/O and configuration
export { loadTopologyFile, NodeFsAdapter } from "./io";
export type { FileSystemAdapter, LoadOptions, LoadResult } from "./io";
export { loadConfig, resolveConfig, ConfigError, DEFAULT_CONFIG } from "./config/config";
export type { TopologyConfig } from "./config/config";

// Platform
export { buildTopology, DryRunPlatform, TopologyBuildError } from "./platform";
export type { TopologyPlatform } from "./platform";

// Logging
export { log, setLogLevel } from "./logging/logger";
