export { TopologyValidator, validateTopology, SUPPORTED_FORMAT_VERSION } from "./TopologyValidator";
export { parseIpv4Cidr } from "./cidr";
export type { Ipv4Cidr } from "./cidr";
export { hasErrors } from "./types";
export type {
  IssueCode,
  IssueSeverity,
  IssueSubject,
  LivenessMode,
  ValidateOptions,
  ValidationIssue
} from "./types";
