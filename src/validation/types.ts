/**
 * Validation issue types.
 */

import type { ParserLogger } from "../parsing/types";

export type IssueSeverity = "warning" | "error";

export type IssueCode =
  | "invalid-ipv4"
  | "invalid-up"
  | "unsupported-node-type"
  | "linked-port-down"
  | "duplicate-ipv4"
  | "subnet-mismatch"
  | "loopback-link"
  | "isolated-node"
  | "unknown-format-version";

/**
 * The element an issue is about.
 */
export type IssueSubject =
  | { kind: "topology" }
  | { kind: "node"; nodeId: string }
  | { kind: "port"; nodeId: string; port: string }
  | { kind: "link"; linkId: string };

export interface ValidationIssue {
  severity: IssueSeverity;
  code: IssueCode;
  message: string;
  subject: IssueSubject;
  /** Declaration line of the subject, when it has one */
  line?: number;
}

/**
 * When linked ports are expected to carry `up=True`.
 * - `auto`: only when some port in the document carries an `up` attribute
 * - `always` / `never`: regardless of the document
 */
export type LivenessMode = "auto" | "always" | "never";

export interface ValidateOptions {
  /** Node types accepted without an `unsupported-node-type` error */
  supportedNodeTypes?: readonly string[];
  linkedPortLiveness?: LivenessMode;
  logger?: ParserLogger;
}

export function hasErrors(issues: readonly ValidationIssue[]): boolean {
  return issues.some((issue) => issue.severity === "error");
}
