/**
 * Non-throwing semantic checks over a parsed topology. Every rule runs and
 * all issues are returned together, ordered by declaration line.
 */

import type { Topology } from "../model/Topology";
import { nullLogger } from "../parsing/types";
import { portKey } from "../parsing/utils";
import { KNOWN_NODE_TYPES, type TopologyPort } from "../types/topology";

import { parseIpv4Cidr, type Ipv4Cidr } from "./cidr";
import type { IssueCode, IssueSeverity, IssueSubject, ValidateOptions, ValidationIssue } from "./types";

/** Format version this loader was written against */
export const SUPPORTED_FORMAT_VERSION = "v1";

type Check = (topology: Topology, ctx: CheckContext) => void;

interface CheckContext {
  options: Required<Omit<ValidateOptions, "logger">>;
  issues: ValidationIssue[];
  report(severity: IssueSeverity, code: IssueCode, subject: IssueSubject, message: string, line?: number): void;
}

function portSubject(port: TopologyPort): IssueSubject {
  return { kind: "port", nodeId: port.nodeId, port: port.port };
}

// ============================================================================
// Checks
// ============================================================================

const checkFormatVersion: Check = (topology, ctx) => {
  const version = topology.formatVersion;
  if (version !== undefined && version !== SUPPORTED_FORMAT_VERSION) {
    ctx.report("warning", "unknown-format-version", { kind: "topology" },
      `Unknown topology format version '${version}', expected '${SUPPORTED_FORMAT_VERSION}'`);
  }
};

const checkNodeTypes: Check = (topology, ctx) => {
  const supported = new Set(ctx.options.supportedNodeTypes);
  for (const node of topology.nodes()) {
    if (!supported.has(node.type)) {
      ctx.report("error", "unsupported-node-type", { kind: "node", nodeId: node.id },
        `Node ${node.id} has unsupported type '${node.type}'`, node.line);
    }
  }
};

const checkIsolatedNodes: Check = (topology, ctx) => {
  for (const node of topology.nodes()) {
    if (topology.portsOf(node.id).length === 0) {
      ctx.report("warning", "isolated-node", { kind: "node", nodeId: node.id },
        `Node ${node.id} has no ports`, node.line);
    }
  }
};

const checkPortAttributes: Check = (topology, ctx) => {
  for (const port of topology.ports()) {
    const { ipv4, up } = port.attributes;
    if (ipv4 !== undefined && (typeof ipv4 !== "string" || !parseIpv4Cidr(ipv4))) {
      ctx.report("error", "invalid-ipv4", portSubject(port),
        `Port ${portKey(port)} has invalid ipv4 '${String(ipv4)}', expected a.b.c.d/len`, port.line);
    }
    if (up !== undefined && typeof up !== "boolean") {
      ctx.report("error", "invalid-up", portSubject(port),
        `Port ${portKey(port)} has non-boolean up '${String(up)}', expected True or False`, port.line);
    }
  }
};

const checkDuplicateAddresses: Check = (topology, ctx) => {
  const owners = new Map<string, TopologyPort>();
  for (const port of topology.ports()) {
    const cidr = addressOf(port);
    if (!cidr) continue;
    const owner = owners.get(cidr.address);
    if (owner) {
      ctx.report("warning", "duplicate-ipv4", portSubject(port),
        `Port ${portKey(port)} reuses address ${cidr.address} already assigned to ${portKey(owner)}`, port.line);
    } else {
      owners.set(cidr.address, port);
    }
  }
};

const checkLinks: Check = (topology, ctx) => {
  const trackLiveness = livenessTracked(topology, ctx.options.linkedPortLiveness);

  for (const link of topology.links()) {
    const [a, b] = topology.endpointsOf(link);

    if (a.node.id === b.node.id) {
      ctx.report("warning", "loopback-link", { kind: "link", linkId: link.id },
        `Link ${link.id} connects node ${a.node.id} to itself`, link.line);
    }

    const netA = addressOf(a.port)?.network;
    const netB = addressOf(b.port)?.network;
    if (netA !== undefined && netB !== undefined && netA !== netB) {
      ctx.report("warning", "subnet-mismatch", { kind: "link", linkId: link.id },
        `Link ${link.id} joins different networks ${netA} and ${netB}`, link.line);
    }

    if (!trackLiveness) continue;
    for (const end of [a, b]) {
      if (end.port.attributes.up !== true) {
        ctx.report("warning", "linked-port-down", portSubject(end.port),
          `Port ${portKey(end.port)} is linked on line ${link.line} but not marked up=True`, end.port.line);
      }
    }
  }
};

const CHECKS: Check[] = [
  checkFormatVersion,
  checkNodeTypes,
  checkIsolatedNodes,
  checkPortAttributes,
  checkDuplicateAddresses,
  checkLinks
];

function addressOf(port: TopologyPort): Ipv4Cidr | undefined {
  const ipv4 = port.attributes.ipv4;
  return typeof ipv4 === "string" ? parseIpv4Cidr(ipv4) : undefined;
}

function livenessTracked(topology: Topology, mode: ValidateOptions["linkedPortLiveness"]): boolean {
  if (mode === "always") return true;
  if (mode === "never") return false;
  return topology.ports().some((port) => port.attributes.up !== undefined);
}

// ============================================================================
// Validator
// ============================================================================

export class TopologyValidator {
  /**
   * Runs every check and returns the accumulated issues, sorted by line.
   * Issues without a line (document-level) come first.
   */
  static validate(topology: Topology, options: ValidateOptions = {}): ValidationIssue[] {
    const log = options.logger ?? nullLogger;
    const issues: ValidationIssue[] = [];
    const ctx: CheckContext = {
      options: {
        supportedNodeTypes: options.supportedNodeTypes ?? KNOWN_NODE_TYPES,
        linkedPortLiveness: options.linkedPortLiveness ?? "auto"
      },
      issues,
      report(severity, code, subject, message, line) {
        issues.push(line === undefined ? { severity, code, subject, message } : { severity, code, subject, message, line });
      }
    };

    for (const check of CHECKS) {
      check(topology, ctx);
    }

    const sorted = issues
      .map((issue, index) => ({ issue, index }))
      .sort((x, y) => (x.issue.line ?? 0) - (y.issue.line ?? 0) || x.index - y.index)
      .map(({ issue }) => issue);

    log.debug(`Validation produced ${sorted.length} issue(s)`);
    return sorted;
  }
}

/**
 * Validates a topology.
 * Convenience function that wraps TopologyValidator.validate().
 */
export function validateTopology(topology: Topology, options?: ValidateOptions): ValidationIssue[] {
  return TopologyValidator.validate(topology, options);
}
