/**
 * Writes a topology back to its text form. The output groups declarations
 * as nodes, ports, then links; re-parsing it yields an isomorphic graph.
 */

import { isBareSafe } from "../parsing/AttributeParser";
import { portKey } from "../parsing/utils";
import type { Topology } from "../model/Topology";
import type { AttributeMap, AttributeValue } from "../types/topology";

/**
 * Formats a single attribute value.
 *
 * @throws Error when a string cannot be represented under the quoting rule
 */
export function formatAttributeValue(value: AttributeValue): string {
  if (typeof value === "boolean") return value ? "True" : "False";
  if (typeof value === "number") return String(value);
  if (isBareSafe(value)) return value;
  if (value.includes('"') || value.includes("]")) {
    throw new Error(`Attribute value ${JSON.stringify(value)} cannot be quoted`);
  }
  return `"${value}"`;
}

/**
 * Formats an attribute bag with a trailing space, or an empty string when
 * there are no attributes.
 */
export function formatAttributeBag(attributes: AttributeMap): string {
  const pairs = Object.entries(attributes).map(([key, value]) => `${key}=${formatAttributeValue(value)}`);
  return pairs.length > 0 ? `[${pairs.join(" ")}] ` : "";
}

export function serializeTopology(topology: Topology): string {
  const sections: string[][] = [];

  if (topology.formatVersion !== undefined) {
    sections.push([`# topology-format: ${topology.formatVersion}`]);
  }

  sections.push(topology.nodes().map((node) => `${formatAttributeBag(node.attributes)}${node.id}`));

  sections.push(
    topology
      .ports()
      .filter((port) => port.declared)
      .map((port) => `${formatAttributeBag(port.attributes)}${portKey(port)}`)
  );

  sections.push(
    topology.links().map((link) => `${formatAttributeBag(link.attributes)}${portKey(link.a)} -- ${portKey(link.b)}`)
  );

  const body = sections
    .filter((lines) => lines.length > 0)
    .map((lines) => lines.join("\n"))
    .join("\n\n");
  return `${body}\n`;
}
