/**
 * Structured export of a topology for downstream tooling.
 */

import * as YAML from "yaml";

import type { Topology } from "../model/Topology";
import { portKey } from "../parsing/utils";
import type { AttributeValue, TopologyDocument } from "../types/topology";

import { serializeTopology } from "./TopologySerializer";

export type ExportFormat = "text" | "yaml" | "json";

export const EXPORT_FORMATS: readonly ExportFormat[] = ["text", "yaml", "json"];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

function withoutKeys(
  attributes: Readonly<Record<string, AttributeValue>>,
  keys: string[]
): Record<string, AttributeValue> {
  return Object.fromEntries(Object.entries(attributes).filter(([key]) => !keys.includes(key)));
}

/**
 * Builds the plain-object view: nodes with their ports nested, then links.
 * `type` and `name` are lifted out of the node attribute bag.
 */
export function toDocument(topology: Topology): TopologyDocument {
  const doc: TopologyDocument = {
    nodes: topology.nodes().map((node) => ({
      id: node.id,
      type: node.type,
      name: node.name,
      attributes: withoutKeys(node.attributes, ["type", "name"]),
      ports: topology.portsOf(node.id).map((port) => ({
        port: port.port,
        attributes: { ...port.attributes }
      }))
    })),
    links: topology.links().map((link) => {
      const entry: TopologyDocument["links"][number] = { a: portKey(link.a), b: portKey(link.b) };
      if (Object.keys(link.attributes).length > 0) {
        entry.attributes = { ...link.attributes };
      }
      return entry;
    })
  };
  if (topology.formatVersion !== undefined) {
    return { formatVersion: topology.formatVersion, ...doc };
  }
  return doc;
}

/**
 * Renders a topology in the requested format.
 */
export function exportTopology(topology: Topology, format: ExportFormat): string {
  switch (format) {
    case "text":
      return serializeTopology(topology);
    case "json":
      return `${JSON.stringify(toDocument(topology), null, 2)}\n`;
    case "yaml":
      return YAML.stringify(toDocument(topology));
  }
}
