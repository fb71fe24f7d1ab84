/**
 * TopologyIO - reads a topology file, parses it and runs validation
 */

import { isTopologyError } from "../errors/TopologyErrors";
import type { Topology } from "../model/Topology";
import { parseTopology } from "../parsing/TopologyParser";
import { nullLogger } from "../parsing/types";
import { validateTopology } from "../validation/TopologyValidator";
import type { ValidateOptions, ValidationIssue } from "../validation/types";

import { nodeFsAdapter } from "./NodeFsAdapter";
import { ERROR_FILE_NOT_FOUND, type FileSystemAdapter } from "./types";

/**
 * Options for loading a topology file
 */
export interface LoadOptions extends ValidateOptions {
  fs?: FileSystemAdapter;
}

export interface LoadResult {
  file: string;
  topology: Topology;
  issues: ValidationIssue[];
}

/**
 * Loads and validates a topology file.
 *
 * Fatal parse errors are rethrown with the file path attached, so the
 * message reads `path/to/file.topo:12: ...`.
 */
export async function loadTopologyFile(filePath: string, options: LoadOptions = {}): Promise<LoadResult> {
  const fs = options.fs ?? nodeFsAdapter;
  const log = options.logger ?? nullLogger;

  if (!(await fs.exists(filePath))) {
    throw new Error(`${ERROR_FILE_NOT_FOUND}: ${filePath}`);
  }

  const text = await fs.readFile(filePath);
  log.debug(`Read ${text.length} characters from ${filePath}`);

  let topology: Topology;
  try {
    topology = parseTopology(text, { logger: log });
  } catch (err) {
    if (isTopologyError(err)) {
      throw err.withFile(filePath);
    }
    throw err;
  }

  const issues = validateTopology(topology, {
    supportedNodeTypes: options.supportedNodeTypes,
    linkedPortLiveness: options.linkedPortLiveness,
    logger: log
  });
  return { file: filePath, topology, issues };
}
