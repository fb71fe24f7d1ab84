/**
 * I/O module
 *
 * Usage:
 * - CLI: NodeFsAdapter reads from disk
 * - Tests: an in-memory FileSystemAdapter
 */

export type { FileSystemAdapter } from "./types";
export { ERROR_FILE_NOT_FOUND } from "./types";
export { NodeFsAdapter, nodeFsAdapter } from "./NodeFsAdapter";
export { loadTopologyFile } from "./TopologyIO";
export type { LoadOptions, LoadResult } from "./TopologyIO";
