/**
 * NodeFsAdapter - Node.js file system adapter
 *
 * Implements FileSystemAdapter using Node.js fs.promises.
 */

import * as fs from "fs";
import * as path from "path";

import type { FileSystemAdapter } from "./types";

/**
 * File system adapter using Node.js fs.promises
 */
export class NodeFsAdapter implements FileSystemAdapter {
  async readFile(filePath: string): Promise<string> {
    return fs.promises.readFile(filePath, "utf8");
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.promises.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  join(...segments: string[]): string {
    return path.join(...segments);
  }
}

/** Singleton instance for convenience */
export const nodeFsAdapter = new NodeFsAdapter();
