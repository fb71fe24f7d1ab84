/**
 * In-memory FileSystemAdapter for tests.
 */

import path from "path";

import type { FileSystemAdapter } from "../../src/io/types";

export class MemoryFsAdapter implements FileSystemAdapter {
  private readonly files = new Map<string, string>();

  constructor(files: Record<string, string> = {}) {
    for (const [name, content] of Object.entries(files)) {
      this.files.set(path.normalize(name), content);
    }
  }

  async readFile(filePath: string): Promise<string> {
    const content = this.files.get(path.normalize(filePath));
    if (content === undefined) {
      throw new Error(`ENOENT: no such file, open '${filePath}'`);
    }
    return content;
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(path.normalize(filePath));
  }

  join(...segments: string[]): string {
    return path.join(...segments);
  }
}
