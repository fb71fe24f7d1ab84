/**
 * I/O types for loading topology and configuration files
 */

/**
 * FileSystemAdapter - Abstraction for the file operations the loader needs
 *
 * Lets the same loading logic run against:
 * - the real file system (NodeFsAdapter)
 * - in-memory files in tests
 */
export interface FileSystemAdapter {
  /**
   * Read file as UTF-8 string.
   * @throws Error if file doesn't exist
   */
  readFile(filePath: string): Promise<string>;

  /**
   * Check if file exists
   */
  exists(filePath: string): Promise<boolean>;

  /**
   * Join path segments
   */
  join(...segments: string[]): string;
}

/** Common error messages */
export const ERROR_FILE_NOT_FOUND = "Topology file not found";
