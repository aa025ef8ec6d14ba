/**
 * Platform-agnostic file system interface
 * Implementation uses fs/promises + fast-glob
 */

export interface IFileSystem {
  /**
   * Read file contents as string
   */
  readFile(path: string, encoding?: BufferEncoding): Promise<string>;

  /**
   * Write content to file (replaces existing content)
   */
  writeFile(path: string, content: string, encoding?: BufferEncoding): Promise<void>;

  /**
   * Append content to file, creating it when missing
   */
  appendFile(path: string, content: string): Promise<void>;

  /**
   * Check if file or directory exists
   */
  exists(path: string): Promise<boolean>;

  /**
   * Create directory
   */
  mkdir(path: string, options?: { recursive?: boolean }): Promise<void>;

  /**
   * Read directory contents
   */
  readdir(path: string): Promise<string[]>;

  /**
   * Delete file
   */
  unlink(path: string): Promise<void>;

  /**
   * Find files matching glob pattern
   */
  glob(pattern: string, options?: { cwd?: string; ignore?: string[] }): Promise<string[]>;
}
