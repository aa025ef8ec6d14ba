/**
 * FileSystemAdapter - Cross-platform file system implementation
 * Uses Node.js fs/promises + fast-glob for file operations
 */

import type { IFileSystem } from '@pentad/core';
import fs from 'fs/promises';
import fg from 'fast-glob';

export class FileSystemAdapter implements IFileSystem {
  async readFile(path: string, encoding: BufferEncoding = 'utf-8'): Promise<string> {
    return fs.readFile(path, encoding);
  }

  async writeFile(
    path: string,
    content: string,
    encoding: BufferEncoding = 'utf-8'
  ): Promise<void> {
    await fs.writeFile(path, content, encoding);
  }

  async appendFile(path: string, content: string): Promise<void> {
    await fs.appendFile(path, content, 'utf-8');
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  async mkdir(path: string, options?: { recursive?: boolean }): Promise<void> {
    await fs.mkdir(path, options);
  }

  async readdir(path: string): Promise<string[]> {
    return fs.readdir(path);
  }

  async unlink(path: string): Promise<void> {
    await fs.unlink(path);
  }

  async glob(pattern: string, options?: { cwd?: string; ignore?: string[] }): Promise<string[]> {
    return fg(pattern, {
      cwd: options?.cwd,
      ignore: options?.ignore,
    });
  }
}
