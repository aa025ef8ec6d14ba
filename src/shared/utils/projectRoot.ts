import path from 'path';
import type { IFileSystem } from '@pentad/core';

/**
 * Nearest directory at or above `start` containing `.git`; `start` itself
 * when there is none
 */
export async function findProjectRoot(fs: IFileSystem, start: string): Promise<string> {
  const origin = path.resolve(start);
  let current = origin;

  for (;;) {
    if (await fs.exists(path.join(current, '.git'))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return origin;
    }
    current = parent;
  }
}
