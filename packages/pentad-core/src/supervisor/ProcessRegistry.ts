/**
 * ProcessRegistry - the persisted role → PID map
 */

import { z } from 'zod';
import type { IFileSystem } from '../shared/platform/IFileSystem.js';
import { ConfigurationError, describeError } from '../shared/utils/errors.js';
import { ROLE_IDS } from '../roles/types.js';
import type { ProcessRegistryEntries } from './types.js';

export const ProcessRegistrySchema = z.record(z.enum(ROLE_IDS), z.number().int().positive());

export class ProcessRegistry {
  constructor(
    private readonly fs: IFileSystem,
    private readonly filePath: string,
    private readonly directory: string
  ) {}

  get path(): string {
    return this.filePath;
  }

  /**
   * Null when no registry exists. Throws ConfigurationError when unreadable.
   */
  async read(): Promise<ProcessRegistryEntries | null> {
    if (!(await this.fs.exists(this.filePath))) {
      return null;
    }

    const content = await this.fs.readFile(this.filePath);
    try {
      return ProcessRegistrySchema.parse(JSON.parse(content));
    } catch (error) {
      throw new ConfigurationError(
        `Invalid process registry: ${describeError(error)}`,
        this.filePath
      );
    }
  }

  async write(entries: ProcessRegistryEntries): Promise<void> {
    await this.fs.mkdir(this.directory, { recursive: true });
    await this.fs.writeFile(this.filePath, JSON.stringify(entries, null, 2) + '\n');
  }

  async remove(): Promise<void> {
    if (await this.fs.exists(this.filePath)) {
      await this.fs.unlink(this.filePath);
    }
  }
}
