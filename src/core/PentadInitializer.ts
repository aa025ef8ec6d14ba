/**
 * Centralized initialization service for Pentad
 * Handles workspace directories, goal template, protocol rules and broker config
 */

import { describeError, type IFileSystem, type ILogger } from '@pentad/core';
import yaml from 'yaml';
import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { ConfigLoader } from '../shared/config/ConfigLoader.js';
import { WORKSPACE_DIR, workspacePaths, type WorkspacePaths } from '../shared/config/paths.js';

const GOAL_TEMPLATE_PATH = fileURLToPath(new URL('./templates/goal.yaml', import.meta.url));

export interface InitializationResult {
  success: boolean;
  created: string[];
  errors: string[];
}

export class PentadInitializer {
  constructor(
    private fs: IFileSystem,
    private configLoader: ConfigLoader,
    private logger: ILogger,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Create the workspace directories and write any missing file. Existing
   * files are never overwritten.
   */
  async initializeWorkspace(projectRoot: string): Promise<InitializationResult> {
    const result: InitializationResult = { success: true, created: [], errors: [] };
    const paths = workspacePaths(projectRoot);

    try {
      // 1. Directories
      const directories: Array<[string, string]> = [
        [paths.workspace, `${WORKSPACE_DIR}/`],
        [paths.protocols, `${WORKSPACE_DIR}/protocols/`],
        [paths.logs, `${WORKSPACE_DIR}/logs/`],
        [paths.communication, `${WORKSPACE_DIR}/communication/`],
        [paths.features, 'features/'],
      ];
      for (const [directory, label] of directories) {
        if (!(await this.fs.exists(directory))) {
          await this.fs.mkdir(directory, { recursive: true });
          result.created.push(label);
          this.logger.info('Created directory', { path: directory });
        }
      }

      // 2. Files
      const timestamp = this.clock().toISOString();
      await this.writeIfMissing(paths.goal, `${WORKSPACE_DIR}/goal.yaml`, result, () =>
        this.renderGoalTemplate(timestamp)
      );
      await this.writeIfMissing(paths.rules, `${WORKSPACE_DIR}/protocols/rules.yml`, result, () =>
        Promise.resolve(yaml.stringify(this.configLoader.getDefaultRules(timestamp)))
      );
      await this.writeIfMissing(
        paths.communicationConfig,
        `${WORKSPACE_DIR}/communication/config.yml`,
        result,
        () => Promise.resolve(yaml.stringify(this.configLoader.getDefaults()))
      );
      await this.writeIfMissing(
        `${paths.workspace}/.gitignore`,
        `${WORKSPACE_DIR}/.gitignore`,
        result,
        () => Promise.resolve(this.gitignore())
      );
    } catch (error) {
      result.success = false;
      result.errors.push(`Initialization failed: ${describeError(error)}`);
      this.logger.error('Workspace initialization failed', { error: describeError(error) });
    }

    return result;
  }

  /**
   * Workspace directory and broker config both present
   */
  async isWorkspaceInitialized(projectRoot: string): Promise<boolean> {
    const paths: WorkspacePaths = workspacePaths(projectRoot);
    return (await this.fs.exists(paths.workspace)) && (await this.fs.exists(paths.communicationConfig));
  }

  private async writeIfMissing(
    filePath: string,
    label: string,
    result: InitializationResult,
    render: () => Promise<string>
  ): Promise<void> {
    if (await this.fs.exists(filePath)) {
      return;
    }
    await this.fs.writeFile(filePath, await render());
    result.created.push(label);
    this.logger.info(`Created ${label}`, { path: filePath });
  }

  private async renderGoalTemplate(timestamp: string): Promise<string> {
    const template = await readFile(GOAL_TEMPLATE_PATH, 'utf-8');
    return template.replaceAll('{{timestamp}}', timestamp);
  }

  private gitignore(): string {
    return `# Pentad workspace-specific ignores

# Logs
logs/
*.log

# Runtime state
communication/pids.json
`;
  }
}
