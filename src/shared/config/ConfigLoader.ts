/**
 * Configuration loader with hierarchy support
 * Priority: CLI flags > env vars > project config > defaults
 */

import {
  BrokerConfigSchema,
  DEFAULT_EXCHANGE_TYPES,
  describeError,
  type BrokerConfig,
  type IFileSystem,
  type ILogger,
} from '@pentad/core';
import yaml from 'yaml';
import dotenv from 'dotenv';
import {
  CommunicationConfigSchema,
  CommunicationFileSchema,
  ProtocolRulesSchema,
  type CommunicationConfig,
  type CommunicationFile,
  type ProtocolRules,
} from './schemas.js';
import { workspacePaths } from './paths.js';

export interface ConfigLoadOptions {
  projectRoot: string;
  cliFlags?: { broker?: Partial<BrokerConfig> };
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

type BrokerOverrides = Partial<BrokerConfig>;

export class ConfigLoader {
  constructor(
    private fs: IFileSystem,
    private logger: ILogger
  ) {}

  /**
   * Load configuration with full hierarchy:
   * 1. Defaults
   * 2. Project (.pentad/communication/config.yml)
   * 3. Environment variables (process env, then .env)
   * 4. CLI flags
   */
  async load(options: ConfigLoadOptions): Promise<CommunicationConfig> {
    const defaults = this.getDefaults();
    const projectConfig = await this.loadProjectConfig(options.projectRoot);
    const envBroker = await this.loadEnvConfig(options.projectRoot, options.env ?? process.env);

    const broker = this.mergeBroker(
      defaults.broker,
      projectConfig?.broker ?? {},
      envBroker,
      options.cliFlags?.broker ?? {}
    );

    const result = CommunicationConfigSchema.safeParse({
      broker,
      agents: { ...defaults.agents, ...projectConfig?.agents },
    });
    if (!result.success) {
      this.logger.warn('Invalid configuration, using defaults', {
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return defaults;
    }
    return result.data;
  }

  getDefaults(): CommunicationConfig {
    return {
      broker: {
        host: 'localhost',
        port: 5672,
        virtualHost: '/',
        username: 'guest',
        password: 'guest',
        heartbeatSeconds: 60,
        connectTimeoutMs: 5000,
        exchanges: { ...DEFAULT_EXCHANGE_TYPES },
      },
      agents: {},
    };
  }

  async loadProtocolRules(projectRoot: string): Promise<ProtocolRules> {
    const rulesPath = workspacePaths(projectRoot).rules;
    try {
      if (!(await this.fs.exists(rulesPath))) {
        this.logger.warn('Protocol rules not found, using defaults', { path: rulesPath });
        return this.getDefaultRules();
      }
      const content = await this.fs.readFile(rulesPath);
      return ProtocolRulesSchema.parse(yaml.parse(content) ?? {});
    } catch (error) {
      this.logger.warn('Failed to load protocol rules, using defaults', {
        path: rulesPath,
        error: describeError(error),
      });
      return this.getDefaultRules();
    }
  }

  async saveProtocolRules(projectRoot: string, rules: ProtocolRules): Promise<void> {
    const paths = workspacePaths(projectRoot);
    if (!(await this.fs.exists(paths.protocols))) {
      await this.fs.mkdir(paths.protocols, { recursive: true });
    }
    await this.fs.writeFile(paths.rules, yaml.stringify(ProtocolRulesSchema.parse(rules)));
    this.logger.info(`Protocol rules saved to ${paths.rules}`);
  }

  getDefaultRules(created = ''): ProtocolRules {
    return {
      version: '1.0.0',
      created,
      repositoryGoalFocus: true,
      maxRulesLimit: 10,
      rules: {
        goal_alignment: 'Every change must serve the repository goal',
        simplicity_first: 'Choose simple solutions over complex ones',
        user_friendly: 'Use clear, understandable language in all communications',
      },
      autoFixPatterns: {
        enabled: true,
        performanceFirst: true,
        escalateComplex: true,
      },
    };
  }

  private async loadProjectConfig(projectRoot: string): Promise<CommunicationFile | null> {
    const configPath = workspacePaths(projectRoot).communicationConfig;
    try {
      if (!(await this.fs.exists(configPath))) {
        return null;
      }
      const content = await this.fs.readFile(configPath);
      return CommunicationFileSchema.parse(yaml.parse(content) ?? {});
    } catch (error) {
      this.logger.warn('Failed to load project config, using defaults', {
        path: configPath,
        error: describeError(error),
      });
      return null;
    }
  }

  /**
   * Broker overrides from PENTAD_BROKER_* variables. Values already in the
   * environment win over the project's .env file.
   */
  private async loadEnvConfig(projectRoot: string, env: NodeJS.ProcessEnv): Promise<BrokerOverrides> {
    let variables: Record<string, string | undefined> = { ...env };

    const envPath = workspacePaths(projectRoot).env;
    try {
      if (await this.fs.exists(envPath)) {
        variables = { ...dotenv.parse(await this.fs.readFile(envPath)), ...env };
      }
    } catch (error) {
      this.logger.warn('Failed to load .env config', { error: describeError(error) });
    }

    const overrides: BrokerOverrides = {};
    if (variables.PENTAD_BROKER_HOST) {
      overrides.host = variables.PENTAD_BROKER_HOST;
    }
    if (variables.PENTAD_BROKER_PORT) {
      const port = Number.parseInt(variables.PENTAD_BROKER_PORT, 10);
      if (Number.isNaN(port)) {
        this.logger.warn('Ignoring invalid PENTAD_BROKER_PORT', {
          value: variables.PENTAD_BROKER_PORT,
        });
      } else {
        overrides.port = port;
      }
    }
    if (variables.PENTAD_BROKER_VHOST) {
      overrides.virtualHost = variables.PENTAD_BROKER_VHOST;
    }
    if (variables.PENTAD_BROKER_USER) {
      overrides.username = variables.PENTAD_BROKER_USER;
    }
    if (variables.PENTAD_BROKER_PASSWORD) {
      overrides.password = variables.PENTAD_BROKER_PASSWORD;
    }
    return overrides;
  }

  private mergeBroker(base: BrokerConfig, ...overrides: BrokerOverrides[]): BrokerConfig {
    let merged: BrokerConfig = { ...base };
    for (const override of overrides) {
      const defined = Object.fromEntries(
        Object.entries(override).filter(([, value]) => value !== undefined)
      );
      const candidate = BrokerConfigSchema.safeParse({
        ...merged,
        ...defined,
        exchanges: { ...merged.exchanges, ...override.exchanges },
      });
      if (candidate.success) {
        merged = candidate.data;
      } else {
        this.logger.warn('Ignoring invalid broker settings', {
          issues: candidate.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
      }
    }
    return merged;
  }

  validate(config: unknown): CommunicationConfig {
    return CommunicationConfigSchema.parse(config);
  }
}
