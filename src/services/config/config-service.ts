/**
 * Configuration Service
 *
 * Loads optional defaults from a YAML file (fixity.yaml by default):
 * repository connection, discovery content model and repair settings.
 * Command-line flags take precedence over anything read here.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigError } from '../../core/errors.js';
import {
  DEFAULT_MODEL_URI,
  DEFAULT_REPAIR_MESSAGE,
  validateConfig,
  type FixityConfig
} from '../../core/schemas.js';
import type { ChecksumType } from '../../models/types.js';

export const DEFAULT_CONFIG_FILE = 'fixity.yaml';

/**
 * Repository connection settings after config defaults are applied
 */
export interface ConnectionConfig {
  root?: string;
  user?: string;
  password?: string;
  timeoutMs?: number;
}

export interface RepairConfig {
  checksumType: ChecksumType;
  logMessage: string;
}

export class ConfigService {
  private readonly configPath: string;
  private cachedConfig: FixityConfig | null = null;

  constructor(options: { configPath?: string; baseDir?: string } = {}) {
    this.configPath = options.configPath
      ?? path.join(options.baseDir ?? process.cwd(), DEFAULT_CONFIG_FILE);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file, with caching. A missing file is an empty config.
   */
  async loadConfig(): Promise<FixityConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.cachedConfig = {};
        return this.cachedConfig;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Cannot read config file: ${message}`, this.configPath);
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Invalid YAML in config file: ${message}`, this.configPath);
    }

    const result = validateConfig(parsed ?? {});
    if (!result.success) {
      throw new ConfigError(`Invalid config file: ${result.errors.join('; ')}`, this.configPath);
    }

    this.cachedConfig = result.data;
    return result.data;
  }

  /**
   * Clear the cached configuration (useful for testing or after config changes)
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  async getConnection(): Promise<ConnectionConfig> {
    const config = await this.loadConfig();
    return { ...config.fedora };
  }

  async getModelUri(): Promise<string> {
    const config = await this.loadConfig();
    return config.discovery?.modelUri ?? DEFAULT_MODEL_URI;
  }

  async getRepairConfig(): Promise<RepairConfig> {
    const config = await this.loadConfig();
    return {
      checksumType: config.repair?.checksumType ?? 'DEFAULT',
      logMessage: config.repair?.logMessage ?? DEFAULT_REPAIR_MESSAGE
    };
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
