/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import YAML from 'js-yaml';
import { Logger, isLogLevel, type LogLevel } from './logger.js';

const logger = new Logger({ context: 'ConfigManager' });

export const DEFAULT_CONFIG_PATH = './update-packager.yaml';

export interface ResourceFilesConfig {
  /** Copied next to the staged tree; the run fails without them */
  mandatory: string[];
  /** Copied when present */
  optional: string[];
  /** Never scanned and never copied */
  skip: string[];
}

export interface UpdateConfig {
  namePrefix: string;
  homeDirectory: string;
  tempDirectory: string;
  outputDirectory: string;
  checkHashes: boolean;
}

export interface AppConfig {
  resourceFiles: ResourceFilesConfig;
  update: UpdateConfig;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: AppConfig = {
  resourceFiles: {
    mandatory: ['update-descriptor.yaml', 'LICENSE.txt'],
    optional: ['README.txt', 'NOT_A_CONTRIBUTION.txt', 'instructions.txt'],
    skip: ['.DS_Store']
  },
  update: {
    namePrefix: 'PRODUCT-UPDATE',
    homeDirectory: 'carbon.home',
    tempDirectory: 'temp',
    outputDirectory: '.',
    checkHashes: true
  },
  logLevel: 'info'
};

/**
 * Names excluded from the update scan: every resource file plus the skip list
 */
export function collectIgnoredNames(resourceFiles: ResourceFilesConfig): Set<string> {
  return new Set([...resourceFiles.mandatory, ...resourceFiles.optional, ...resourceFiles.skip]);
}

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Copies the recognised keys of `user` over `defaults`; anything of the wrong
 * shape is reported and left at its default.
 */
function mergeConfigs(defaults: AppConfig, user: Record<string, unknown>): AppConfig {
  const merged = cloneConfig(defaults);

  const resourceFiles = user.resourceFiles;
  if (isRecord(resourceFiles)) {
    for (const key of ['mandatory', 'optional', 'skip'] as const) {
      const value = resourceFiles[key];
      if (value === undefined || value === null) continue;
      if (isStringArray(value)) {
        merged.resourceFiles[key] = value;
      } else {
        logger.warn(`Ignoring resourceFiles.${key}: expected a list of file names`);
      }
    }
  }

  const update = user.update;
  if (isRecord(update)) {
    for (const key of ['namePrefix', 'homeDirectory', 'tempDirectory', 'outputDirectory'] as const) {
      const value = update[key];
      if (value === undefined || value === null) continue;
      if (typeof value === 'string') {
        merged.update[key] = value;
      } else {
        logger.warn(`Ignoring update.${key}: expected a string`);
      }
    }
    if (typeof update.checkHashes === 'boolean') {
      merged.update.checkHashes = update.checkHashes;
    }
  }

  if (user.logLevel !== undefined) {
    if (isLogLevel(user.logLevel)) {
      merged.logLevel = user.logLevel;
    } else {
      logger.warn(`Ignoring logLevel: ${String(user.logLevel)}`);
    }
  }

  return merged;
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;

  constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(`Config file not found: ${this.configPath}, using defaults`, { path: this.configPath });
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let config: unknown;

      if (this.configPath.endsWith('.json')) {
        config = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        config = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.debug(`Loaded configuration from ${this.configPath}`);

      // Merge with defaults
      return isRecord(config) ? mergeConfigs(DEFAULT_CONFIG, config) : cloneConfig(DEFAULT_CONFIG);
    } catch (error) {
      logger.warn(`Failed to load config: ${error instanceof Error ? error.message : String(error)}`);
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  get logLevel(): LogLevel {
    return this.config.logLevel;
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { resourceFiles, update } = this.config;

    if (resourceFiles.mandatory.length === 0) {
      errors.push('resourceFiles.mandatory must name at least the update descriptor');
    }

    const allNames = [...resourceFiles.mandatory, ...resourceFiles.optional, ...resourceFiles.skip];
    if (allNames.some(name => name.trim().length === 0 || name.includes('/'))) {
      errors.push('Resource file entries must be plain file names');
    }

    for (const key of ['namePrefix', 'homeDirectory', 'tempDirectory'] as const) {
      if (update[key].trim().length === 0) {
        errors.push(`update.${key} must not be empty`);
      }
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Get config file path
   */
  getPath(): string {
    return this.configPath;
  }
}

/**
 * Resolve the config file: explicit path, then UPDATE_PACKAGER_CONFIG, then the default
 */
export function resolveConfigPath(overridePath?: string): string {
  if (overridePath?.trim()) {
    return overridePath.trim();
  }
  const configured = process.env.UPDATE_PACKAGER_CONFIG?.trim();
  return configured ? configured : DEFAULT_CONFIG_PATH;
}

/**
 * Create example config file
 */
export function createExampleConfig(outputPath: string = './update-packager.example.yaml'): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  const content = YAML.dump(DEFAULT_CONFIG, { indent: 2 });
  writeFileSync(outputPath, content);
  logger.info(`Example config created at ${outputPath}`);
}
