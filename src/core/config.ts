import { join } from 'path';
import type { ModpmConfig, RegistryConfig } from '../types/index.js';
import { DEFAULT_REGISTRY } from '../constants/index.js';
import { readJsoncFile, exists } from '../utils/fs.js';
import { getModpmHome } from '../utils/home-directory.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Configuration management for the modpm CLI
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = ['config.jsonc', 'config.json'];
const DEFAULT_CONFIG_FILE = 'config.jsonc';

// Default configuration values
const DEFAULT_CONFIG: ModpmConfig = {
  registries: [{ ...DEFAULT_REGISTRY }]
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sectionString(raw: Record<string, unknown>, section: string, key: string, path: string): string | undefined {
  const value = raw[section];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid configuration in ${path}: '${section}' must be an object`);
  }
  const field = value[key];
  if (field !== undefined && typeof field !== 'string') {
    throw new ConfigError(`Invalid configuration in ${path}: '${section}.${key}' must be a string`);
  }
  return field;
}

function parseRegistries(value: unknown, path: string): RegistryConfig[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ConfigError(`Invalid configuration in ${path}: 'registries' must be a list`);
  }
  return value.map((entry: unknown, index) => {
    if (!isRecord(entry) || typeof entry.name !== 'string' || typeof entry.url !== 'string') {
      throw new ConfigError(`Invalid configuration in ${path}: registries[${index}] needs a name and a url`);
    }
    return { name: entry.name, url: entry.url };
  });
}

/**
 * Validate the parsed contents of a config file.
 */
export function parseConfig(raw: unknown, path: string): ModpmConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`Invalid configuration in ${path}: expected an object`);
  }

  const config: ModpmConfig = {};
  const registries = parseRegistries(raw.registries, path);
  if (registries) config.registries = registries;

  const python = sectionString(raw, 'python', 'executable', path);
  if (python !== undefined) config.python = { executable: python };

  const runtime = sectionString(raw, 'runtime', 'command', path);
  if (runtime !== undefined) config.runtime = { command: runtime };

  const git = sectionString(raw, 'git', 'executable', path);
  if (git !== undefined) config.git = { executable: git };

  return config;
}

/**
 * Environment overrides on top of the file configuration:
 * MODPM_REGISTRY replaces the registry list, MODPM_PYTHON the interpreter.
 */
export function applyEnvOverrides(config: ModpmConfig, env: NodeJS.ProcessEnv = process.env): ModpmConfig {
  const result: ModpmConfig = { ...config };
  if (env.MODPM_REGISTRY) {
    result.registries = [{ name: DEFAULT_REGISTRY.name, url: env.MODPM_REGISTRY }];
  }
  if (env.MODPM_PYTHON) {
    result.python = { ...result.python, executable: env.MODPM_PYTHON };
  }
  return result;
}

class ConfigManager {
  private config: ModpmConfig | null = null;
  private configPath: string | null = null;
  private readonly configDir: string;

  constructor(configDir: string = getModpmHome()) {
    this.configDir = configDir;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.configDir, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  private async getConfigPath(): Promise<string> {
    if (this.configPath) {
      return this.configPath;
    }

    const existingPath = await this.findConfigFile();
    this.configPath = existingPath ?? join(this.configDir, DEFAULT_CONFIG_FILE);
    return this.configPath;
  }

  /**
   * Load configuration from file. A missing file means the defaults.
   */
  async load(): Promise<ModpmConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = { ...DEFAULT_CONFIG };
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsoncFile(configPath);
    } catch (error) {
      logger.error('Failed to load configuration', { error });
      throw new ConfigError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
    }
    const fileConfig = parseConfig(raw, configPath);
    this.configPath = configPath;
    this.config = { ...DEFAULT_CONFIG, ...fileConfig };
    return this.config;
  }

  /**
   * File configuration with environment overrides applied.
   */
  async resolve(env: NodeJS.ProcessEnv = process.env): Promise<ModpmConfig> {
    return applyEnvOverrides(await this.load(), env);
  }

  async getConfigFilePath(): Promise<string> {
    return await this.getConfigPath();
  }
}

// Create and export a singleton instance
export const configManager = new ConfigManager();

// Export the class for testing purposes
export { ConfigManager };
